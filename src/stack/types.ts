/**
 * Types for the stack graph and its persisted form
 */

export interface BranchNode {
  name: string;
  parent: string;
  /** Parent tip at the last successful restack; null forces recomputation */
  anchor: string | null;
  createdAt: string;
  prNumber?: number;
}

export interface StackTree {
  name: string;
  children: StackTree[];
}

/**
 * An in-flight restack, persisted so a conflict can be resumed
 */
export interface RestackOperation {
  kind: 'restack';
  target: string;
  /** Branch whose rebase stopped on a conflict */
  blocked: string;
  /** Commit the blocked branch is being rebased onto */
  onto: string;
  /** Branches still to process after the blocked one, in order */
  remaining: string[];
  push: boolean;
  originalBranch: string | null;
  startedAt: string;
}
