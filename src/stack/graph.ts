/**
 * Stack graph - branch nodes keyed by name, each pointing at its parent.
 *
 * Every query and invariant check here is pure; nothing in this module talks
 * to git. Callers look up commit ids themselves and hand them in as anchors.
 */

import { StackErrors, stackOk, type StackResult } from './errors.js';
import type { BranchNode, RestackOperation, StackTree } from './types.js';

export class StackGraph {
  private readonly branches = new Map<string, BranchNode>();

  operation: RestackOperation | null = null;

  constructor(
    readonly trunk: string,
    nodes: Iterable<BranchNode> = []
  ) {
    for (const node of nodes) {
      this.branches.set(node.name, { ...node });
    }
  }

  isTrunk(name: string): boolean {
    return name === this.trunk;
  }

  has(name: string): boolean {
    return this.branches.has(name);
  }

  get(name: string): BranchNode | undefined {
    return this.branches.get(name);
  }

  /** Trunk or a tracked branch */
  isKnown(name: string): boolean {
    return this.isTrunk(name) || this.has(name);
  }

  get size(): number {
    return this.branches.size;
  }

  /**
   * All nodes sorted by name
   */
  nodes(): BranchNode[] {
    return [...this.branches.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  childrenOf(name: string): string[] {
    const children: string[] = [];
    for (const node of this.branches.values()) {
      if (node.parent === name) {
        children.push(node.name);
      }
    }
    return children.sort((a, b) => a.localeCompare(b));
  }

  /** Branches stacked directly on trunk */
  roots(): string[] {
    return this.childrenOf(this.trunk);
  }

  add(name: string, parent: string, anchor: string | null, createdAt = new Date().toISOString()): StackResult<BranchNode> {
    if (this.isKnown(name)) {
      return StackErrors.duplicateBranch(name);
    }
    if (!this.isKnown(parent)) {
      return StackErrors.unknownParent(name, parent);
    }
    // A fresh name has no descendants, so only self-parenting can cycle
    if (parent === name) {
      return StackErrors.wouldCreateCycle(name, parent);
    }

    const node: BranchNode = { name, parent, anchor, createdAt };
    this.branches.set(name, node);
    return stackOk(node);
  }

  reparent(name: string, newParent: string, anchor: string | null): StackResult<BranchNode> {
    if (this.isTrunk(name)) {
      return StackErrors.trunkProtected(name, 'mount');
    }
    const node = this.branches.get(name);
    if (!node) {
      return StackErrors.notTracked(name);
    }
    if (!this.isKnown(newParent)) {
      return StackErrors.unknownParent(name, newParent);
    }
    if (newParent === name || this.isDescendant(newParent, name)) {
      return StackErrors.wouldCreateCycle(name, newParent);
    }

    node.parent = newParent;
    node.anchor = anchor;
    return stackOk(node);
  }

  /**
   * Remove a node, moving its children onto its parent. The moved children
   * lose their anchors; the returned names let callers report them.
   */
  remove(name: string): StackResult<string[]> {
    if (this.isTrunk(name)) {
      return StackErrors.trunkProtected(name, 'delete');
    }
    const node = this.branches.get(name);
    if (!node) {
      return StackErrors.notTracked(name);
    }

    const rewired = this.childrenOf(name);
    for (const child of rewired) {
      const childNode = this.branches.get(child);
      if (childNode) {
        childNode.parent = node.parent;
        childNode.anchor = null;
      }
    }

    this.branches.delete(name);
    return stackOk(rewired);
  }

  setAnchor(name: string, anchor: string | null): void {
    const node = this.branches.get(name);
    if (node) {
      node.anchor = anchor;
    }
  }

  setPrNumber(name: string, prNumber: number): void {
    const node = this.branches.get(name);
    if (node) {
      node.prNumber = prNumber;
    }
  }

  /**
   * True when `candidate` sits somewhere below `ancestor`
   */
  isDescendant(candidate: string, ancestor: string): boolean {
    if (this.isTrunk(ancestor)) {
      return this.has(candidate);
    }

    let current = this.branches.get(candidate);
    let steps = 0;
    while (current && steps <= this.branches.size) {
      if (current.parent === ancestor) {
        return true;
      }
      current = this.branches.get(current.parent);
      steps++;
    }
    return false;
  }

  /**
   * Parents of `name` up to but excluding trunk, nearest first
   */
  ancestors(name: string): string[] {
    const result: string[] = [];
    let current = this.branches.get(name);

    while (current && !this.isTrunk(current.parent)) {
      const parent = this.branches.get(current.parent);
      if (!parent || result.includes(parent.name)) {
        break;
      }
      result.push(parent.name);
      current = parent;
    }

    return result;
  }

  descendants(name: string): StackTree {
    const visited = new Set<string>();

    const build = (branch: string): StackTree => {
      visited.add(branch);
      return {
        name: branch,
        children: this.childrenOf(branch)
          .filter((child) => !visited.has(child))
          .map(build),
      };
    };

    return build(name);
  }

  /**
   * `name` followed by all of its descendants, every parent before its
   * children and siblings by name. For trunk, every tracked branch.
   */
  topologicalOrder(name: string): string[] {
    const order: string[] = [];

    const visit = (tree: StackTree) => {
      if (!this.isTrunk(tree.name)) {
        order.push(tree.name);
      }
      for (const child of tree.children) {
        visit(child);
      }
    };

    visit(this.descendants(name));
    return order;
  }

  /**
   * Describe the first broken invariant, or null when the graph is sound
   */
  validate(): string | null {
    for (const node of this.branches.values()) {
      if (this.isTrunk(node.name)) {
        return `branch '${node.name}' has the same name as the trunk`;
      }
      if (!this.isKnown(node.parent)) {
        return `branch '${node.name}' has unknown parent '${node.parent}'`;
      }
    }

    for (const node of this.branches.values()) {
      const seen = new Set<string>([node.name]);
      let current = node;
      while (!this.isTrunk(current.parent)) {
        if (seen.has(current.parent)) {
          return `branch '${node.name}' is part of a parent cycle`;
        }
        seen.add(current.parent);
        const next = this.branches.get(current.parent);
        if (!next) break;
        current = next;
      }
    }

    return null;
  }
}
