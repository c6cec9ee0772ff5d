/**
 * Color coordination for stacks. Every branch stacked directly on trunk
 * starts a stack, and everything above it shares its color.
 */

import pc from 'picocolors';

// Available colors for stack visualization
const STACK_COLORS = [
  'cyan',
  'magenta',
  'yellow',
  'green',
  'blue',
] as const;

type ColorName = (typeof STACK_COLORS)[number];

export class ColorManager {
  private stackColors = new Map<string, ColorName>();
  private usedColors = new Set<ColorName>();

  /**
   * Get color function for a stack root
   */
  getColorForStack(stackRoot: string): (text: string) => string {
    let colorName = this.stackColors.get(stackRoot);

    if (!colorName) {
      colorName = this.assignColor(stackRoot);
      this.stackColors.set(stackRoot, colorName);
    }

    return pc[colorName];
  }

  /**
   * Assign a color to a stack root using consistent hashing
   */
  private assignColor(stackRoot: string): ColorName {
    const index = this.hashString(stackRoot) % STACK_COLORS.length;

    // Try to use the hashed color first
    const color = STACK_COLORS[index];
    if (!this.usedColors.has(color)) {
      this.usedColors.add(color);
      return color;
    }

    for (const c of STACK_COLORS) {
      if (!this.usedColors.has(c)) {
        this.usedColors.add(c);
        return c;
      }
    }

    // All colors used, cycle back
    return color;
  }

  private hashString(str: string): number {
    let hash = 0;
    for (let i = 0; i < str.length; i++) {
      hash = (hash << 5) - hash + str.charCodeAt(i);
      hash = hash & hash; // 32-bit
    }
    return Math.abs(hash);
  }
}
