// engine/quality/traversal.ts — Stack-based walks over the scoring tree

import type { SyntaxNode } from '../types.js';

/**
 * Visit every node exactly once, parents before children, in source order.
 * Uses an explicit stack so deeply nested input cannot exhaust the call stack.
 */
export function walk(root: SyntaxNode, visit: (node: SyntaxNode) => void): void {
  const stack: SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    visit(node);

    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }
}

export function countNodes(root: SyntaxNode, predicate: (node: SyntaxNode) => boolean): number {
  let count = 0;
  walk(root, (node) => {
    if (predicate(node)) count++;
  });
  return count;
}

export function someNode(root: SyntaxNode, predicate: (node: SyntaxNode) => boolean): boolean {
  const stack: SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (predicate(node)) return true;
    stack.push(...node.children);
  }

  return false;
}

/**
 * Deepest running total along any root-to-node path, where entering a node
 * adds `step(node)`. Siblings never see each other's increments.
 */
export function maxPathDepth(root: SyntaxNode, step: (node: SyntaxNode) => number): number {
  const stack: Array<[SyntaxNode, number]> = [[root, 0]];
  let max = 0;

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;

    const [node, parentDepth] = entry;
    const depth = parentDepth + step(node);
    if (depth > max) max = depth;

    for (const child of node.children) {
      stack.push([child, depth]);
    }
  }

  return max;
}
