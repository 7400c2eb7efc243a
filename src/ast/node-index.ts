/**
 * Node Index
 * Parent links for a finished tree, kept outside the nodes themselves.
 */

import type { ASTNode } from '../ast-nodes.js';
import { childNodes } from './visitor.js';

/** No parent (the root) */
const NO_PARENT = -1;

/**
 * Arena over one tree: nodes in pre-order, each with the index of its
 * parent. Lookups are by node identity.
 */
export interface NodeIndex {
  readonly nodes: readonly ASTNode[];
  /** `parents[i]` is the index of the parent of `nodes[i]`, or -1 */
  readonly parents: readonly number[];
  parentOf(node: ASTNode): ASTNode | null;
  /** Nearest first, root last */
  ancestorsOf(node: ASTNode): ASTNode[];
  /** Innermost node whose span contains the offset */
  nodeAt(offset: number): ASTNode | null;
}

function contains(node: ASTNode, offset: number): boolean {
  return node.span.start.offset <= offset && offset < node.span.end.offset;
}

export function buildNodeIndex(root: ASTNode): NodeIndex {
  const nodes: ASTNode[] = [];
  const parents: number[] = [];
  const positions = new Map<ASTNode, number>();

  const stack: { node: ASTNode; parent: number }[] = [
    { node: root, parent: NO_PARENT },
  ];
  for (let entry = stack.pop(); entry; entry = stack.pop()) {
    const index = nodes.length;
    nodes.push(entry.node);
    parents.push(entry.parent);
    positions.set(entry.node, index);

    // Reverse so children come off the stack in source order
    const children = childNodes(entry.node);
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child) stack.push({ node: child, parent: index });
    }
  }

  const parentIndex = (node: ASTNode): number => {
    const index = positions.get(node);
    if (index === undefined) {
      throw new Error(`Node ${node.type} is not part of this tree`);
    }
    return parents[index] ?? NO_PARENT;
  };

  return {
    nodes,
    parents,

    parentOf(node) {
      const parent = parentIndex(node);
      return parent === NO_PARENT ? null : (nodes[parent] ?? null);
    },

    ancestorsOf(node) {
      const ancestors: ASTNode[] = [];
      for (let p = parentIndex(node); p !== NO_PARENT; p = parents[p] ?? NO_PARENT) {
        const ancestor = nodes[p];
        if (ancestor) ancestors.push(ancestor);
      }
      return ancestors;
    },

    nodeAt(offset) {
      if (!contains(root, offset)) return null;
      let found: ASTNode = root;
      for (;;) {
        const next = childNodes(found).find((child) => contains(child, offset));
        if (!next) return found;
        found = next;
      }
    },
  };
}
