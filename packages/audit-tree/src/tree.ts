// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  DescribedNode,
  EmptyTree,
  LogTree,
  TreeAccumulator,
  UndescribedNode,
} from './types.js';

/** The identity element of {@link combine}. */
export const EMPTY_TREE: EmptyTree = { kind: 'empty' };

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function described<D>(
  description: D,
  children: readonly LogTree<D>[] = [],
): DescribedNode<D> {
  return { kind: 'described', description, children: [...children] };
}

export function undescribed<D>(children: readonly LogTree<D>[]): UndescribedNode<D> {
  return { kind: 'undescribed', children: [...children] };
}

export function isEmptyTree<D>(tree: TreeAccumulator<D>): tree is EmptyTree {
  return tree.kind === 'empty';
}

// ---------------------------------------------------------------------------
// Combination
// ---------------------------------------------------------------------------

/**
 * Combines two trees into one, left before right.
 *
 * Undescribed nodes absorb their siblings; a Described node is never merged
 * into another Described node, so two adjacent labelled steps end up as
 * siblings under a fresh Undescribed parent.
 *
 * | left            | right           | result                          |
 * |-----------------|-----------------|---------------------------------|
 * | Empty           | t               | t                               |
 * | t               | Empty           | t                               |
 * | Undescribed(a)  | Undescribed(b)  | Undescribed(a ++ b)             |
 * | Undescribed(a)  | Described(d, b) | Undescribed(a ++ [right])       |
 * | Described(d, a) | Undescribed(b)  | Undescribed([left] ++ b)        |
 * | Described       | Described       | Undescribed([left, right])      |
 *
 * The operation is associative and never mutates its inputs.
 */
export function combine<D>(left: LogTree<D>, right: TreeAccumulator<D>): LogTree<D>;
export function combine<D>(left: TreeAccumulator<D>, right: LogTree<D>): LogTree<D>;
export function combine<D>(
  left: TreeAccumulator<D>,
  right: TreeAccumulator<D>,
): TreeAccumulator<D>;
export function combine<D>(
  left: TreeAccumulator<D>,
  right: TreeAccumulator<D>,
): TreeAccumulator<D> {
  if (left.kind === 'empty') return right;
  if (right.kind === 'empty') return left;

  switch (left.kind) {
    case 'undescribed':
      return right.kind === 'undescribed'
        ? undescribed([...left.children, ...right.children])
        : undescribed([...left.children, right]);
    case 'described':
      return right.kind === 'undescribed'
        ? undescribed([left, ...right.children])
        : undescribed([left, right]);
    default:
      return assertNever(left);
  }
}

/** Left fold of {@link combine} starting from {@link EMPTY_TREE}. */
export function combineAll<D>(trees: Iterable<TreeAccumulator<D>>): TreeAccumulator<D> {
  let acc: TreeAccumulator<D> = EMPTY_TREE;
  for (const tree of trees) {
    acc = combine(acc, tree);
  }
  return acc;
}

// ---------------------------------------------------------------------------
// Views
// ---------------------------------------------------------------------------

/**
 * The tree handed to calling code.  An accumulator that recorded nothing
 * becomes an Undescribed node with no children.
 */
export function finalizeTree<D>(tree: TreeAccumulator<D>): LogTree<D> {
  return tree.kind === 'empty' ? undescribed([]) : tree;
}

/** Child list for a new node wrapping `tree`. */
export function wrapChildren<D>(tree: TreeAccumulator<D>): readonly LogTree<D>[] {
  return tree.kind === 'empty' ? [] : [tree];
}

/**
 * Top-level steps of an accumulator: the children of an Undescribed root,
 * the root itself when it is Described, nothing when empty.
 */
export function treeChildren<D>(tree: TreeAccumulator<D>): readonly LogTree<D>[] {
  switch (tree.kind) {
    case 'empty':
      return [];
    case 'described':
      return [tree];
    case 'undescribed':
      return tree.children;
    default:
      return assertNever(tree);
  }
}

/** Every description in the tree, depth first, in evaluation order. */
export function descriptions<D>(tree: TreeAccumulator<D>): D[] {
  const out: D[] = [];
  const visit = (node: TreeAccumulator<D>): void => {
    if (node.kind === 'empty') return;
    if (node.kind === 'described') out.push(node.description);
    for (const child of node.children) visit(child);
  };
  visit(tree);
  return out;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled log tree node: ${JSON.stringify(value)}`);
}
