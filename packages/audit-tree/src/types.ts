// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Value types shared by every audit-tree module.
 *
 * All shapes are plain readonly objects discriminated on `kind`, so they can
 * be compared with deep equality, shared freely, and narrowed exhaustively.
 */

// ---------------------------------------------------------------------------
// Descriptions
// ---------------------------------------------------------------------------

/**
 * Default description type.  Every API is generic over the description type;
 * applications may use any value that renders to text.
 */
export type Description = string;

// ---------------------------------------------------------------------------
// Log trees
// ---------------------------------------------------------------------------

/**
 * A labelled step.  Its children are the sub-steps performed while producing
 * it, in evaluation order.
 */
export interface DescribedNode<D = Description> {
  readonly kind: 'described';
  readonly description: D;
  readonly children: readonly LogTree<D>[];
}

/** A purely structural grouping of sibling steps. */
export interface UndescribedNode<D = Description> {
  readonly kind: 'undescribed';
  readonly children: readonly LogTree<D>[];
}

/** A finished audit tree as handed to calling code. */
export type LogTree<D = Description> = DescribedNode<D> | UndescribedNode<D>;

/**
 * Identity element of `combine`.  Only ever held at the root of a
 * computation's accumulator; it never appears as a child.
 */
export interface EmptyTree {
  readonly kind: 'empty';
}

/** What a computation carries while it is being built. */
export type TreeAccumulator<D = Description> = LogTree<D> | EmptyTree;

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export interface Success<A> {
  readonly kind: 'success';
  readonly value: A;
}

export interface Failure<E> {
  readonly kind: 'failure';
  readonly reason: E;
}

/** Exactly one of a produced value or an application-defined failure reason. */
export type Outcome<A, E = string> = Success<A> | Failure<E>;

// ---------------------------------------------------------------------------
// Described computations
// ---------------------------------------------------------------------------

/**
 * The audit trail of a computation paired with its result.
 *
 * Never mutated: sequencing and labeling always build a new value.
 */
export interface DescribedComputation<A, E = string, D = Description> {
  readonly log: TreeAccumulator<D>;
  readonly outcome: Outcome<A, E>;
}
