// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { FailedComputationError } from './errors.js';
import { failure, success } from './outcome.js';
import { EMPTY_TREE, combine, described, finalizeTree } from './tree.js';
import type {
  DescribedComputation,
  Description,
  LogTree,
  Outcome,
} from './types.js';

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

/** A successful step recorded as a single labelled leaf. */
export function leaf<A, E = string, D = Description>(
  value: A,
  description: D,
): DescribedComputation<A, E, D> {
  return { log: described(description), outcome: success(value) };
}

/** A failed step recorded as a single labelled leaf. */
export function failureLeaf<A = never, E = string, D = Description>(
  reason: E,
  description: D,
): DescribedComputation<A, E, D> {
  return { log: described(description), outcome: failure(reason) };
}

/** A value with no audit entry of its own. */
export function pure<A, E = string, D = Description>(value: A): DescribedComputation<A, E, D> {
  return { log: EMPTY_TREE, outcome: success(value) };
}

// ---------------------------------------------------------------------------
// Sequencing
// ---------------------------------------------------------------------------

/**
 * Runs `fn` on the value of `comp` and appends its trail to `comp`'s.
 *
 * When `comp` has failed, `fn` is not invoked: the failure and the trail
 * recorded so far are returned as they are, so nothing after the failing
 * step ever appears in the tree.
 */
export function bind<A, B, E, D>(
  comp: DescribedComputation<A, E, D>,
  fn: (value: A) => DescribedComputation<B, E, D>,
): DescribedComputation<B, E, D> {
  if (comp.outcome.kind === 'failure') {
    return { log: comp.log, outcome: comp.outcome };
  }
  const next = fn(comp.outcome.value);
  return { log: combine(comp.log, next.log), outcome: next.outcome };
}

/** Transforms the value of `comp` without recording anything. */
export function map<A, B, E, D>(
  comp: DescribedComputation<A, E, D>,
  fn: (value: A) => B,
): DescribedComputation<B, E, D> {
  return bind(comp, (value) => pure<B, E, D>(fn(value)));
}

/**
 * {@link bind} for steps that produce their result asynchronously.
 *
 * The step is awaited before its trail is appended, so sibling order in the
 * tree is always the order in which steps were chained.
 */
export async function bindAsync<A, B, E, D>(
  comp: DescribedComputation<A, E, D>,
  fn: (value: A) => DescribedComputation<B, E, D> | Promise<DescribedComputation<B, E, D>>,
): Promise<DescribedComputation<B, E, D>> {
  if (comp.outcome.kind === 'failure') {
    return { log: comp.log, outcome: comp.outcome };
  }
  const next = await fn(comp.outcome.value);
  return { log: combine(comp.log, next.log), outcome: next.outcome };
}

/**
 * Applies `fn` to each item in order and collects the values.
 *
 * Stops at the first failing item; items after it are never evaluated.
 */
export function traverse<T, A, E, D>(
  items: Iterable<T>,
  fn: (item: T, index: number) => DescribedComputation<A, E, D>,
): DescribedComputation<A[], E, D> {
  let acc = pure<A[], E, D>([]);
  let index = 0;
  for (const item of items) {
    const position = index++;
    acc = bind(acc, (values) => map(fn(item, position), (value) => [...values, value]));
    if (acc.outcome.kind === 'failure') break;
  }
  return acc;
}

/** {@link traverse} with asynchronous steps, each awaited before the next starts. */
export async function traverseAsync<T, A, E, D>(
  items: Iterable<T>,
  fn: (
    item: T,
    index: number,
  ) => DescribedComputation<A, E, D> | Promise<DescribedComputation<A, E, D>>,
): Promise<DescribedComputation<A[], E, D>> {
  let acc = pure<A[], E, D>([]);
  let index = 0;
  for (const item of items) {
    const position = index++;
    acc = await bindAsync(acc, async (values) =>
      map(await fn(item, position), (value) => [...values, value]),
    );
    if (acc.outcome.kind === 'failure') break;
  }
  return acc;
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/** The finished audit tree of `comp`.  Never the empty identity. */
export function tree<A, E, D>(comp: DescribedComputation<A, E, D>): LogTree<D> {
  return finalizeTree(comp.log);
}

export function outcome<A, E, D>(comp: DescribedComputation<A, E, D>): Outcome<A, E> {
  return comp.outcome;
}

/**
 * The value of a successful computation.
 *
 * @throws {FailedComputationError} when `comp` failed; the error carries the
 *   failure reason and the finished tree.
 */
export function getOrThrow<A, E, D>(comp: DescribedComputation<A, E, D>): A {
  if (comp.outcome.kind === 'failure') {
    throw new FailedComputationError<E, D>(comp.outcome.reason, finalizeTree(comp.log));
  }
  return comp.outcome.value;
}
