// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { traverse } from './computation.js';
import { described, treeChildren, wrapChildren } from './tree.js';
import type { DescribedComputation } from './types.js';

/**
 * Captions a successful computation with a description of its value.
 *
 * A failed computation is returned unchanged and `describe` is not called:
 * the failure is already described by the step that produced it.  Use
 * {@link labelOutcome} to caption both branches.
 */
export function labelValue<A, E, D>(
  comp: DescribedComputation<A, E, D>,
  describe: (value: A) => D,
): DescribedComputation<A, E, D> {
  if (comp.outcome.kind === 'failure') return comp;
  return {
    log: described(describe(comp.outcome.value), wrapChildren(comp.log)),
    outcome: comp.outcome,
  };
}

/** Captions a computation whichever way it ended. */
export function labelOutcome<A, E, D>(
  comp: DescribedComputation<A, E, D>,
  describeSuccess: (value: A) => D,
  describeFailure: (reason: E) => D,
): DescribedComputation<A, E, D> {
  const description =
    comp.outcome.kind === 'success'
      ? describeSuccess(comp.outcome.value)
      : describeFailure(comp.outcome.reason);
  return { log: described(description, wrapChildren(comp.log)), outcome: comp.outcome };
}

/**
 * Places the whole trail of `comp` under one caption, regardless of outcome.
 */
export function labelBlock<A, E, D>(
  comp: DescribedComputation<A, E, D>,
  description: D,
): DescribedComputation<A, E, D> {
  return { log: described(description, wrapChildren(comp.log)), outcome: comp.outcome };
}

/**
 * Runs `fn` over `items` in order and records every item's steps as direct
 * children of a single `caption` node.
 *
 * Stops at the first failing item, like {@link traverse}.  An empty list
 * still records the caption, with no children.
 */
export function labelEach<T, A, E, D>(
  items: Iterable<T>,
  fn: (item: T, index: number) => DescribedComputation<A, E, D>,
  caption: D,
): DescribedComputation<A[], E, D> {
  const steps = traverse(items, fn);
  return { log: described(caption, treeChildren(steps.log)), outcome: steps.outcome };
}
