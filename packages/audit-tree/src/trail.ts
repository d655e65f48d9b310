// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import {
  bind,
  bindAsync,
  failureLeaf,
  getOrThrow,
  leaf,
  map,
  pure,
  tree,
} from './computation.js';
import { EVENT_FAILURE, EVENT_SKIPPED, EVENT_STEP } from './events.js';
import { labelBlock, labelOutcome, labelValue } from './label.js';
import { parseTrailConfig } from './schema.js';
import type { TrailConfig, TrailConfigInput } from './schema.js';
import type { DescribedComputation, Description, LogTree, Outcome } from './types.js';

/**
 * Fluent, immutable builder over a {@link DescribedComputation}.
 *
 * Every method returns a new Trail; the receiver is never changed.  When the
 * configuration carries a `TrailEventEmitter`, `andThen()` reports each step
 * it runs and each step it skips.
 *
 * Usage:
 * ```typescript
 * const product = Trail.leaf(3, 'Got a 3')
 *   .andThen((a) => bind(leaf(5, 'Got a 5'), (b) => pure(a * b)))
 *   .caption('compute foo*bar');
 *
 * product.outcome; // { kind: 'success', value: 15 }
 * product.tree;    // Described('compute foo*bar', [Undescribed([...])])
 * ```
 */
export class Trail<A, E = string, D = Description> {
  readonly #computation: DescribedComputation<A, E, D>;
  readonly #config: TrailConfig;

  private constructor(computation: DescribedComputation<A, E, D>, config: TrailConfig) {
    this.#computation = computation;
    this.#config = config;
  }

  // ---------------------------------------------------------------------------
  // Factories
  // ---------------------------------------------------------------------------

  /**
   * Wraps an existing computation.  `config` is validated with zod.
   *
   * A computation that has already failed is reported once as `trail:failure`.
   */
  static of<A, E = string, D = Description>(
    computation: DescribedComputation<A, E, D>,
    config: TrailConfigInput = {},
  ): Trail<A, E, D> {
    const trail = new Trail(computation, parseTrailConfig(config));
    if (computation.outcome.kind === 'failure') {
      trail.#emitFailure(computation.outcome.reason, new Date().toISOString());
    }
    return trail;
  }

  static leaf<A, E = string, D = Description>(
    value: A,
    description: D,
    config: TrailConfigInput = {},
  ): Trail<A, E, D> {
    return Trail.of(leaf<A, E, D>(value, description), config);
  }

  static failure<A = never, E = string, D = Description>(
    reason: E,
    description: D,
    config: TrailConfigInput = {},
  ): Trail<A, E, D> {
    return Trail.of(failureLeaf<A, E, D>(reason, description), config);
  }

  static pure<A, E = string, D = Description>(
    value: A,
    config: TrailConfigInput = {},
  ): Trail<A, E, D> {
    return Trail.of(pure<A, E, D>(value), config);
  }

  // ---------------------------------------------------------------------------
  // Composition
  // ---------------------------------------------------------------------------

  /** Sequences the next step.  Skipped once the trail has failed. */
  andThen<B>(fn: (value: A) => DescribedComputation<B, E, D>): Trail<B, E, D> {
    if (this.#computation.outcome.kind === 'failure') {
      this.#emitSkipped();
    }
    const next = bind(this.#computation, (value) => {
      const step = fn(value);
      this.#emitStep(step.outcome);
      return step;
    });
    return this.#derive(next);
  }

  /** {@link andThen} for a step that completes asynchronously. */
  async andThenAsync<B>(
    fn: (value: A) => DescribedComputation<B, E, D> | Promise<DescribedComputation<B, E, D>>,
  ): Promise<Trail<B, E, D>> {
    if (this.#computation.outcome.kind === 'failure') {
      this.#emitSkipped();
    }
    const next = await bindAsync(this.#computation, async (value) => {
      const step = await fn(value);
      this.#emitStep(step.outcome);
      return step;
    });
    return this.#derive(next);
  }

  /** Transforms the value without recording a step. */
  map<B>(fn: (value: A) => B): Trail<B, E, D> {
    return this.#derive(map(this.#computation, fn));
  }

  /** Captions a successful trail with a description of its value. */
  label(describe: (value: A) => D): Trail<A, E, D> {
    return this.#derive(labelValue(this.#computation, describe));
  }

  /** Captions the trail whichever way it ended. */
  labelOutcome(
    describeSuccess: (value: A) => D,
    describeFailure: (reason: E) => D,
  ): Trail<A, E, D> {
    return this.#derive(labelOutcome(this.#computation, describeSuccess, describeFailure));
  }

  /** Places the whole trail under one caption, regardless of outcome. */
  caption(description: D): Trail<A, E, D> {
    return this.#derive(labelBlock(this.#computation, description));
  }

  // ---------------------------------------------------------------------------
  // Extraction
  // ---------------------------------------------------------------------------

  get computation(): DescribedComputation<A, E, D> {
    return this.#computation;
  }

  get tree(): LogTree<D> {
    return tree(this.#computation);
  }

  get outcome(): Outcome<A, E> {
    return this.#computation.outcome;
  }

  /** The value of a successful trail; throws FailedComputationError otherwise. */
  getOrThrow(): A {
    return getOrThrow(this.#computation);
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  #derive<B>(computation: DescribedComputation<B, E, D>): Trail<B, E, D> {
    return new Trail(computation, this.#config);
  }

  #emitStep(stepOutcome: Outcome<unknown, E>): void {
    const events = this.#config.events;
    if (events === undefined) return;

    const timestamp = new Date().toISOString();
    events.emit(EVENT_STEP, { trail: this.#config.name, outcome: stepOutcome.kind, timestamp });
    if (stepOutcome.kind === 'failure') {
      this.#emitFailure(stepOutcome.reason, timestamp);
    }
  }

  #emitFailure(reason: E, timestamp: string): void {
    this.#config.events?.emit(EVENT_FAILURE, { trail: this.#config.name, reason, timestamp });
  }

  #emitSkipped(): void {
    this.#config.events?.emit(EVENT_SKIPPED, {
      trail: this.#config.name,
      timestamp: new Date().toISOString(),
    });
  }
}
