// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Failure, Outcome, Success } from './types.js';

export function success<A>(value: A): Success<A> {
  return { kind: 'success', value };
}

export function failure<E>(reason: E): Failure<E> {
  return { kind: 'failure', reason };
}

export function isSuccess<A, E>(outcome: Outcome<A, E>): outcome is Success<A> {
  return outcome.kind === 'success';
}

export function isFailure<A, E>(outcome: Outcome<A, E>): outcome is Failure<E> {
  return outcome.kind === 'failure';
}

/** Handlers for both branches of an outcome. */
export interface OutcomeHandlers<A, E, R> {
  readonly success: (value: A) => R;
  readonly failure: (reason: E) => R;
}

/** Folds an outcome into a single value by handling both branches. */
export function matchOutcome<A, E, R>(
  outcome: Outcome<A, E>,
  handlers: OutcomeHandlers<A, E, R>,
): R {
  return outcome.kind === 'success'
    ? handlers.success(outcome.value)
    : handlers.failure(outcome.reason);
}

/** Transforms a success value; a failure is returned unchanged. */
export function mapOutcome<A, B>(outcome: Success<A>, fn: (value: A) => B): Success<B>;
export function mapOutcome<A, B, E>(outcome: Outcome<A, E>, fn: (value: A) => B): Outcome<B, E>;
export function mapOutcome<A, B, E>(
  outcome: Outcome<A, E>,
  fn: (value: A) => B,
): Outcome<B, E> {
  return outcome.kind === 'success' ? success(fn(outcome.value)) : outcome;
}
