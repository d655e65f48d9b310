// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Description, LogTree } from './types.js';

/**
 * Base class for all audit-tree errors.
 *
 * Sequencing never throws: a failed step is an ordinary `Failure` outcome.
 * These errors are raised only where a caller leaves the algebra, by
 * unwrapping a result or by validating untrusted input.
 */
export class AuditTreeError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'AuditTreeError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when the value of a failed computation is unwrapped.
 *
 * Carries the failure reason and the finished tree so the caller can still
 * report every step that was attempted.
 */
export class FailedComputationError<E = unknown, D = Description> extends AuditTreeError {
  readonly reason: E;
  readonly tree: LogTree<D>;

  constructor(reason: E, tree: LogTree<D>) {
    super('FAILED_COMPUTATION', `Computation failed: ${formatReason(reason)}`);
    this.name = 'FailedComputationError';
    this.reason = reason;
    this.tree = tree;
  }
}

/**
 * Thrown when a value does not have the shape of a finished log tree.
 *
 * `details` carries one `path: message` entry per validation issue.
 */
export class InvalidLogTreeError extends AuditTreeError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_LOG_TREE', `Log tree is invalid: ${details.join('; ')}`);
    this.name = 'InvalidLogTreeError';
    this.details = details;
  }
}

/** Thrown when trail configuration is structurally or semantically invalid. */
export class InvalidConfigError extends AuditTreeError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIG', `Trail configuration is invalid: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.details = details;
  }
}

function formatReason(reason: unknown): string {
  if (typeof reason === 'string') return reason;
  if (reason instanceof Error) return reason.message;
  try {
    return String(reason);
  } catch {
    // Objects without a usable toString, e.g. Object.create(null).
    return Object.prototype.toString.call(reason);
  }
}
