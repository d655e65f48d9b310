// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * audit-tree: hierarchical audit trails built as a side effect of composing
 * computations that can fail.
 *
 * Public API surface:
 *
 *   Log trees
 *     EMPTY_TREE, described, undescribed, combine, combineAll, isEmptyTree,
 *     finalizeTree, wrapChildren, treeChildren, descriptions
 *
 *   Outcomes
 *     success, failure, isSuccess, isFailure, matchOutcome, mapOutcome
 *
 *   Described computations
 *     leaf, failureLeaf, pure: constructors
 *     bind, map, bindAsync: sequencing
 *     traverse, traverseAsync: ordered sequencing over lists
 *     tree, outcome, getOrThrow: extraction
 *
 *   Labeling
 *     labelValue, labelOutcome, labelBlock, labelEach
 *
 *   Trail builder
 *     Trail: fluent wrapper with optional lifecycle events
 *
 *   Events
 *     TrailEventEmitter, EVENT_STEP, EVENT_FAILURE, EVENT_SKIPPED
 *
 *   Validation (Zod schemas)
 *     LogTreeSchema, parseLogTree, TrailConfigSchema, parseTrailConfig
 *
 *   Errors
 *     AuditTreeError, FailedComputationError, InvalidLogTreeError, InvalidConfigError
 */

// Types
export type {
  Description,
  DescribedNode,
  UndescribedNode,
  LogTree,
  EmptyTree,
  TreeAccumulator,
  Success,
  Failure,
  Outcome,
  DescribedComputation,
} from './types.js';

// Log trees
export {
  EMPTY_TREE,
  described,
  undescribed,
  combine,
  combineAll,
  isEmptyTree,
  finalizeTree,
  wrapChildren,
  treeChildren,
  descriptions,
} from './tree.js';

// Outcomes
export {
  success,
  failure,
  isSuccess,
  isFailure,
  matchOutcome,
  mapOutcome,
} from './outcome.js';
export type { OutcomeHandlers } from './outcome.js';

// Described computations
export {
  leaf,
  failureLeaf,
  pure,
  bind,
  map,
  bindAsync,
  traverse,
  traverseAsync,
  tree,
  outcome,
  getOrThrow,
} from './computation.js';

// Labeling
export { labelValue, labelOutcome, labelBlock, labelEach } from './label.js';

// Trail builder
export { Trail } from './trail.js';

// Events
export {
  TrailEventEmitter,
  EVENT_STEP,
  EVENT_FAILURE,
  EVENT_SKIPPED,
} from './events.js';
export type {
  TrailEventName,
  TrailEventListener,
  TrailEventPayloadMap,
  TrailStepEventPayload,
  TrailFailureEventPayload,
  TrailSkippedEventPayload,
} from './events.js';

// Validation
export {
  LogTreeSchema,
  parseLogTree,
  TrailConfigSchema,
  parseTrailConfig,
} from './schema.js';
export type { TrailConfig, TrailConfigInput } from './schema.js';

// Errors
export {
  AuditTreeError,
  FailedComputationError,
  InvalidLogTreeError,
  InvalidConfigError,
} from './errors.js';
