// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { InvalidConfigError, InvalidLogTreeError } from './errors.js';
import { TrailEventEmitter } from './events.js';
import type { LogTree } from './types.js';

// ---------------------------------------------------------------------------
// Log tree
// ---------------------------------------------------------------------------

/**
 * Zod schema for a finished, string-described log tree.
 *
 * The empty identity is rejected at every depth: it only exists while a
 * computation is being built.
 */
export const LogTreeSchema: z.ZodType<LogTree<string>> = z.lazy(() =>
  z.union([
    z
      .object({
        kind: z.literal('described'),
        description: z.string(),
        children: z.array(LogTreeSchema),
      })
      .strict(),
    z
      .object({
        kind: z.literal('undescribed'),
        children: z.array(LogTreeSchema),
      })
      .strict(),
  ]),
);

/**
 * Validate an untrusted value as a log tree, throwing InvalidLogTreeError
 * with one entry per issue on failure.
 */
export function parseLogTree(raw: unknown): LogTree<string> {
  const result = LogTreeSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidLogTreeError(formatIssues(result.error));
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Trail config
// ---------------------------------------------------------------------------

/**
 * Zod schema for the configuration accepted by `Trail`.
 */
export const TrailConfigSchema = z.object({
  /** Name reported in every event the trail emits.  Defaults to "trail". */
  name: z.string().min(1).default('trail'),
  /** Optional emitter notified as steps run, fail or are skipped. */
  events: z.instanceof(TrailEventEmitter).optional(),
});

export type TrailConfig = z.infer<typeof TrailConfigSchema>;

/** Input accepted wherever a trail configuration is expected. */
export type TrailConfigInput = z.input<typeof TrailConfigSchema>;

/**
 * Parse and validate a raw trail configuration, throwing InvalidConfigError
 * on failure.
 */
export function parseTrailConfig(raw: unknown): TrailConfig {
  const result = TrailConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error));
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}
