// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * audit-tree benchmark.
 *
 * Runs the standard composition scenarios and writes a JSON results object
 * to stdout. No external benchmark framework; uses node:perf_hooks only.
 *
 * Usage:
 *   npm run bench > results/typescript.json
 */

import { performance } from 'node:perf_hooks';
import {
  EMPTY_TREE,
  bind,
  combine,
  described,
  failureLeaf,
  labelBlock,
  leaf,
  pure,
  traverse,
  undescribed,
} from '../../packages/audit-tree/src/index.js';
import type { DescribedComputation } from '../../packages/audit-tree/src/index.js';

// ─── Types ───────────────────────────────────────────────────────────────────

interface ScenarioResult {
  readonly name: string;
  readonly iterations: number;
  readonly ops_per_sec: number;
  readonly mean_ns: number;
  readonly stdev_ns: number;
}

interface BenchmarkReport {
  readonly language: 'typescript';
  readonly runtime: string;
  readonly timestamp: string;
  readonly scenarios: readonly ScenarioResult[];
}

type BenchmarkFn = () => void;

// ─── Timing helpers ───────────────────────────────────────────────────────────

const WARMUP_ROUNDS = 500;
/** Calls per timed batch; one perf_hooks reading per batch, not per call. */
const BATCH_SIZE = 100;

/** Mean and population standard deviation of per-call batch timings. */
function summarize(batchNs: readonly number[]): { mean: number; stdev: number } {
  let total = 0;
  let totalSquares = 0;
  for (const ns of batchNs) {
    total += ns;
    totalSquares += ns * ns;
  }
  const mean = total / batchNs.length;
  const variance = Math.max(0, totalSquares / batchNs.length - mean * mean);
  return { mean, stdev: Math.sqrt(variance) };
}

function runScenario(name: string, iterations: number, fn: BenchmarkFn): ScenarioResult {
  for (let round = 0; round < WARMUP_ROUNDS; round++) fn();

  const batches = Math.max(1, Math.ceil(iterations / BATCH_SIZE));
  const perCallNs: number[] = [];
  for (let batch = 0; batch < batches; batch++) {
    const startedAt = performance.now();
    for (let call = 0; call < BATCH_SIZE; call++) fn();
    perCallNs.push(((performance.now() - startedAt) * 1e6) / BATCH_SIZE);
  }

  const { mean, stdev } = summarize(perCallNs);
  return {
    name,
    iterations: batches * BATCH_SIZE,
    ops_per_sec: mean === 0 ? 0 : Math.round(1e9 / mean),
    mean_ns: Math.round(mean),
    stdev_ns: Math.round(stdev),
  };
}

// ─── Standard scenarios ───────────────────────────────────────────────────────

const ITERATIONS = 100_000;
const CHAIN_LENGTH = 50;

function benchCombine(): ScenarioResult {
  const left = undescribed([described('Quote fetched'), described('Limit checked')]);
  const right = described('Trade booked');

  return runScenario('combine', ITERATIONS, () => {
    combine(combine(EMPTY_TREE, left), right);
  });
}

function benchBindChain(): ScenarioResult {
  return runScenario('bind_chain', ITERATIONS / 10, () => {
    let comp: DescribedComputation<number> = pure(0);
    for (let step = 0; step < CHAIN_LENGTH; step++) {
      comp = bind(comp, (n) => leaf(n + 1, 'Incremented'));
    }
  });
}

function benchShortCircuit(): ScenarioResult {
  return runScenario('short_circuit', ITERATIONS / 10, () => {
    let comp: DescribedComputation<number> = failureLeaf('halted', 'Open market');
    for (let step = 0; step < CHAIN_LENGTH; step++) {
      comp = bind(comp, (n) => leaf(n + 1, 'Never runs'));
    }
  });
}

function benchLabeledTraverse(): ScenarioResult {
  const amounts = Array.from({ length: CHAIN_LENGTH }, (_, index) => index * 100);

  return runScenario('labeled_traverse', ITERATIONS / 10, () => {
    labelBlock(
      traverse(amounts, (amount) => leaf(amount, 'Settled')),
      'Settle batch',
    );
  });
}

// ─── Entry point ─────────────────────────────────────────────────────────────

function main(): void {
  const scenarios: ScenarioResult[] = [
    benchCombine(),
    benchBindChain(),
    benchShortCircuit(),
    benchLabeledTraverse(),
  ];

  const report: BenchmarkReport = {
    language: 'typescript',
    runtime: `node-${process.version}`,
    timestamp: new Date().toISOString(),
    scenarios,
  };

  process.stdout.write(JSON.stringify(report, null, 2) + '\n');
}

main();
