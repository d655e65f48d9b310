// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect, vi } from 'vitest';
import {
  bind,
  bindAsync,
  failureLeaf,
  getOrThrow,
  leaf,
  map,
  outcome,
  pure,
  traverse,
  traverseAsync,
  tree,
} from '../src/computation.js';
import { FailedComputationError } from '../src/errors.js';
import { failure, success } from '../src/outcome.js';
import { EMPTY_TREE, described, undescribed } from '../src/tree.js';
import type { DescribedComputation } from '../src/types.js';

// ── Helpers ───────────────────────────────────────────────────────────────────

function delayed<T>(value: T, ms: number): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

function priceOf(symbol: string): DescribedComputation<number> {
  return symbol === 'HALT'
    ? failureLeaf(`${symbol} is halted`, `Price lookup for ${symbol}`)
    : leaf(symbol.length * 10, `Price lookup for ${symbol}`);
}

// ── Tests ─────────────────────────────────────────────────────────────────────

describe('constructors', () => {
  it('leaf records one described node and a success', () => {
    expect(leaf(3, 'Got a 3')).toEqual({ log: described('Got a 3'), outcome: success(3) });
  });

  it('failureLeaf records one described node and a failure', () => {
    expect(failureLeaf('bar unavailable', 'Get bar')).toEqual({
      log: described('Get bar'),
      outcome: failure('bar unavailable'),
    });
  });

  it('pure records nothing', () => {
    expect(pure(7)).toEqual({ log: EMPTY_TREE, outcome: success(7) });
  });
});

describe('bind', () => {
  it('appends the next step and takes its outcome', () => {
    const result = bind(leaf(3, 'Got a 3'), (a) => leaf(a + 2, 'Got a 5'));
    expect(tree(result)).toEqual(undescribed([described('Got a 3'), described('Got a 5')]));
    expect(outcome(result)).toEqual(success(5));
  });

  it('records the failing step and takes its failure', () => {
    const result = bind(leaf(3, 'Got a 3'), () => failureLeaf('bar unavailable', 'Get bar'));
    expect(tree(result)).toEqual(undescribed([described('Got a 3'), described('Get bar')]));
    expect(outcome(result)).toEqual(failure('bar unavailable'));
  });

  it('does not invoke the next step after a failure', () => {
    const first = failureLeaf<number>('foo unavailable', 'Get foo');
    const next = vi.fn((value: number) => leaf(value, 'Got bar'));
    const then = vi.fn((value: number) => leaf(value, 'Got baz'));

    const result = bind(bind(first, next), then);

    expect(next).not.toHaveBeenCalled();
    expect(then).not.toHaveBeenCalled();
    expect(result.log).toEqual(first.log);
    expect(tree(result)).toEqual(tree(first));
    expect(outcome(result)).toEqual(failure('foo unavailable'));
  });

  it('has pure as a left identity', () => {
    const step = (n: number) => leaf(n * 2, `Doubled ${n}`);
    expect(bind(pure(4), step)).toEqual(step(4));
  });

  it('has pure as a right identity', () => {
    const samples: DescribedComputation<number>[] = [
      pure(1),
      leaf(2, 'Got a 2'),
      failureLeaf('lost', 'Lookup'),
      bind(leaf(3, 'Got a 3'), (n) => leaf(n + 1, 'Incremented')),
    ];
    for (const sample of samples) {
      expect(bind(sample, (value) => pure(value))).toEqual(sample);
    }
  });

  it('is associative', () => {
    const start = leaf(2, 'Start');
    const f = (n: number) => bind(leaf(n + 1, 'Add one'), (m) => leaf(m * 3, 'Triple'));
    const g = (n: number) => leaf(n - 4, 'Subtract four');

    const nestedLeft = bind(bind(start, f), g);
    const nestedRight = bind(start, (n) => bind(f(n), g));

    expect(nestedLeft).toEqual(nestedRight);
    expect(outcome(nestedLeft)).toEqual(success(5));
  });
});

describe('map', () => {
  it('transforms the value without adding a node', () => {
    const result = map(leaf(3, 'Got a 3'), (n) => n * 5);
    expect(result).toEqual({ log: described('Got a 3'), outcome: success(15) });
  });

  it('does not call the transform after a failure', () => {
    const transform = vi.fn((n: number) => n + 1);
    const failed = failureLeaf<number>('no quote', 'Quote');
    expect(map(failed, transform)).toEqual(failed);
    expect(transform).not.toHaveBeenCalled();
  });
});

describe('bindAsync', () => {
  it('keeps chained order even when a later step resolves first', async () => {
    const slow = await bindAsync(pure<number>(1), async (n) => delayed(leaf(n, 'Slow step'), 20));
    const result = await bindAsync(slow, async (n) => delayed(leaf(n + 1, 'Fast step'), 1));

    expect(tree(result)).toEqual(undescribed([described('Slow step'), described('Fast step')]));
    expect(outcome(result)).toEqual(success(2));
  });

  it('accepts a synchronous step', async () => {
    const result = await bindAsync(leaf(1, 'One'), (n) => leaf(n + 1, 'Two'));
    expect(outcome(result)).toEqual(success(2));
  });

  it('resolves a failed computation without invoking the step', async () => {
    const step = vi.fn(async (n: number) => leaf(n, 'Never'));
    const failed = failureLeaf<number>('settlement closed', 'Open settlement window');

    const result = await bindAsync(failed, step);

    expect(step).not.toHaveBeenCalled();
    expect(result).toEqual(failed);
  });
});

describe('traverse', () => {
  it('runs every item in order and collects the values', () => {
    const result = traverse(['AB', 'CDE'], priceOf);
    expect(tree(result)).toEqual(
      undescribed([described('Price lookup for AB'), described('Price lookup for CDE')]),
    );
    expect(outcome(result)).toEqual(success([20, 30]));
  });

  it('stops at the first failure', () => {
    const lookup = vi.fn(priceOf);
    const result = traverse(['AB', 'HALT', 'CDE'], lookup);

    expect(lookup).toHaveBeenCalledTimes(2);
    expect(tree(result)).toEqual(
      undescribed([described('Price lookup for AB'), described('Price lookup for HALT')]),
    );
    expect(outcome(result)).toEqual(failure('HALT is halted'));
  });

  it('passes the index of each item', () => {
    const result = traverse(['a', 'b'], (item, index) => leaf(`${index}:${item}`, `Item ${index}`));
    expect(outcome(result)).toEqual(success(['0:a', '1:b']));
  });

  it('returns pure of an empty list for no items', () => {
    expect(traverse([], priceOf)).toEqual(pure([]));
  });
});

describe('traverseAsync', () => {
  it('awaits each step before starting the next', async () => {
    const started: string[] = [];
    const result = await traverseAsync(['first', 'second'], async (item, index) => {
      started.push(item);
      return delayed(leaf(item, `Handled ${item}`), index === 0 ? 15 : 1);
    });

    expect(started).toEqual(['first', 'second']);
    expect(tree(result)).toEqual(
      undescribed([described('Handled first'), described('Handled second')]),
    );
    expect(outcome(result)).toEqual(success(['first', 'second']));
  });

  it('stops at the first failure', async () => {
    const lookup = vi.fn(async (symbol: string) => priceOf(symbol));
    const result = await traverseAsync(['HALT', 'AB'], lookup);

    expect(lookup).toHaveBeenCalledTimes(1);
    expect(tree(result)).toEqual(described('Price lookup for HALT'));
    expect(outcome(result)).toEqual(failure('HALT is halted'));
  });
});

describe('extraction', () => {
  it('tree never returns the empty identity', () => {
    expect(tree(pure(1))).toEqual(undescribed([]));
  });

  it('getOrThrow returns the value of a success', () => {
    expect(getOrThrow(leaf('filled', 'Order filled'))).toBe('filled');
  });

  it('getOrThrow throws FailedComputationError carrying the reason and tree', () => {
    const failed = bind(leaf(1, 'Reserve cash'), () => failureLeaf('insufficient funds', 'Debit'));
    try {
      getOrThrow(failed);
      expect.unreachable('getOrThrow should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(FailedComputationError);
      if (!(error instanceof FailedComputationError)) return;
      expect(error.code).toBe('FAILED_COMPUTATION');
      expect(error.message).toBe('Computation failed: insufficient funds');
      expect(error.reason).toBe('insufficient funds');
      expect(error.tree).toEqual(undescribed([described('Reserve cash'), described('Debit')]));
    }
  });

  it('getOrThrow formats a reason that cannot be converted to a string', () => {
    const reason: object = Object.create(null);
    try {
      getOrThrow(failureLeaf(reason, 'Load venue'));
      expect.unreachable('getOrThrow should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(FailedComputationError);
      if (!(error instanceof FailedComputationError)) return;
      expect(error.message).toBe('Computation failed: [object Object]');
      expect(error.reason).toBe(reason);
      expect(error.tree).toEqual(described('Load venue'));
    }
  });
});
