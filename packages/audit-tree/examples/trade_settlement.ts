// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * trade_settlement.ts: Demonstrates an explainable settlement pipeline.
 *
 * Shows how to:
 * - Record each pipeline step as a described leaf
 * - Chain steps so a failure stops the pipeline and is still recorded
 * - Caption whole sub-computations and batches
 * - Observe a trail through its event emitter
 *
 * Run: npx tsx packages/audit-tree/examples/trade_settlement.ts
 */

import {
  EVENT_FAILURE,
  Trail,
  TrailEventEmitter,
  bind,
  failureLeaf,
  labelEach,
  leaf,
  pure,
  tree,
} from '../src/index.js';
import type { DescribedComputation, LogTree } from '../src/index.js';

interface Trade {
  readonly id: string;
  readonly symbol: string;
  readonly quantity: number;
  readonly price: number;
}

const CASH_AVAILABLE = 50_000;

const events = new TrailEventEmitter();
events.on(EVENT_FAILURE, (payload) => {
  console.log(`[${payload.trail}] stopped: ${String(payload.reason)}`);
});

function validate(trade: Trade): DescribedComputation<Trade> {
  return trade.quantity > 0
    ? leaf(trade, `Quantity ${trade.quantity} is positive`)
    : failureLeaf(`quantity must be positive, got ${trade.quantity}`, 'Validate quantity');
}

function reserveCash(trade: Trade): DescribedComputation<number> {
  const notional = trade.quantity * trade.price;
  return notional <= CASH_AVAILABLE
    ? leaf(notional, `Reserved ${notional} of ${CASH_AVAILABLE} available`)
    : failureLeaf(`notional ${notional} exceeds available cash`, 'Reserve cash');
}

function settle(trade: Trade): Trail<string> {
  const config = { name: trade.id, events };
  return Trail.leaf(trade, `Received ${trade.id} for ${trade.symbol}`, config)
    .andThen(validate)
    .andThen((valid) => bind(reserveCash(valid), (notional) => pure({ valid, notional })))
    .andThen(({ valid, notional }) => leaf(`${valid.id}:${notional}`, 'Booked to ledger'))
    .caption(`Settle ${trade.id}`);
}

/** Indented rendering for the console; not part of the library. */
function render(node: LogTree, depth = 0): string[] {
  const pad = '  '.repeat(depth);
  if (node.kind === 'undescribed') {
    return node.children.flatMap((child) => render(child, depth));
  }
  return [
    `${pad}- ${node.description}`,
    ...node.children.flatMap((child) => render(child, depth + 1)),
  ];
}

function main(): void {
  console.log('=== Trade Settlement Example ===\n');

  const trades: Trade[] = [
    { id: 'T-1', symbol: 'ACME', quantity: 100, price: 12.5 },
    { id: 'T-2', symbol: 'GLOBX', quantity: 0, price: 40 },
    { id: 'T-3', symbol: 'INITech', quantity: 5_000, price: 20 },
  ];

  for (const trade of trades) {
    const result = settle(trade);
    console.log(render(result.tree).join('\n'));
    console.log(`  => ${JSON.stringify(result.outcome)}\n`);
  }

  const batch = labelEach(
    trades.slice(0, 1),
    (trade) => settle(trade).computation,
    'Settle morning batch',
  );
  console.log(render(tree(batch)).join('\n'));
}

main();
