// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { InvalidConfigError, InvalidLogTreeError } from '../src/errors.js';
import { TrailEventEmitter } from '../src/events.js';
import { parseLogTree, parseTrailConfig } from '../src/schema.js';
import { described, undescribed } from '../src/tree.js';

describe('parseLogTree', () => {
  it('accepts a nested tree and returns it typed', () => {
    const raw: unknown = JSON.parse(
      JSON.stringify(
        undescribed([described('Validate', [described('Symbol known')]), described('Book')]),
      ),
    );
    expect(parseLogTree(raw)).toEqual(
      undescribed([described('Validate', [described('Symbol known')]), described('Book')]),
    );
  });

  it('rejects the empty identity at the root', () => {
    expect(() => parseLogTree({ kind: 'empty' })).toThrow(InvalidLogTreeError);
  });

  it('rejects the empty identity nested inside a node', () => {
    const raw = { kind: 'undescribed', children: [{ kind: 'empty' }] };
    expect(() => parseLogTree(raw)).toThrow(InvalidLogTreeError);
  });

  it('rejects extra keys', () => {
    const raw = { kind: 'described', description: 'Book', children: [], level: 'info' };
    expect(() => parseLogTree(raw)).toThrow(InvalidLogTreeError);
  });

  it('reports the INVALID_LOG_TREE code', () => {
    try {
      parseLogTree('not a tree');
      expect.unreachable('parseLogTree should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidLogTreeError);
      if (!(error instanceof InvalidLogTreeError)) return;
      expect(error.code).toBe('INVALID_LOG_TREE');
      expect(error.details.length).toBeGreaterThan(0);
    }
  });
});

describe('parseTrailConfig', () => {
  it('defaults the trail name', () => {
    expect(parseTrailConfig({})).toEqual({ name: 'trail' });
  });

  it('keeps a supplied emitter by reference', () => {
    const events = new TrailEventEmitter();
    const config = parseTrailConfig({ name: 'settlement', events });
    expect(config.name).toBe('settlement');
    expect(config.events).toBe(events);
  });

  it('rejects an empty name', () => {
    try {
      parseTrailConfig({ name: '' });
      expect.unreachable('parseTrailConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigError);
      if (!(error instanceof InvalidConfigError)) return;
      expect(error.code).toBe('INVALID_CONFIG');
      expect(error.details).toEqual(['name: String must contain at least 1 character(s)']);
    }
  });

  it('rejects an events value that is not a TrailEventEmitter', () => {
    try {
      parseTrailConfig({ events: { emit: () => true } });
      expect.unreachable('parseTrailConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigError);
      if (!(error instanceof InvalidConfigError)) return;
      expect(error.details).toHaveLength(1);
      expect(error.details[0]?.startsWith('events: ')).toBe(true);
    }
  });
});
