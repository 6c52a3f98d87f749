import { describe, it, expect } from 'vitest';
import { RoutingInvariantError } from '@/core/errors.js';
import { computeShortestPaths, nextHop } from '@/core/routing/shortest-path.js';
import type { LsaTable } from '@/core/routing/types.js';

const table = (entries: Record<string, Record<string, number>>): LsaTable =>
  new Map(
    Object.entries(entries).map(([router, links]) => [router, new Map(Object.entries(links))])
  );

describe('computeShortestPaths', () => {
  it('should prefer the cheaper two-hop path over an expensive direct link', () => {
    const lsas = table({
      S: { A: 1, B: 5 },
      A: { S: 1, B: 1 },
      B: { S: 5, A: 1 },
    });

    const { distances, previous } = computeShortestPaths('S', lsas);

    expect(Object.fromEntries(distances)).toEqual({ S: 0, A: 1, B: 2 });
    expect(previous.get('A')).toBe('S');
    expect(previous.get('B')).toBe('A');
    expect(previous.has('S')).toBe(false);
  });

  it('should omit routers that cannot be reached', () => {
    const lsas = table({
      S: { A: 1 },
      A: { S: 1 },
      Z: {},
    });

    const { distances, previous } = computeShortestPaths('S', lsas);

    expect(distances.has('Z')).toBe(false);
    expect(previous.has('Z')).toBe(false);
  });

  it('should only treat originators as nodes', () => {
    const lsas = table({
      S: { A: 1, Q: 2 },
      A: { S: 1 },
    });

    const { distances } = computeShortestPaths('S', lsas);

    expect(Array.from(distances.keys()).sort()).toEqual(['A', 'S']);
  });

  it('should handle zero-cost links', () => {
    const lsas = table({
      S: { A: 0 },
      A: { S: 0, B: 0 },
      B: { A: 0 },
    });

    const { distances, previous } = computeShortestPaths('S', lsas);

    expect(distances.get('B')).toBe(0);
    expect(nextHop('S', 'B', previous)).toBe('A');
  });

  it('should report the cost of equal-cost paths without fixing the route', () => {
    const lsas = table({
      n1: { n2: 2, n4: 2 },
      n2: { n1: 2, n3: 2 },
      n3: { n2: 2, n4: 2 },
      n4: { n3: 2, n1: 2 },
    });

    const { distances, previous } = computeShortestPaths('n1', lsas);

    expect(distances.get('n3')).toBe(4);
    expect(['n2', 'n4']).toContain(nextHop('n1', 'n3', previous));
  });
});

describe('nextHop', () => {
  it('should return the destination itself for a direct neighbor', () => {
    const previous = new Map([['A', 'S']]);

    expect(nextHop('S', 'A', previous)).toBe('A');
  });

  it('should walk a long predecessor chain back to the source', () => {
    const previous = new Map([
      ['b', 'a'],
      ['c', 'b'],
      ['d', 'c'],
    ]);

    expect(nextHop('a', 'd', previous)).toBe('b');
  });

  it('should refuse the source as destination', () => {
    expect(() => nextHop('S', 'S', new Map())).toThrow(RoutingInvariantError);
  });

  it('should refuse a destination without a predecessor', () => {
    expect(() => nextHop('S', 'Z', new Map([['A', 'S']]))).toThrow(/No predecessor recorded for Z/);
  });

  it('should fail fast on a cyclic predecessor chain', () => {
    const previous = new Map([
      ['B', 'C'],
      ['C', 'B'],
    ]);

    expect(() => nextHop('S', 'B', previous)).toThrow(/cycles/);
  });
});
