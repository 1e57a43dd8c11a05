import { describe, it, expect } from 'vitest';
import { TraversalEngine } from './traversal-engine.js';
import { failed, type CitationProvider } from '../../providers/provider.js';
import { NotFoundError, InvalidInputError } from '../../shared/errors.js';
import type { FetchFailure, NodeRecord, PaperMetadata, TraversalProgress } from '../../shared/types.js';
import { createGraph } from '../graph/citation-graph.js';

// --- Helpers ---

interface FakeWork {
  refs?: string[];
  citers?: string[];
  delayMs?: number;
}

function meta(id: string): PaperMetadata {
  return { title: `Title of ${id}`, authors: ['A. Author'], year: 2020, venue: 'Journal X', rawId: id };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function fakeProvider(works: Record<string, FakeWork>) {
  const forwardCalls: string[] = [];
  const backwardCalls: string[] = [];
  const provider: CitationProvider = {
    name: 'fake',
    async fetchForward(id) {
      forwardCalls.push(id);
      const work = works[id];
      if (work?.delayMs) await sleep(work.delayMs);
      if (!work) return failed(new NotFoundError(id, 'fake'));
      return { ok: true, metadata: meta(id), references: work.refs ?? [] };
    },
    async fetchBackward(id) {
      backwardCalls.push(id);
      const work = works[id];
      if (!work) return failed(new NotFoundError(id, 'fake'));
      return { ok: true, citers: work.citers ?? [] };
    },
  };
  return { provider, forwardCalls, backwardCalls };
}

describe('TraversalEngine', () => {
  it('expands one level in both directions and records failed boundary lookups', async () => {
    const { provider, backwardCalls } = fakeProvider({
      P0: { refs: ['P1', 'P2'], citers: ['P3'] },
    });
    const engine = new TraversalEngine(provider);

    const result = await engine.expand('P0', { maxDepth: 1 });

    expect([...result.graph.nodes.keys()]).toEqual(['P0', 'P1', 'P2', 'P3']);
    const root = result.graph.nodes.get('P0');
    expect(root).toEqual({
      id: 'P0',
      metadata: meta('P0'),
      outgoingRefs: ['P1', 'P2'],
      incomingCiters: ['P3'],
      depth: 0,
    });
    for (const id of ['P1', 'P2', 'P3']) {
      expect(result.graph.nodes.get(id)).toEqual({
        id,
        metadata: null,
        outgoingRefs: [],
        incomingCiters: [],
        depth: 1,
      });
    }
    expect(result.failures.map((f) => [f.id, f.direction, f.reason])).toEqual([
      ['P1', 'forward', 'not_found'],
      ['P2', 'forward', 'not_found'],
      ['P3', 'forward', 'not_found'],
    ]);
    expect(backwardCalls).toEqual(['P0']);
    expect(result.aborted).toBe(false);
    expect(result.stats).toMatchObject({ visited: 4, fetched: 4, reused: 0, failedNodes: 3, boundary: 3 });
  });

  it('records a node reachable two ways at its shortest distance and fetches it once', async () => {
    const { provider, forwardCalls } = fakeProvider({
      A: { refs: ['B'], citers: ['C'] },
      B: { refs: ['C'] },
      C: {},
    });
    const engine = new TraversalEngine(provider);

    const result = await engine.expand('A', { maxDepth: 2 });

    expect(result.graph.nodes.get('C')?.depth).toBe(1);
    expect(result.graph.nodes.get('B')?.outgoingRefs).toEqual(['C']);
    expect(forwardCalls.filter((id) => id === 'C')).toHaveLength(1);
    expect(result.graph.nodes.size).toBe(3);
  });

  it('leaves boundary nodes without neighbours and skips their backward lookup', async () => {
    const { provider, backwardCalls } = fakeProvider({
      R: { refs: ['X'] },
      X: { refs: ['Y', 'Z'], citers: ['W'] },
    });
    const engine = new TraversalEngine(provider);

    const result = await engine.expand('R', { maxDepth: 1 });

    expect(result.graph.nodes.get('X')).toEqual({
      id: 'X',
      metadata: meta('X'),
      outgoingRefs: [],
      incomingCiters: [],
      depth: 1,
    });
    expect(backwardCalls).toEqual(['R']);
    expect(result.failures).toEqual([]);
  });

  it('keeps every node within the depth bound', async () => {
    const { provider } = fakeProvider({
      a: { refs: ['b'] },
      b: { refs: ['c'] },
      c: { refs: ['d'] },
      d: { refs: ['e'] },
    });
    const engine = new TraversalEngine(provider);

    const result = await engine.expand('a', { maxDepth: 2 });

    expect([...result.graph.nodes.values()].map((r) => [r.id, r.depth])).toEqual([
      ['a', 0],
      ['b', 1],
      ['c', 2],
    ]);
  });

  it('visits only the root at depth zero', async () => {
    const { provider, backwardCalls } = fakeProvider({ R: { refs: ['X'], citers: ['Y'] } });
    const result = await new TraversalEngine(provider).expand('R', { maxDepth: 0 });

    expect(result.graph.nodes.get('R')).toEqual({
      id: 'R',
      metadata: meta('R'),
      outgoingRefs: [],
      incomingCiters: [],
      depth: 0,
    });
    expect(backwardCalls).toEqual([]);
  });

  it('removes duplicate identifiers from neighbour lists', async () => {
    const { provider } = fakeProvider({ R: { refs: ['X', 'X', 'Y'], citers: ['Y', 'Y'] } });
    const result = await new TraversalEngine(provider).expand('R', { maxDepth: 1 });

    expect(result.graph.nodes.get('R')?.outgoingRefs).toEqual(['X', 'Y']);
    expect(result.graph.nodes.get('R')?.incomingCiters).toEqual(['Y']);
    expect([...result.graph.nodes.keys()]).toEqual(['R', 'X', 'Y']);
  });

  it('commits nodes in discovery order regardless of fetch timing', async () => {
    const { provider } = fakeProvider({
      R: { refs: ['slow', 'medium', 'fast'] },
      slow: { delayMs: 30 },
      medium: { delayMs: 15 },
      fast: {},
    });
    const result = await new TraversalEngine(provider).expand('R', { maxDepth: 1, concurrency: 3 });

    expect([...result.graph.nodes.keys()]).toEqual(['R', 'slow', 'medium', 'fast']);
  });

  it('contains a throwing adapter to the node being fetched', async () => {
    const provider: CitationProvider = {
      name: 'flaky',
      async fetchForward(id) {
        if (id === 'bad') throw new Error('socket hang up');
        return { ok: true, metadata: meta(id), references: id === 'R' ? ['bad', 'good'] : [] };
      },
      async fetchBackward() {
        return { ok: true, citers: [] };
      },
    };

    const result = await new TraversalEngine(provider).expand('R', { maxDepth: 1 });

    expect(result.graph.nodes.get('bad')?.metadata).toBeNull();
    expect(result.graph.nodes.get('good')?.metadata).toEqual(meta('good'));
    expect(result.failures).toEqual([
      {
        id: 'bad',
        direction: 'forward',
        reason: 'unavailable',
        message: 'Provider unavailable for bad: socket hang up',
      },
    ]);
  });

  it('keeps the other direction when one lookup fails', async () => {
    const provider: CitationProvider = {
      name: 'half',
      async fetchForward(id) {
        return failed(new NotFoundError(id, 'half'));
      },
      async fetchBackward() {
        return { ok: true, citers: ['C1'] };
      },
    };

    const result = await new TraversalEngine(provider).expand('R', { maxDepth: 1 });

    expect(result.graph.nodes.get('R')).toMatchObject({ metadata: null, outgoingRefs: [], incomingCiters: ['C1'] });
    expect(result.graph.nodes.has('C1')).toBe(true);
  });

  it('never runs more node lookups at once than the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const refs = ['n1', 'n2', 'n3', 'n4', 'n5', 'n6'];
    const provider: CitationProvider = {
      name: 'counting',
      async fetchForward(id) {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await sleep(5);
        inFlight--;
        return { ok: true, metadata: meta(id), references: id === 'R' ? refs : [] };
      },
      async fetchBackward() {
        return { ok: true, citers: [] };
      },
    };

    const result = await new TraversalEngine(provider).expand('R', { maxDepth: 1, concurrency: 2 });

    expect(peak).toBe(2);
    expect(result.graph.nodes.size).toBe(7);
  });

  it('fetches each identifier at most once across a dense graph', async () => {
    const { provider, forwardCalls, backwardCalls } = fakeProvider({
      a: { refs: ['b', 'c', 'd'], citers: ['c'] },
      b: { refs: ['c', 'd', 'a'] },
      c: { refs: ['d', 'b'], citers: ['a'] },
      d: { refs: ['a', 'b', 'c'] },
    });

    await new TraversalEngine(provider).expand('a', { maxDepth: 3, concurrency: 4 });

    expect([...forwardCalls].sort()).toEqual(['a', 'b', 'c', 'd']);
    expect([...backwardCalls].sort()).toEqual(['a', 'b', 'c', 'd']);
  });

  it('reuses every seed record without fetching', async () => {
    const works = {
      R: { refs: ['X', 'Y'], citers: ['Z'] },
      X: { refs: ['Y'] },
      Y: {},
    };
    const first = fakeProvider(works);
    const initial = await new TraversalEngine(first.provider).expand('R', { maxDepth: 2 });

    const second = fakeProvider(works);
    const resumed = await new TraversalEngine(second.provider).expand('R', {
      maxDepth: 2,
      seed: initial.graph,
    });

    expect(second.forwardCalls).toEqual([]);
    expect(second.backwardCalls).toEqual([]);
    expect([...resumed.graph.nodes.entries()]).toEqual([...initial.graph.nodes.entries()]);
    expect(resumed.stats.reused).toBe(initial.graph.nodes.size);
  });

  it('fetches only the part of the graph the seed lacks', async () => {
    const { provider, forwardCalls } = fakeProvider({
      R: { refs: ['X'] },
      X: { refs: ['Y'] },
      Y: {},
    });
    const seed = createGraph('R', 2);
    seed.nodes.set('R', { id: 'R', metadata: meta('R'), outgoingRefs: ['X'], incomingCiters: [], depth: 0 });

    const result = await new TraversalEngine(provider).expand('R', { maxDepth: 2, seed });

    expect(forwardCalls).toEqual(['X', 'Y']);
    expect(result.graph.nodes.get('Y')?.depth).toBe(2);
    expect(result.stats).toMatchObject({ fetched: 2, reused: 1 });
  });

  it('clears the neighbour lists of seed records that fall on the boundary', async () => {
    const { provider } = fakeProvider({});
    const seed = createGraph('R', 3);
    seed.nodes.set('R', { id: 'R', metadata: meta('R'), outgoingRefs: ['X'], incomingCiters: [], depth: 0 });
    seed.nodes.set('X', { id: 'X', metadata: meta('X'), outgoingRefs: ['Y'], incomingCiters: [], depth: 1 });

    const result = await new TraversalEngine(provider).expand('R', { maxDepth: 1, seed });

    expect(result.graph.nodes.get('X')).toEqual({
      id: 'X',
      metadata: meta('X'),
      outgoingRefs: [],
      incomingCiters: [],
      depth: 1,
    });
    expect(result.graph.nodes.has('Y')).toBe(false);
    expect(seed.nodes.get('X')?.outgoingRefs).toEqual(['Y']);
  });

  it('expands the boundary leaves of a shallower seed like a fresh run', async () => {
    const works = {
      R: { refs: ['A'] },
      A: { refs: ['B'], citers: ['C'] },
      B: {},
      C: {},
    };
    const fresh = await new TraversalEngine(fakeProvider(works).provider).expand('R', { maxDepth: 2 });
    const shallow = await new TraversalEngine(fakeProvider(works).provider).expand('R', { maxDepth: 1 });

    const second = fakeProvider(works);
    const resumed = await new TraversalEngine(second.provider).expand('R', {
      maxDepth: 2,
      seed: shallow.graph,
    });

    expect([...resumed.graph.nodes.keys()]).toEqual(['R', 'A', 'B', 'C']);
    expect([...resumed.graph.nodes.entries()]).toEqual([...fresh.graph.nodes.entries()]);
    expect(second.forwardCalls).toEqual(['A', 'B', 'C']);
    expect(second.backwardCalls).toEqual(['A']);
    expect(resumed.stats).toMatchObject({ fetched: 3, reused: 1 });
  });

  it('matches a fresh run without fetching when the seed went deeper', async () => {
    const works = {
      R: { refs: ['A'] },
      A: { refs: ['B'], citers: ['C'] },
      B: { refs: ['D'] },
      C: {},
      D: {},
    };
    const fresh = await new TraversalEngine(fakeProvider(works).provider).expand('R', { maxDepth: 2 });
    const deep = await new TraversalEngine(fakeProvider(works).provider).expand('R', { maxDepth: 3 });

    const second = fakeProvider(works);
    const resumed = await new TraversalEngine(second.provider).expand('R', {
      maxDepth: 2,
      seed: deep.graph,
    });

    expect(second.forwardCalls).toEqual([]);
    expect(second.backwardCalls).toEqual([]);
    expect([...resumed.graph.nodes.entries()]).toEqual([...fresh.graph.nodes.entries()]);
  });

  it('stops at the abort signal and discards lookups in flight', async () => {
    const controller = new AbortController();
    const provider: CitationProvider = {
      name: 'aborting',
      async fetchForward(id) {
        if (id === 'A') controller.abort();
        return { ok: true, metadata: meta(id), references: id === 'R' ? ['A', 'B'] : [] };
      },
      async fetchBackward() {
        return { ok: true, citers: [] };
      },
    };

    const result = await new TraversalEngine(provider).expand('R', {
      maxDepth: 2,
      concurrency: 1,
      signal: controller.signal,
    });

    expect(result.aborted).toBe(true);
    expect([...result.graph.nodes.keys()]).toEqual(['R']);
  });

  it('reports each settled node to the record and progress hooks', async () => {
    const { provider } = fakeProvider({ R: { refs: ['X'] } });
    const records: Array<[NodeRecord, FetchFailure[]]> = [];
    const progress: TraversalProgress[] = [];

    await new TraversalEngine(provider).expand('R', {
      maxDepth: 1,
      onRecord: (record, failures) => records.push([record, failures]),
      onProgress: (p) => progress.push(p),
    });

    expect(records.map(([r, f]) => [r.id, f.length])).toEqual([
      ['R', 0],
      ['X', 1],
    ]);
    expect(progress).toEqual([
      { visited: 1, failed: 0, depth: 0, pending: 0 },
      { visited: 2, failed: 1, depth: 1, pending: 0 },
    ]);
  });

  describe('input validation', () => {
    const { provider } = fakeProvider({});
    const engine = new TraversalEngine(provider);

    it('rejects an empty root', async () => {
      await expect(engine.expand('  ', { maxDepth: 1 })).rejects.toThrow(InvalidInputError);
    });

    it('rejects a negative or fractional depth', async () => {
      await expect(engine.expand('R', { maxDepth: -1 })).rejects.toThrow(InvalidInputError);
      await expect(engine.expand('R', { maxDepth: 1.5 })).rejects.toThrow(InvalidInputError);
    });

    it('rejects a concurrency below one', async () => {
      await expect(engine.expand('R', { maxDepth: 1, concurrency: 0 })).rejects.toThrow(
        'Concurrency must be a positive integer, got 0',
      );
    });

    it('rejects a seed built from another root', async () => {
      await expect(
        engine.expand('R', { maxDepth: 1, seed: createGraph('Q', 1) }),
      ).rejects.toThrow('Seed graph was built from root Q, not R');
    });
  });
});
