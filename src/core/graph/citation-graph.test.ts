import { describe, it, expect } from 'vitest';
import type { NodeRecord } from '../../shared/types.js';
import {
  cloneRecord,
  createGraph,
  depthHistogram,
  leafNodes,
  neighborsOf,
  toEdgeList,
  uniqueIds,
  venueStats,
} from './citation-graph.js';

function record(id: string, depth: number, refs: string[] = [], citers: string[] = [], venue: string | null = null): NodeRecord {
  return {
    id,
    metadata: venue === null ? null : { title: id, authors: [], year: null, venue, rawId: id },
    outgoingRefs: refs,
    incomingCiters: citers,
    depth,
  };
}

describe('uniqueIds', () => {
  it('keeps the first occurrence of each identifier', () => {
    expect(uniqueIds(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c']);
  });
});

describe('neighborsOf', () => {
  it('lists references before citers without repeats', () => {
    expect(neighborsOf(record('x', 0, ['a', 'b'], ['b', 'c']))).toEqual(['a', 'b', 'c']);
  });
});

describe('cloneRecord', () => {
  it('copies the neighbour lists and metadata', () => {
    const original = record('x', 0, ['a'], [], 'V');
    const copy = cloneRecord(original);
    copy.outgoingRefs.push('z');
    copy.metadata?.authors.push('Someone');
    expect(original.outgoingRefs).toEqual(['a']);
    expect(original.metadata?.authors).toEqual([]);
  });
});

describe('toEdgeList', () => {
  it('counts an edge recorded on both sides once', () => {
    const graph = createGraph('A', 1);
    graph.nodes.set('A', record('A', 0, ['B'], ['C']));
    graph.nodes.set('B', record('B', 1, [], ['A']));
    graph.nodes.set('C', record('C', 1, ['A']));

    expect(toEdgeList(graph)).toEqual([
      { citing: 'A', cited: 'B' },
      { citing: 'C', cited: 'A' },
    ]);
  });

  it('drops edges that leave the graph', () => {
    const graph = createGraph('A', 1);
    graph.nodes.set('A', record('A', 0, ['B', 'outside']));
    graph.nodes.set('B', record('B', 1));

    expect(toEdgeList(graph)).toEqual([{ citing: 'A', cited: 'B' }]);
  });
});

describe('venueStats', () => {
  it('counts the venues of leaf nodes, most frequent first', () => {
    const graph = createGraph('R', 1);
    graph.nodes.set('R', record('R', 0, ['a', 'b', 'c', 'd'], [], 'Root Venue'));
    graph.nodes.set('a', record('a', 1, [], [], 'Nature'));
    graph.nodes.set('b', record('b', 1, [], [], 'Cell'));
    graph.nodes.set('c', record('c', 1, [], [], 'Nature'));
    graph.nodes.set('d', record('d', 1));

    expect(leafNodes(graph).map((r) => r.id)).toEqual(['a', 'b', 'c', 'd']);
    expect(venueStats(graph)).toEqual([
      { venue: 'Nature', count: 2 },
      { venue: 'Cell', count: 1 },
      { venue: 'Unknown', count: 1 },
    ]);
  });
});

describe('depthHistogram', () => {
  it('counts nodes per level', () => {
    const graph = createGraph('R', 2);
    graph.nodes.set('R', record('R', 0));
    graph.nodes.set('a', record('a', 1));
    graph.nodes.set('b', record('b', 2));
    graph.nodes.set('c', record('c', 2));
    expect(depthHistogram(graph)).toEqual([1, 1, 2]);
  });
});
