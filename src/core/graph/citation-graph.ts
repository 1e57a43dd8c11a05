/**
 * In-memory citation graph helpers
 *
 * A graph is a flat map of identifier -> NodeRecord. Citation edges are stored
 * redundantly: "A cites B" may show up as B in A.outgoingRefs, as A in
 * B.incomingCiters, or both. The helpers here derive edges from either side
 * and count each one once.
 */

import type {
  CitationEdge,
  CitationGraph,
  Identifier,
  NodeRecord,
  VenueCount,
} from '../../shared/types.js';

export function createGraph(root: Identifier, maxDepth: number): CitationGraph {
  return { root, maxDepth, nodes: new Map() };
}

export function cloneRecord(record: NodeRecord): NodeRecord {
  return {
    id: record.id,
    metadata: record.metadata
      ? { ...record.metadata, authors: [...record.metadata.authors] }
      : null,
    outgoingRefs: [...record.outgoingRefs],
    incomingCiters: [...record.incomingCiters],
    depth: record.depth,
  };
}

/** Keep the first occurrence of every identifier, preserving order. */
export function uniqueIds(ids: readonly Identifier[]): Identifier[] {
  const seen = new Set<Identifier>();
  const out: Identifier[] = [];
  for (const id of ids) {
    if (seen.has(id)) continue;
    seen.add(id);
    out.push(id);
  }
  return out;
}

export function neighborsOf(record: NodeRecord): Identifier[] {
  return uniqueIds([...record.outgoingRefs, ...record.incomingCiters]);
}

/**
 * Citation edges between nodes present in the graph.
 * Edges pointing outside the graph are dropped.
 */
export function toEdgeList(graph: CitationGraph): CitationEdge[] {
  const edges: CitationEdge[] = [];
  const seen = new Set<string>();

  const add = (citing: Identifier, cited: Identifier) => {
    if (!graph.nodes.has(citing) || !graph.nodes.has(cited)) return;
    const key = JSON.stringify([citing, cited]);
    if (seen.has(key)) return;
    seen.add(key);
    edges.push({ citing, cited });
  };

  for (const record of graph.nodes.values()) {
    for (const ref of record.outgoingRefs) add(record.id, ref);
    for (const citer of record.incomingCiters) add(citer, record.id);
  }
  return edges;
}

/** Nodes with no recorded neighbours. */
export function leafNodes(graph: CitationGraph): NodeRecord[] {
  return [...graph.nodes.values()].filter(
    (r) => r.outgoingRefs.length === 0 && r.incomingCiters.length === 0,
  );
}

/**
 * Journal popularity among the leaves of a graph.
 */
export function venueStats(graph: CitationGraph): VenueCount[] {
  const counts = new Map<string, number>();
  for (const leaf of leafNodes(graph)) {
    const venue = leaf.metadata?.venue ?? 'Unknown';
    counts.set(venue, (counts.get(venue) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([venue, count]) => ({ venue, count }))
    .sort((a, b) => b.count - a.count || a.venue.localeCompare(b.venue));
}

/** Discovery depth of every node, grouped by level. */
export function depthHistogram(graph: CitationGraph): number[] {
  const histogram: number[] = [];
  for (const record of graph.nodes.values()) {
    while (histogram.length <= record.depth) histogram.push(0);
    histogram[record.depth] = (histogram[record.depth] ?? 0) + 1;
  }
  return histogram;
}
