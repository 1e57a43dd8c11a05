import type { StatementCache } from '../statement-cache.js';
import type { DataEdgeDirection, EdgeRow, NodeRow } from '../types.js';

export interface NodeInsert {
  id: string;
  depth: number;
  metadata: {
    title: string | null;
    authors: string[];
    year: number | null;
    venue: string | null;
    raw_id: string;
  } | null;
  references: string[];
  citers: string[];
}

export interface NodeRepository {
  /** Returns false when the run already holds this node; nothing is written then. */
  insert(runId: number, node: NodeInsert): boolean;
  findByRun(runId: number): NodeRow[];
  findEdgesByRun(runId: number): EdgeRow[];
  findOne(runId: number, id: string): NodeRow | undefined;
  findEdges(runId: number, id: string): EdgeRow[];
  /** Most recent run holding the node */
  findLatestRunId(id: string): number | undefined;
  /** Renumber a run's nodes to follow the given order */
  reorder(runId: number, order: readonly string[]): void;
  count(runId: number): number;
}

export function createNodeRepository(cache: StatementCache): NodeRepository {
  const insertEdges = (
    runId: number,
    nodeId: string,
    direction: DataEdgeDirection,
    neighbors: string[],
  ): void => {
    const stmt = cache.get(
      'insert_edge',
      `INSERT INTO edges (run_id, node_id, direction, position, neighbor_id)
       VALUES (?, ?, ?, ?, ?)`,
    );
    neighbors.forEach((neighbor, position) => {
      stmt.run(runId, nodeId, direction, position, neighbor);
    });
  };

  return {
    insert(runId: number, node: NodeInsert): boolean {
      const nextSeq = cache.get(
        'select_next_node_seq',
        'SELECT COALESCE(MAX(seq) + 1, 0) AS seq FROM nodes WHERE run_id = ?',
      );
      const { seq } = nextSeq.get(runId) as { seq: number };

      const stmt = cache.get(
        'insert_node',
        `INSERT OR IGNORE INTO nodes
           (run_id, id, seq, depth, has_metadata, title, authors, year, venue, raw_id)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      );
      const meta = node.metadata;
      const result = stmt.run(
        runId,
        node.id,
        seq,
        node.depth,
        meta ? 1 : 0,
        meta?.title ?? null,
        meta ? JSON.stringify(meta.authors) : null,
        meta?.year ?? null,
        meta?.venue ?? null,
        meta?.raw_id ?? null,
      );
      if (result.changes === 0) return false;

      insertEdges(runId, node.id, 'reference', node.references);
      insertEdges(runId, node.id, 'citer', node.citers);
      return true;
    },

    findByRun(runId: number): NodeRow[] {
      const stmt = cache.get(
        'select_nodes_by_run',
        'SELECT * FROM nodes WHERE run_id = ? ORDER BY seq',
      );
      return stmt.all(runId) as NodeRow[];
    },

    findEdgesByRun(runId: number): EdgeRow[] {
      const stmt = cache.get(
        'select_edges_by_run',
        'SELECT * FROM edges WHERE run_id = ? ORDER BY node_id, direction, position',
      );
      return stmt.all(runId) as EdgeRow[];
    },

    findOne(runId: number, id: string): NodeRow | undefined {
      const stmt = cache.get(
        'select_node',
        'SELECT * FROM nodes WHERE run_id = ? AND id = ?',
      );
      return stmt.get(runId, id) as NodeRow | undefined;
    },

    findEdges(runId: number, id: string): EdgeRow[] {
      const stmt = cache.get(
        'select_node_edges',
        'SELECT * FROM edges WHERE run_id = ? AND node_id = ? ORDER BY direction, position',
      );
      return stmt.all(runId, id) as EdgeRow[];
    },

    findLatestRunId(id: string): number | undefined {
      const stmt = cache.get(
        'select_latest_run_for_node',
        'SELECT MAX(run_id) AS run_id FROM nodes WHERE id = ?',
      );
      const row = stmt.get(id) as { run_id: number | null } | undefined;
      return row?.run_id ?? undefined;
    },

    reorder(runId: number, order: readonly string[]): void {
      const stmt = cache.get(
        'update_node_seq',
        'UPDATE nodes SET seq = ? WHERE run_id = ? AND id = ?',
      );
      order.forEach((id, seq) => {
        stmt.run(seq, runId, id);
      });
    },

    count(runId: number): number {
      const stmt = cache.get(
        'count_nodes_by_run',
        'SELECT COUNT(*) AS cnt FROM nodes WHERE run_id = ?',
      );
      return (stmt.get(runId) as { cnt: number }).cnt;
    },
  };
}
