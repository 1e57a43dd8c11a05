import type { StatementCache } from '../statement-cache.js';
import type { DataRunStatus, RunInsert, RunRow } from '../types.js';

const RUN_COLUMNS = `
  r.id, r.root, r.max_depth, r.provider, r.status, r.started_at, r.finished_at,
  (SELECT COUNT(*) FROM nodes n WHERE n.run_id = r.id) AS node_count,
  (SELECT COUNT(*) FROM failures f WHERE f.run_id = r.id) AS failure_count`;

export interface RunRepository {
  create(run: RunInsert): number;
  findById(id: number): RunRow | undefined;
  /** Newest first */
  list(limit: number): RunRow[];
  findLatestByRoot(root: string): RunRow | undefined;
  finish(id: number, status: Exclude<DataRunStatus, 'running'>): void;
}

export function createRunRepository(cache: StatementCache): RunRepository {
  return {
    create(run: RunInsert): number {
      const stmt = cache.get(
        'insert_run',
        `INSERT INTO runs (root, max_depth, provider, status, started_at)
         VALUES (?, ?, ?, 'running', ?)`,
      );
      const result = stmt.run(run.root, run.max_depth, run.provider, new Date().toISOString());
      return Number(result.lastInsertRowid);
    },

    findById(id: number): RunRow | undefined {
      const stmt = cache.get('select_run_by_id', `SELECT ${RUN_COLUMNS} FROM runs r WHERE r.id = ?`);
      return stmt.get(id) as RunRow | undefined;
    },

    list(limit: number): RunRow[] {
      const stmt = cache.get(
        'select_runs',
        `SELECT ${RUN_COLUMNS} FROM runs r ORDER BY r.id DESC LIMIT ?`,
      );
      return stmt.all(limit) as RunRow[];
    },

    findLatestByRoot(root: string): RunRow | undefined {
      const stmt = cache.get(
        'select_latest_run_by_root',
        `SELECT ${RUN_COLUMNS} FROM runs r WHERE r.root = ? ORDER BY r.id DESC LIMIT 1`,
      );
      return stmt.get(root) as RunRow | undefined;
    },

    finish(id: number, status: Exclude<DataRunStatus, 'running'>): void {
      const stmt = cache.get(
        'finish_run',
        'UPDATE runs SET status = ?, finished_at = ? WHERE id = ?',
      );
      stmt.run(status, new Date().toISOString(), id);
    },
  };
}
