import type { StatementCache } from '../statement-cache.js';
import type { FailureRow } from '../types.js';

export type FailureInsert = Omit<FailureRow, 'run_id'>;

export interface FailureRepository {
  insertMany(runId: number, failures: FailureInsert[]): void;
  findByRun(runId: number): FailureRow[];
}

export function createFailureRepository(cache: StatementCache): FailureRepository {
  return {
    insertMany(runId: number, failures: FailureInsert[]): void {
      const stmt = cache.get(
        'insert_failure',
        `INSERT OR IGNORE INTO failures (run_id, node_id, direction, reason, message)
         VALUES (?, ?, ?, ?, ?)`,
      );
      for (const failure of failures) {
        stmt.run(runId, failure.node_id, failure.direction, failure.reason, failure.message);
      }
    },

    findByRun(runId: number): FailureRow[] {
      const stmt = cache.get(
        'select_failures_by_run',
        `SELECT f.* FROM failures f
         JOIN nodes n ON n.run_id = f.run_id AND n.id = f.node_id
         WHERE f.run_id = ?
         ORDER BY n.seq, f.direction DESC`,
      );
      return stmt.all(runId) as FailureRow[];
    },
  };
}
