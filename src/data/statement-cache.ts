import type Database from 'better-sqlite3';
import type { Statement } from 'better-sqlite3';

/**
 * Prepared statements keyed by name, compiled once per connection.
 */
export class StatementCache {
  private readonly cache = new Map<string, Statement>();

  constructor(private readonly db: Database.Database) {}

  get(key: string, sql: string): Statement {
    let stmt = this.cache.get(key);
    if (!stmt) {
      stmt = this.db.prepare(sql);
      this.cache.set(key, stmt);
    }
    return stmt;
  }

  /**
   * Run fn inside a transaction on the cached connection.
   * Any throw rolls the whole unit back.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /** Drop every compiled statement. Call before closing the connection. */
  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
