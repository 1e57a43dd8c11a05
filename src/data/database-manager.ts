import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { DatabaseError, toError } from '../shared/errors.js';
import { StatementCache } from './statement-cache.js';
import { runMigrations } from './migrations/index.js';
import { createRunRepository, type RunRepository } from './repositories/run-repository.js';
import { createNodeRepository, type NodeRepository } from './repositories/node-repository.js';
import {
  createFailureRepository,
  type FailureRepository,
} from './repositories/failure-repository.js';
import {
  createCheckpointService,
  type CheckpointService,
} from './services/checkpoint-service.js';

export interface DatabaseManagerOptions {
  /** File path, or ':memory:' */
  dbPath: string;
  readonly?: boolean;
}

export class DatabaseManager {
  private db: Database.Database | null = null;
  private statementCache: StatementCache | null = null;
  private readonly dbPath: string;
  private readonly readonlyMode: boolean;

  // Repositories (lazy)
  private _runRepo: RunRepository | null = null;
  private _nodeRepo: NodeRepository | null = null;
  private _failureRepo: FailureRepository | null = null;
  private _checkpoints: CheckpointService | null = null;

  constructor(options: DatabaseManagerOptions) {
    this.dbPath = options.dbPath;
    this.readonlyMode = options.readonly ?? false;
  }

  /**
   * Open the connection, apply pragmas and pending migrations.
   */
  initialize(): void {
    try {
      if (this.dbPath !== ':memory:' && !this.readonlyMode) {
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }
      this.db = new Database(this.dbPath, {
        readonly: this.readonlyMode,
      });

      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('foreign_keys = ON');
      this.db.pragma('busy_timeout = 5000');

      if (!this.readonlyMode) {
        runMigrations(this.db);
      }

      this.statementCache = new StatementCache(this.db);
    } catch (err) {
      this.db?.close();
      this.db = null;
      throw new DatabaseError(`Failed to initialize database at ${this.dbPath}`, toError(err));
    }
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  getDb(): Database.Database {
    if (!this.db) {
      throw new DatabaseError('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  getStatementCache(): StatementCache {
    if (!this.statementCache) {
      throw new DatabaseError('Database not initialized. Call initialize() first.');
    }
    return this.statementCache;
  }

  // --- Repository accessors ---

  get runs(): RunRepository {
    if (!this._runRepo) {
      this._runRepo = createRunRepository(this.getStatementCache());
    }
    return this._runRepo;
  }

  get nodes(): NodeRepository {
    if (!this._nodeRepo) {
      this._nodeRepo = createNodeRepository(this.getStatementCache());
    }
    return this._nodeRepo;
  }

  get failures(): FailureRepository {
    if (!this._failureRepo) {
      this._failureRepo = createFailureRepository(this.getStatementCache());
    }
    return this._failureRepo;
  }

  get checkpoints(): CheckpointService {
    if (!this._checkpoints) {
      this._checkpoints = createCheckpointService(this.getStatementCache(), {
        runs: this.runs,
        nodes: this.nodes,
        failures: this.failures,
      });
    }
    return this._checkpoints;
  }

  /**
   * Checkpoint the WAL and close the connection.
   */
  close(): void {
    if (!this.db) return;

    try {
      this._runRepo = null;
      this._nodeRepo = null;
      this._failureRepo = null;
      this._checkpoints = null;

      if (this.statementCache) {
        this.statementCache.clear();
        this.statementCache = null;
      }

      if (!this.readonlyMode) {
        this.db.pragma('wal_checkpoint(TRUNCATE)');
      }

      this.db.close();
      this.db = null;
    } catch (err) {
      throw new DatabaseError('Failed to close database', toError(err));
    }
  }
}
