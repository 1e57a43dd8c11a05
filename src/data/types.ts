/**
 * Data layer row types
 * Direct mappings of the SQLite tables
 */

import type Database from 'better-sqlite3';

/** ISO 8601 timestamp */
export type ISODateString = string;

/** Matches the CHECK constraint on runs.status */
export type DataRunStatus = 'running' | 'completed' | 'aborted';

/** Matches the CHECK constraint on edges.direction */
export type DataEdgeDirection = 'reference' | 'citer';

// --- Run ---

export interface RunRow {
  id: number;
  root: string;
  max_depth: number;
  provider: string;
  status: DataRunStatus;
  started_at: ISODateString;
  finished_at: ISODateString | null;
  node_count: number;
  failure_count: number;
}

export interface RunInsert {
  root: string;
  max_depth: number;
  provider: string;
}

// --- Node ---

export interface NodeRow {
  run_id: number;
  id: string;
  seq: number;
  depth: number;
  has_metadata: 0 | 1;
  title: string | null;
  /** JSON array of author names */
  authors: string | null;
  year: number | null;
  venue: string | null;
  raw_id: string | null;
}

export interface EdgeRow {
  run_id: number;
  node_id: string;
  direction: DataEdgeDirection;
  position: number;
  neighbor_id: string;
}

// --- Failure ---

export interface FailureRow {
  run_id: number;
  node_id: string;
  direction: 'forward' | 'backward';
  reason: 'unavailable' | 'not_found';
  message: string;
}

// --- Migration ---

export interface Migration {
  version: number;
  description: string;
  up: (db: Database.Database) => void;
}
