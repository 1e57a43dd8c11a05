import type { Migration } from '../types.js';

const INITIAL_SCHEMA_SQL = `
-- schema_version
CREATE TABLE IF NOT EXISTS schema_version (
    version     INTEGER PRIMARY KEY,
    applied_at  TEXT    NOT NULL,
    description TEXT
);

-- runs
CREATE TABLE IF NOT EXISTS runs (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    root        TEXT    NOT NULL,
    max_depth   INTEGER NOT NULL CHECK(max_depth >= 0),
    provider    TEXT    NOT NULL,
    status      TEXT    NOT NULL DEFAULT 'running'
                        CHECK(status IN ('running','completed','aborted')),
    started_at  TEXT    NOT NULL,
    finished_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_runs_root ON runs(root);

-- nodes
CREATE TABLE IF NOT EXISTS nodes (
    run_id       INTEGER NOT NULL
                         REFERENCES runs(id) ON DELETE CASCADE,
    id           TEXT    NOT NULL,
    seq          INTEGER NOT NULL,
    depth        INTEGER NOT NULL CHECK(depth >= 0),
    has_metadata INTEGER NOT NULL DEFAULT 0
                         CHECK(has_metadata IN (0, 1)),
    title        TEXT,
    authors      TEXT,
    year         INTEGER,
    venue        TEXT,
    raw_id       TEXT,
    PRIMARY KEY (run_id, id)
);

CREATE INDEX IF NOT EXISTS idx_nodes_id ON nodes(id);
CREATE INDEX IF NOT EXISTS idx_nodes_run_seq ON nodes(run_id, seq);

-- edges
CREATE TABLE IF NOT EXISTS edges (
    run_id      INTEGER NOT NULL,
    node_id     TEXT    NOT NULL,
    direction   TEXT    NOT NULL
                        CHECK(direction IN ('reference','citer')),
    position    INTEGER NOT NULL,
    neighbor_id TEXT    NOT NULL,
    PRIMARY KEY (run_id, node_id, direction, position),
    FOREIGN KEY (run_id, node_id) REFERENCES nodes(run_id, id) ON DELETE CASCADE
);

-- failures
CREATE TABLE IF NOT EXISTS failures (
    run_id    INTEGER NOT NULL,
    node_id   TEXT    NOT NULL,
    direction TEXT    NOT NULL
                      CHECK(direction IN ('forward','backward')),
    reason    TEXT    NOT NULL
                      CHECK(reason IN ('unavailable','not_found')),
    message   TEXT    NOT NULL,
    PRIMARY KEY (run_id, node_id, direction),
    FOREIGN KEY (run_id, node_id) REFERENCES nodes(run_id, id) ON DELETE CASCADE
);
`;

export const migration001: Migration = {
  version: 1,
  description: 'Initial checkpoint schema',
  up: (db) => {
    db.exec(INITIAL_SCHEMA_SQL);
    db.prepare(
      'INSERT INTO schema_version (version, applied_at, description) VALUES (?, ?, ?)',
    ).run(1, new Date().toISOString(), 'Initial checkpoint schema');
  },
};
