/**
 * portcullis — SQLite schema
 *
 * Append-only layout:
 * - artifacts / raw_outputs are write-once, keyed by content hash
 * - run_artifacts links shared artifacts to the runs that produced or reused them
 * - invocations rows are updated only while pending/running
 */

export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS runs (
  id                    TEXT PRIMARY KEY,
  domain                TEXT NOT NULL,
  status                TEXT NOT NULL,
  current_phase         TEXT,
  phases_json           TEXT NOT NULL DEFAULT '[]',
  targets_json          TEXT NOT NULL,
  run_dir               TEXT NOT NULL,
  started_at            TEXT NOT NULL,
  finished_at           TEXT,
  error                 TEXT
);

CREATE TABLE IF NOT EXISTS raw_outputs (
  sha256                TEXT PRIMARY KEY,
  content               BLOB NOT NULL,
  size_bytes            INTEGER NOT NULL,
  created_at            TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS artifacts (
  hash                  TEXT PRIMARY KEY,
  canonical_hash        TEXT NOT NULL,
  type                  TEXT NOT NULL,
  content_json          TEXT NOT NULL,
  producer_fingerprint  TEXT NOT NULL,
  created_at            TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_artifacts_producer ON artifacts(producer_fingerprint);

CREATE TABLE IF NOT EXISTS run_artifacts (
  run_id                TEXT NOT NULL,
  artifact_hash         TEXT NOT NULL,
  phase                 TEXT NOT NULL,
  linked_at             TEXT NOT NULL,
  PRIMARY KEY (run_id, artifact_hash),
  FOREIGN KEY (run_id)        REFERENCES runs(id)        ON DELETE CASCADE,
  FOREIGN KEY (artifact_hash) REFERENCES artifacts(hash) ON DELETE RESTRICT
);

CREATE TABLE IF NOT EXISTS invocations (
  id                    TEXT PRIMARY KEY,
  run_id                TEXT NOT NULL,
  phase                 TEXT NOT NULL,
  tool                  TEXT NOT NULL,
  tool_version          TEXT NOT NULL,
  fingerprint           TEXT NOT NULL,
  input_digest          TEXT NOT NULL,
  input_hashes_json     TEXT NOT NULL,
  attempt               INTEGER NOT NULL,
  status                TEXT NOT NULL,
  failure_kind          TEXT,
  error                 TEXT,
  exit_code             INTEGER,
  raw_output_hash       TEXT,
  raw_output_path       TEXT,
  output_hashes_json    TEXT NOT NULL DEFAULT '[]',
  cached_from           TEXT,
  created_at            TEXT NOT NULL,
  started_at            TEXT,
  finished_at           TEXT,
  UNIQUE (run_id, fingerprint, attempt),
  FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
);
CREATE INDEX IF NOT EXISTS idx_invocations_run ON invocations(run_id);
CREATE INDEX IF NOT EXISTS idx_invocations_fingerprint ON invocations(fingerprint, status);
`;
