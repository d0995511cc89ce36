import type Database from 'better-sqlite3';
import type { RawOutput } from '../../types/repository.js';

/** Row shape returned by better-sqlite3 for the raw_outputs table. */
interface RawOutputRow {
  sha256: string;
  content: Buffer;
  size_bytes: number;
  created_at: string;
}

function rowToRawOutput(row: RawOutputRow): RawOutput {
  return {
    sha256: row.sha256,
    content: row.content.toString('utf8'),
    sizeBytes: row.size_bytes,
    createdAt: row.created_at,
  };
}

/**
 * Repository for the `raw_outputs` table: tool output blobs keyed by their
 * SHA-256. Identical output from different invocations is stored once.
 */
export class RawOutputRepository {
  private readonly db: Database.Database;

  private readonly insertStmt: Database.Statement;
  private readonly selectStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.db = db;

    this.insertStmt = this.db.prepare(
      'INSERT OR IGNORE INTO raw_outputs (sha256, content, size_bytes, created_at) VALUES (?, ?, ?, ?)',
    );

    this.selectStmt = this.db.prepare(
      'SELECT sha256, content, size_bytes, created_at FROM raw_outputs WHERE sha256 = ?',
    );
  }

  /** Store a blob under a precomputed hash. */
  insert(sha256: string, content: Buffer, createdAt: string): void {
    this.insertStmt.run(sha256, content, content.length, createdAt);
  }

  findBySha256(sha256: string): RawOutput | undefined {
    const row = this.selectStmt.get(sha256) as RawOutputRow | undefined;
    if (row === undefined) {
      return undefined;
    }
    return rowToRawOutput(row);
  }
}
