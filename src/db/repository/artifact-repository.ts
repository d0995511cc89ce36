import type Database from 'better-sqlite3';
import type {
  Artifact,
  FindingKind,
  FindingRecord,
  Target,
} from '../../types/entities.js';
import type { ArtifactType } from '../../types/tool.js';

/** Row shape returned by better-sqlite3 for the artifacts table. */
interface ArtifactRow {
  hash: string;
  canonical_hash: string;
  type: string;
  content_json: string;
  producer_fingerprint: string;
  created_at: string;
}

const COLUMNS = 'a.hash, a.canonical_hash, a.type, a.content_json, a.producer_fingerprint, a.created_at';

function isFindingKind(type: string): type is FindingKind {
  return type === 'asset' || type === 'path' || type === 'finding';
}

/** Maps a snake_case DB row to a camelCase Artifact entity. */
function rowToArtifact(row: ArtifactRow): Artifact {
  const base = {
    hash: row.hash,
    canonicalHash: row.canonical_hash,
    producerFingerprint: row.producer_fingerprint,
    createdAt: row.created_at,
  };
  if (row.type === 'target') {
    return { ...base, type: 'target', content: JSON.parse(row.content_json) as Target };
  }
  if (isFindingKind(row.type)) {
    return { ...base, type: row.type, content: JSON.parse(row.content_json) as FindingRecord };
  }
  throw new Error(`Unknown artifact type in store: ${row.type}`);
}

/** Result of a write-once insert. */
export type InsertOutcome = 'inserted' | 'exists';

/**
 * Repository for the `artifacts` and `run_artifacts` tables.
 *
 * Artifacts are write-once: an insert of an existing hash is a no-op and
 * reports `exists`. Run membership is tracked separately so that one
 * artifact can be shared by every run that produced or reused it.
 */
export class ArtifactRepository {
  private readonly db: Database.Database;

  private readonly insertStmt: Database.Statement;
  private readonly selectByHashStmt: Database.Statement;
  private readonly linkStmt: Database.Statement;
  private readonly selectByRunStmt: Database.Statement;
  private readonly selectByRunAndTypeStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.db = db;

    this.insertStmt = this.db.prepare(
      `INSERT OR IGNORE INTO artifacts (hash, canonical_hash, type, content_json, producer_fingerprint, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );

    this.selectByHashStmt = this.db.prepare(`SELECT ${COLUMNS} FROM artifacts a WHERE a.hash = ?`);

    this.linkStmt = this.db.prepare(
      'INSERT OR IGNORE INTO run_artifacts (run_id, artifact_hash, phase, linked_at) VALUES (?, ?, ?, ?)',
    );

    this.selectByRunStmt = this.db.prepare(
      `SELECT ${COLUMNS} FROM artifacts a
       JOIN run_artifacts ra ON ra.artifact_hash = a.hash
       WHERE ra.run_id = ?
       ORDER BY a.hash`,
    );

    this.selectByRunAndTypeStmt = this.db.prepare(
      `SELECT ${COLUMNS} FROM artifacts a
       JOIN run_artifacts ra ON ra.artifact_hash = a.hash
       WHERE ra.run_id = ? AND a.type = ?
       ORDER BY a.hash`,
    );
  }

  /** Insert an artifact unless its hash is already stored. */
  insert(artifact: Artifact): InsertOutcome {
    const result = this.insertStmt.run(
      artifact.hash,
      artifact.canonicalHash,
      artifact.type,
      JSON.stringify(artifact.content),
      artifact.producerFingerprint,
      artifact.createdAt,
    );
    return result.changes === 1 ? 'inserted' : 'exists';
  }

  /** Find an Artifact by its store hash. Returns undefined if not found. */
  findByHash(hash: string): Artifact | undefined {
    const row = this.selectByHashStmt.get(hash) as ArtifactRow | undefined;
    if (row === undefined) {
      return undefined;
    }
    return rowToArtifact(row);
  }

  /** Link an artifact to a run. Linking twice is a no-op. */
  link(runId: string, hash: string, phase: string, linkedAt: string): void {
    this.linkStmt.run(runId, hash, phase, linkedAt);
  }

  /** Artifacts linked to a run, ordered by hash, optionally of one type. */
  findByRun(runId: string, type?: ArtifactType): Artifact[] {
    const rows = (
      type === undefined
        ? this.selectByRunStmt.all(runId)
        : this.selectByRunAndTypeStmt.all(runId, type)
    ) as ArtifactRow[];
    return rows.map(rowToArtifact);
  }

}
