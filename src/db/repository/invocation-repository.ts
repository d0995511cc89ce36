import type Database from 'better-sqlite3';
import type {
  FailureKind,
  Invocation,
  InvocationStatus,
} from '../../types/entities.js';
import type { InvocationFilter } from '../../types/repository.js';

/** Row shape returned by better-sqlite3 for the invocations table. */
interface InvocationRow {
  id: string;
  run_id: string;
  phase: string;
  tool: string;
  tool_version: string;
  fingerprint: string;
  input_digest: string;
  input_hashes_json: string;
  attempt: number;
  status: string;
  failure_kind: string | null;
  error: string | null;
  exit_code: number | null;
  raw_output_hash: string | null;
  raw_output_path: string | null;
  output_hashes_json: string;
  cached_from: string | null;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
}

const COLUMNS = [
  'id',
  'run_id',
  'phase',
  'tool',
  'tool_version',
  'fingerprint',
  'input_digest',
  'input_hashes_json',
  'attempt',
  'status',
  'failure_kind',
  'error',
  'exit_code',
  'raw_output_hash',
  'raw_output_path',
  'output_hashes_json',
  'cached_from',
  'created_at',
  'started_at',
  'finished_at',
];

/** Maps a snake_case DB row to a camelCase Invocation entity. */
function rowToInvocation(row: InvocationRow): Invocation {
  return {
    id: row.id,
    runId: row.run_id,
    phase: row.phase,
    tool: row.tool,
    toolVersion: row.tool_version,
    fingerprint: row.fingerprint,
    inputDigest: row.input_digest,
    inputHashes: JSON.parse(row.input_hashes_json) as string[],
    attempt: row.attempt,
    status: row.status as InvocationStatus,
    ...(row.failure_kind !== null ? { failureKind: row.failure_kind as FailureKind } : {}),
    ...(row.error !== null ? { error: row.error } : {}),
    ...(row.exit_code !== null ? { exitCode: row.exit_code } : {}),
    ...(row.raw_output_hash !== null ? { rawOutputHash: row.raw_output_hash } : {}),
    ...(row.raw_output_path !== null ? { rawOutputPath: row.raw_output_path } : {}),
    outputHashes: JSON.parse(row.output_hashes_json) as string[],
    ...(row.cached_from !== null ? { cachedFrom: row.cached_from } : {}),
    createdAt: row.created_at,
    ...(row.started_at !== null ? { startedAt: row.started_at } : {}),
    ...(row.finished_at !== null ? { finishedAt: row.finished_at } : {}),
  };
}

/**
 * Repository for the `invocations` table.
 *
 * Rows are upserted by id, but only while the stored row is still pending
 * or running: a terminal record is never rewritten.
 */
export class InvocationRepository {
  private readonly db: Database.Database;

  private readonly upsertStmt: Database.Statement;
  private readonly selectByIdStmt: Database.Statement;
  private readonly selectByRunStmt: Database.Statement;
  private readonly selectSucceededStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.db = db;

    const placeholders = COLUMNS.map(() => '?').join(', ');
    const updates = COLUMNS.filter((c) => c !== 'id')
      .map((c) => `${c} = excluded.${c}`)
      .join(', ');

    this.upsertStmt = this.db.prepare(
      `INSERT INTO invocations (${COLUMNS.join(', ')}) VALUES (${placeholders})
       ON CONFLICT(id) DO UPDATE SET ${updates}
       WHERE invocations.status IN ('pending', 'running')`,
    );

    this.selectByIdStmt = this.db.prepare(
      `SELECT ${COLUMNS.join(', ')} FROM invocations WHERE id = ?`,
    );

    this.selectByRunStmt = this.db.prepare(
      `SELECT ${COLUMNS.join(', ')} FROM invocations WHERE run_id = ?
       ORDER BY phase, tool, input_digest, attempt`,
    );

    this.selectSucceededStmt = this.db.prepare(
      `SELECT ${COLUMNS.join(', ')} FROM invocations
       WHERE fingerprint = ? AND status = 'succeeded'
       ORDER BY finished_at DESC, id
       LIMIT 1`,
    );
  }

  /** Insert or advance an invocation. Terminal rows stay as they are. */
  upsert(inv: Invocation): void {
    this.upsertStmt.run(
      inv.id,
      inv.runId,
      inv.phase,
      inv.tool,
      inv.toolVersion,
      inv.fingerprint,
      inv.inputDigest,
      JSON.stringify(inv.inputHashes),
      inv.attempt,
      inv.status,
      inv.failureKind ?? null,
      inv.error ?? null,
      inv.exitCode ?? null,
      inv.rawOutputHash ?? null,
      inv.rawOutputPath ?? null,
      JSON.stringify(inv.outputHashes),
      inv.cachedFrom ?? null,
      inv.createdAt,
      inv.startedAt ?? null,
      inv.finishedAt ?? null,
    );
  }

  /** Find an Invocation by its UUID. Returns undefined if not found. */
  findById(id: string): Invocation | undefined {
    const row = this.selectByIdStmt.get(id) as InvocationRow | undefined;
    if (row === undefined) {
      return undefined;
    }
    return rowToInvocation(row);
  }

  /** Invocations of a run, optionally narrowed by status and tool. */
  findByRun(filter: InvocationFilter): Invocation[] {
    const rows = this.selectByRunStmt.all(filter.runId) as InvocationRow[];
    return rows
      .map(rowToInvocation)
      .filter(
        (inv) =>
          (filter.status === undefined || inv.status === filter.status) &&
          (filter.tool === undefined || inv.tool === filter.tool),
      );
  }

  /** Most recent successful execution with this fingerprint, in any run. */
  findLatestSucceeded(fingerprint: string): Invocation | undefined {
    const row = this.selectSucceededStmt.get(fingerprint) as InvocationRow | undefined;
    if (row === undefined) {
      return undefined;
    }
    return rowToInvocation(row);
  }
}
