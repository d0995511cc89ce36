import type Database from 'better-sqlite3';
import type {
  PhaseRecord,
  RunState,
  RunStatus,
  Target,
} from '../../types/entities.js';
import type { RunSummary } from '../../types/repository.js';
import type { Domain } from '../../types/tool.js';

/** Row shape returned by better-sqlite3 for the runs table. */
interface RunRow {
  id: string;
  domain: string;
  status: string;
  current_phase: string | null;
  phases_json: string;
  targets_json: string;
  run_dir: string;
  started_at: string;
  finished_at: string | null;
  error: string | null;
}

/** A run without its invocations (they live in their own table). */
export type RunHeader = Omit<RunState, 'invocations'>;

const COLUMNS =
  'id, domain, status, current_phase, phases_json, targets_json, run_dir, started_at, finished_at, error';

function rowToRunHeader(row: RunRow): RunHeader {
  return {
    runId: row.id,
    domain: row.domain as Domain,
    status: row.status as RunStatus,
    currentPhase: row.current_phase,
    phases: JSON.parse(row.phases_json) as PhaseRecord[],
    targets: JSON.parse(row.targets_json) as Target[],
    runDir: row.run_dir,
    startedAt: row.started_at,
    ...(row.finished_at !== null ? { finishedAt: row.finished_at } : {}),
    ...(row.error !== null ? { error: row.error } : {}),
  };
}

function rowToRunSummary(row: RunRow): RunSummary {
  return {
    runId: row.id,
    domain: row.domain as Domain,
    status: row.status as RunStatus,
    currentPhase: row.current_phase,
    startedAt: row.started_at,
    ...(row.finished_at !== null ? { finishedAt: row.finished_at } : {}),
  };
}

/**
 * Repository for the `runs` table.
 */
export class RunRepository {
  private readonly db: Database.Database;

  private readonly upsertStmt: Database.Statement;
  private readonly selectByIdStmt: Database.Statement;
  private readonly selectAllStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.db = db;

    this.upsertStmt = this.db.prepare(
      `INSERT INTO runs (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         status = excluded.status,
         current_phase = excluded.current_phase,
         phases_json = excluded.phases_json,
         finished_at = excluded.finished_at,
         error = excluded.error`,
    );

    this.selectByIdStmt = this.db.prepare(`SELECT ${COLUMNS} FROM runs WHERE id = ?`);

    this.selectAllStmt = this.db.prepare(`SELECT ${COLUMNS} FROM runs ORDER BY started_at DESC, id`);
  }

  /** Insert a run or update its mutable columns. Targets and domain never change. */
  upsert(run: RunHeader): void {
    this.upsertStmt.run(
      run.runId,
      run.domain,
      run.status,
      run.currentPhase,
      JSON.stringify(run.phases),
      JSON.stringify(run.targets),
      run.runDir,
      run.startedAt,
      run.finishedAt ?? null,
      run.error ?? null,
    );
  }

  findById(id: string): RunHeader | undefined {
    const row = this.selectByIdStmt.get(id) as RunRow | undefined;
    if (row === undefined) {
      return undefined;
    }
    return rowToRunHeader(row);
  }

  /** All runs, newest first. */
  list(): RunSummary[] {
    const rows = this.selectAllStmt.all() as RunRow[];
    return rows.map(rowToRunSummary);
  }
}
