/**
 * テスト共通フィクスチャ
 */

import crypto from 'node:crypto';
import Database from 'better-sqlite3';
import { migrateDatabase } from '../src/db/migrate.js';
import type { FindingRecord, Invocation, RunState } from '../src/types/entities.js';

export function createTestDb(): InstanceType<typeof Database> {
  const db = new Database(':memory:');
  migrateDatabase(db);
  return db;
}

export function makeRun(overrides: Partial<RunState> = {}): RunState {
  return {
    runId: 'run_20260101_000000_aaaa',
    domain: 'web',
    targets: [{ value: 'example.com', kind: 'domain', matchedRule: 'example.com' }],
    runDir: '/tmp/portcullis-test/run_20260101_000000_aaaa',
    startedAt: '2026-01-01T00:00:00.000Z',
    currentPhase: null,
    phases: [],
    invocations: [],
    status: 'running',
    ...overrides,
  };
}

export function makeInvocation(overrides: Partial<Invocation> = {}): Invocation {
  return {
    id: crypto.randomUUID(),
    runId: 'run_20260101_000000_aaaa',
    phase: 'discovery',
    tool: 'subfinder',
    toolVersion: '2.6.6',
    fingerprint: 'f'.repeat(64),
    inputDigest: 'd'.repeat(64),
    inputHashes: ['c'.repeat(64)],
    attempt: 1,
    status: 'pending',
    outputHashes: [],
    createdAt: '2026-01-01T00:00:01.000Z',
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<FindingRecord> = {}): FindingRecord {
  return {
    id: 'a'.repeat(64),
    tool: 'subfinder',
    kind: 'asset',
    asset: 'www.example.com',
    title: 'Discovered subdomain',
    category: 'subdomain',
    severity: null,
    occurrences: 1,
    evidence: {},
    sourceArtifactHash: 'b'.repeat(64),
    ...overrides,
  };
}
