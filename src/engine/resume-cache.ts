/**
 * portcullis — Resume Cache
 *
 * A fingerprint hit is served only from a prior `succeeded` invocation
 * whose output artifacts all still exist. Failed results are never served
 * and entries do not expire.
 */

import type Database from 'better-sqlite3';
import { InvocationRepository } from '../db/repository/invocation-repository.js';
import { ResumeInconsistency } from '../errors.js';
import type { Logger } from '../logger.js';
import { createLogger } from '../logger.js';
import type { Artifact, Invocation } from '../types/entities.js';
import type { ArtifactStore } from './artifact-store.js';

export interface CacheHit {
  /** The successful invocation the result comes from. */
  source: Invocation;
  outputs: Artifact[];
}

export class ResumeCache {
  private readonly invocations: InvocationRepository;
  private readonly store: ArtifactStore;
  private readonly log: Logger;

  constructor(db: Database.Database, store: ArtifactStore, log: Logger = createLogger('cache')) {
    this.invocations = new InvocationRepository(db);
    this.store = store;
    this.log = log;
  }

  lookup(fingerprint: string): CacheHit | undefined {
    const source = this.invocations.findLatestSucceeded(fingerprint);
    if (source === undefined) return undefined;

    try {
      return { source, outputs: this.resolveOutputs(source) };
    } catch (err) {
      if (err instanceof ResumeInconsistency) {
        this.log.warn('cache entry incomplete, re-executing', {
          fingerprint,
          missing: err.missing,
        });
        return undefined;
      }
      throw err;
    }
  }

  /** @throws ResumeInconsistency when an output artifact is gone */
  resolveOutputs(source: Invocation): Artifact[] {
    const outputs: Artifact[] = [];
    const missing: string[] = [];
    for (const hash of source.outputHashes) {
      const artifact = this.store.get(hash);
      if (artifact === undefined) {
        missing.push(hash);
      } else {
        outputs.push(artifact);
      }
    }
    if (missing.length > 0) {
      throw new ResumeInconsistency(source.fingerprint, missing);
    }
    return outputs;
  }
}
