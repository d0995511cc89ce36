/**
 * portcullis — Artifact Store
 *
 * Content-addressed, append-only store of typed artifacts and raw tool
 * output blobs. Run membership is a link, so a cached result can be
 * attached to a new run without copying anything.
 */

import type Database from 'better-sqlite3';
import { ArtifactRepository } from '../db/repository/artifact-repository.js';
import { RawOutputRepository } from '../db/repository/raw-output-repository.js';
import { InternalOrchestrationError } from '../errors.js';
import type { Artifact, NewArtifact } from '../types/entities.js';
import type { RawOutput } from '../types/repository.js';
import type { ArtifactType } from '../types/tool.js';
import { artifactHash, canonicalHash, sha256, stableStringify } from './canonical.js';

/** The string a consuming tool receives for an artifact. */
export function artifactValue(artifact: Artifact): string {
  return artifact.type === 'target' ? artifact.content.value : artifact.content.asset;
}

function canonicalHashOf(input: NewArtifact): string {
  switch (input.type) {
    case 'target':
      return canonicalHash('target', input.content.value, input.content.digest);
    case 'finding':
      return canonicalHash('finding', input.content.id);
    case 'asset':
    case 'path':
      return canonicalHash(input.type, input.content.asset);
    default: {
      const _exhaustive: never = input;
      throw new Error(`Unknown artifact: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

function toArtifact(input: NewArtifact, createdAt: string): Artifact {
  const hash = artifactHash(input.content, input.producerFingerprint);
  const base = {
    hash,
    canonicalHash: canonicalHashOf(input),
    producerFingerprint: input.producerFingerprint,
    createdAt,
  };
  return input.type === 'target'
    ? { ...base, type: 'target', content: input.content }
    : { ...base, type: input.type, content: input.content };
}

export class ArtifactStore {
  private readonly artifacts: ArtifactRepository;
  private readonly rawOutputs: RawOutputRepository;

  constructor(db: Database.Database) {
    this.artifacts = new ArtifactRepository(db);
    this.rawOutputs = new RawOutputRepository(db);
  }

  /**
   * Store an artifact (write-once) and return the stored entity.
   *
   * @throws InternalOrchestrationError when the hash is already taken by different content
   */
  put(input: NewArtifact): Artifact {
    const candidate = toArtifact(input, new Date().toISOString());
    if (this.artifacts.insert(candidate) === 'inserted') {
      return candidate;
    }

    const existing = this.artifacts.findByHash(candidate.hash);
    if (
      existing === undefined ||
      existing.type !== candidate.type ||
      stableStringify(existing.content) !== stableStringify(candidate.content)
    ) {
      throw new InternalOrchestrationError(`Artifact hash collision: ${candidate.hash}`);
    }
    return existing;
  }

  get(hash: string): Artifact | undefined {
    return this.artifacts.findByHash(hash);
  }

  link(runId: string, hash: string, phase: string): void {
    this.artifacts.link(runId, hash, phase, new Date().toISOString());
  }

  /** Artifacts linked to a run, ordered by hash. */
  byRun(runId: string, type?: ArtifactType): Artifact[] {
    return this.artifacts.findByRun(runId, type);
  }

  /** Store a raw output blob and return its SHA-256. */
  putRaw(content: string): string {
    const buffer = Buffer.from(content, 'utf8');
    const hash = sha256(buffer);
    this.rawOutputs.insert(hash, buffer, new Date().toISOString());
    return hash;
  }

  getRaw(hash: string): RawOutput | undefined {
    return this.rawOutputs.findBySha256(hash);
  }
}
