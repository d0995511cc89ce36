/**
 * portcullis — Canonical hashing
 *
 * stableStringify: key-sorted JSON so that equal values hash equally no
 * matter how their objects were built. Every identity in the system
 * (artifact hash, canonical hash, fingerprint, finding id) goes through it.
 */

import crypto from 'node:crypto';
import type { ArtifactType, ToolDescriptor } from '../types/tool.js';

export function sha256(data: string | Buffer): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

/** JSON.stringify with recursively sorted object keys. `undefined` members are omitted. */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => (item === undefined ? 'null' : stableStringify(item))).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
  return `{${entries.join(',')}}`;
}

/** Store identity of an artifact. */
export function artifactHash(content: unknown, producerFingerprint: string): string {
  return sha256(`${stableStringify(content)}\n${producerFingerprint}`);
}

/**
 * What a consuming tool actually receives: type + value (+ digest for
 * packages). Two producers reporting the same host share a canonical hash.
 */
export function canonicalHash(type: ArtifactType, value: string, digest?: string): string {
  const parts = digest === undefined ? [type, value] : [type, value, digest];
  return sha256(parts.join('\0'));
}

/** Sorted, de-duplicated copy. */
export function sortedUnique(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

/**
 * Deterministic invocation identity. Input order does not matter; the
 * wall clock never enters it.
 */
export function computeFingerprint(tool: ToolDescriptor, inputCanonicalHashes: string[]): string {
  return sha256(
    stableStringify({
      tool: tool.name,
      version: tool.version,
      image: tool.image,
      args: tool.args,
      outputFile: tool.outputFile ?? null,
      mounts: tool.mounts,
      inputs: sortedUnique(inputCanonicalHashes),
    }),
  );
}

/** Combination hash of an input set, used as the in-phase ordering key. */
export function computeInputDigest(inputCanonicalHashes: string[]): string {
  return sha256(sortedUnique(inputCanonicalHashes).join('\n'));
}
