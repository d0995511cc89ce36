/**
 * portcullis — Target preparation
 *
 * web:         a targets file, one domain / host / URL per line
 * android/ios: a single package file, identified by its base name and digest
 */

import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { PACKAGE_EXTENSIONS } from '../domains/index.js';
import { InputError, errorMessage } from '../errors.js';
import type { Domain } from '../types/tool.js';
import { classifyHost, normalizeHost, type TargetCandidate } from './scope-gate.js';

/** Parse targets-file content. Blank lines are ignored, duplicates dropped. */
export function parseTargetList(text: string): TargetCandidate[] {
  const seen = new Set<string>();
  const targets: TargetCandidate[] = [];
  const invalid: string[] = [];

  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '') continue;
    const host = normalizeHost(trimmed);
    if (host === undefined) {
      invalid.push(trimmed);
      continue;
    }
    if (seen.has(host)) continue;
    seen.add(host);
    targets.push({ value: host, kind: classifyHost(host) });
  }

  if (invalid.length > 0) {
    throw new InputError(`Unparseable targets: ${invalid.join(', ')}`);
  }
  return targets;
}

function fileDigest(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    fs.createReadStream(filePath)
      .on('data', (chunk: string | Buffer) => hash.update(chunk))
      .on('error', reject)
      .on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * Turn a CLI argument into target candidates for a domain.
 *
 * @throws InputError when the file is unreadable, empty or has the wrong extension
 */
export async function resolveTargets(domain: Domain, input: string): Promise<TargetCandidate[]> {
  const location = path.resolve(input);

  if (domain === 'web') {
    let text: string;
    try {
      text = await fs.promises.readFile(location, 'utf8');
    } catch (err) {
      throw new InputError(`Cannot read targets file ${input}: ${errorMessage(err)}`, { cause: err });
    }
    const targets = parseTargetList(text);
    if (targets.length === 0) {
      throw new InputError(`Targets file ${input} contains no targets`);
    }
    return targets;
  }

  const extension = PACKAGE_EXTENSIONS[domain];
  if (path.extname(location).toLowerCase() !== extension) {
    throw new InputError(`${domain} target must be a ${extension} file: ${input}`);
  }

  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(location);
  } catch (err) {
    throw new InputError(`Cannot read package ${input}: ${errorMessage(err)}`, { cause: err });
  }
  if (!stat.isFile()) {
    throw new InputError(`Package is not a regular file: ${input}`);
  }

  return [
    {
      value: path.basename(location),
      kind: 'app_package',
      location,
      digest: await fileDigest(location),
    },
  ];
}
