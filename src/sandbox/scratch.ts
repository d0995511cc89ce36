/**
 * portcullis — Per-invocation scratch directories
 *
 * <tmp>/portcullis-XXXXXX/
 *   input/   <type>.txt files (one value per line) + package mount points
 *   output/  writable by the tool
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { ArtifactType } from '../types/tool.js';
import type { SandboxInput } from './types.js';

export const CONTAINER_INPUT_DIR = '/work/input';
export const CONTAINER_OUTPUT_DIR = '/work/output';
export const CONTAINER_WORDLIST_DIR = '/work/wordlists';

/** A package to bind-mount: host path → container path. */
export interface PackageMount {
  host: string;
  container: string;
}

export interface Scratch {
  root: string;
  inputDir: string;
  outputDir: string;
  packages: PackageMount[];
  /** Container-side value of `{input.<type>}` per type. */
  inputPaths: Map<ArtifactType, string>;
}

/** Container path under /work/input for a package, de-duplicated by position. */
function packageContainerPath(location: string, taken: Set<string>): string {
  const base = path.basename(location);
  let name = base;
  for (let i = 1; taken.has(name); i++) {
    name = `${i}-${base}`;
  }
  taken.add(name);
  return `${CONTAINER_INPUT_DIR}/${name}`;
}

/**
 * Create the scratch directory and its input files.
 *
 * `{input.<type>}` becomes the container path of the package when the type
 * carries exactly one app package, the `<type>.txt` list otherwise.
 */
export async function createScratch(
  consumes: readonly ArtifactType[],
  inputs: readonly SandboxInput[],
): Promise<Scratch> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'portcullis-'));
  const inputDir = path.join(root, 'input');
  const outputDir = path.join(root, 'output');
  const packages: PackageMount[] = [];
  const inputPaths = new Map<ArtifactType, string>();

  try {
    await fs.mkdir(inputDir);
    await fs.mkdir(outputDir);
    // containers may run as an arbitrary uid
    await fs.chmod(outputDir, 0o777);

    const taken = new Set<string>();

    for (const type of consumes) {
      const ofType = inputs.filter((i) => i.type === type);
      const values: string[] = [];

      for (const input of ofType) {
        if (input.location === undefined) {
          values.push(input.value);
          continue;
        }
        const container = packageContainerPath(input.location, taken);
        packages.push({ host: input.location, container });
        // mount point inside the read-only input mount
        await fs.writeFile(path.join(inputDir, path.posix.basename(container)), '');
        values.push(container);
      }

      const listFile = `${type}.txt`;
      await fs.writeFile(path.join(inputDir, listFile), values.length > 0 ? `${values.join('\n')}\n` : '');

      const listPath = `${CONTAINER_INPUT_DIR}/${listFile}`;
      const single = ofType.length === 1 ? ofType[0] : undefined;
      inputPaths.set(type, single?.location !== undefined ? (values[0] ?? listPath) : listPath);
    }
  } catch (err) {
    await fs.rm(root, { recursive: true, force: true });
    throw err;
  }

  return { root, inputDir, outputDir, packages, inputPaths };
}

/** Read the tool's output file, or undefined when it wrote none. */
export async function readOutputFile(scratch: Scratch, outputFile: string): Promise<string | undefined> {
  try {
    return await fs.readFile(path.join(scratch.outputDir, outputFile), 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return undefined;
    }
    throw err;
  }
}

export async function removeScratch(scratch: Scratch): Promise<void> {
  await fs.rm(scratch.root, { recursive: true, force: true });
}
