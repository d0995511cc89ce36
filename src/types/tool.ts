/**
 * portcullis — Tool catalog type definitions
 *
 * ToolDescriptor / PhaseDefinition とその Zod スキーマ。
 * カタログは起動時に一度だけ検証され、以後は不変として扱う。
 */

import { z } from 'zod';

// ============================================================
// 列挙
// ============================================================

export const ARTIFACT_TYPES = ['target', 'asset', 'path', 'finding'] as const;
export type ArtifactType = (typeof ARTIFACT_TYPES)[number];

export const DOMAINS = ['web', 'android', 'ios'] as const;
export type Domain = (typeof DOMAINS)[number];

// ============================================================
// ToolDescriptor
// ============================================================

/** A host file bind-mounted read-only into the tool container. */
export const ToolMountSchema = z.object({
  /** Host path. `{wordlists}` expands to the configured wordlist directory. */
  host: z.string().min(1),
  container: z.string().startsWith('/'),
});
export type ToolMount = z.infer<typeof ToolMountSchema>;

/** A relative path that stays inside /work/output. */
const OutputFileSchema = z
  .string()
  .min(1)
  .refine((f) => !f.startsWith('/') && !f.split('/').includes('..'), {
    message: 'outputFile must be a relative path inside the output directory',
  });

export const ToolDescriptorSchema = z
  .object({
    name: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/),
    version: z.string().min(1),
    image: z.string().min(1),
    consumes: z.array(z.enum(ARTIFACT_TYPES)).min(1),
    produces: z.array(z.enum(ARTIFACT_TYPES)).min(1),
    /** batch: 1 invocation with every input. each: 1 invocation per primary input. */
    fanOut: z.enum(['batch', 'each']),
    /** Container arguments; placeholders are expanded by the sandbox. */
    args: z.array(z.string()),
    /** File the tool writes under /work/output. Omitted means stdout is the raw output. */
    outputFile: OutputFileSchema.optional(),
    mounts: z.array(ToolMountSchema).default([]),
    timeoutMs: z.number().int().positive().optional(),
    /** A failed invocation of this tool fails the whole run. */
    hardDependency: z.boolean().default(false),
    /** Parser key registered with the normalizer. */
    parser: z.string().min(1),
    /** Drop produced asset/path artifacts whose host falls outside scope. */
    scopeFiltered: z.boolean().default(false),
  })
  .refine(
    (tool) => tool.outputFile !== undefined || !tool.args.some((a) => a.includes('{output}')),
    { message: '{output} placeholder requires outputFile', path: ['outputFile'] },
  );
export type ToolDescriptor = z.infer<typeof ToolDescriptorSchema>;
export type ToolDescriptorInput = z.input<typeof ToolDescriptorSchema>;

// ============================================================
// Phase / Plan
// ============================================================

export const PhaseDefinitionSchema = z.object({
  name: z.string().min(1),
  tools: z.array(z.string().min(1)).min(1),
});
export type PhaseDefinition = z.infer<typeof PhaseDefinitionSchema>;

/** A domain catalog: descriptors plus the ordered phase plan over them. */
export interface DomainCatalog {
  domain: Domain;
  tools: ToolDescriptorInput[];
  phases: PhaseDefinition[];
}
