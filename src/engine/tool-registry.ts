/**
 * portcullis — Tool Registry
 *
 * A static, immutable catalog of tool descriptors plus the ordered phase
 * plan over them. Validated once at startup.
 */

import { z } from 'zod';
import { InternalOrchestrationError } from '../errors.js';
import type {
  Domain,
  DomainCatalog,
  PhaseDefinition,
  ToolDescriptor,
} from '../types/tool.js';
import { PhaseDefinitionSchema, ToolDescriptorSchema } from '../types/tool.js';

/** A phase with its descriptors resolved. */
export interface PlannedPhase {
  name: string;
  tools: ToolDescriptor[];
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

export class ToolRegistry {
  readonly domain: Domain;
  private readonly tools = new Map<string, ToolDescriptor>();
  private readonly phaseDefs: PhaseDefinition[];

  /**
   * @param hasParser lookup used to reject descriptors whose parser is not registered
   * @throws InternalOrchestrationError on any invalid descriptor or phase
   */
  constructor(catalog: DomainCatalog, hasParser?: (key: string) => boolean) {
    this.domain = catalog.domain;

    for (const input of catalog.tools) {
      const parsed = ToolDescriptorSchema.safeParse(input);
      if (!parsed.success) {
        throw new InternalOrchestrationError(
          `Invalid tool descriptor in ${catalog.domain} catalog: ${describeIssues(parsed.error)}`,
        );
      }
      const tool = parsed.data;
      if (this.tools.has(tool.name)) {
        throw new InternalOrchestrationError(`Duplicate tool descriptor: ${tool.name}`);
      }
      if (hasParser !== undefined && !hasParser(tool.parser)) {
        throw new InternalOrchestrationError(`Tool ${tool.name} references unknown parser "${tool.parser}"`);
      }
      this.tools.set(tool.name, Object.freeze(tool));
    }

    const phases = z.array(PhaseDefinitionSchema).min(1).safeParse(catalog.phases);
    if (!phases.success) {
      throw new InternalOrchestrationError(
        `Invalid phase plan for ${catalog.domain}: ${describeIssues(phases.error)}`,
      );
    }

    const seenPhases = new Set<string>();
    const scheduled = new Set<string>();
    for (const phase of phases.data) {
      if (seenPhases.has(phase.name)) {
        throw new InternalOrchestrationError(`Duplicate phase: ${phase.name}`);
      }
      seenPhases.add(phase.name);
      for (const name of phase.tools) {
        if (!this.tools.has(name)) {
          throw new InternalOrchestrationError(`Phase ${phase.name} references unknown tool ${name}`);
        }
        if (scheduled.has(name)) {
          throw new InternalOrchestrationError(`Tool ${name} is scheduled in more than one phase`);
        }
        scheduled.add(name);
      }
    }
    this.phaseDefs = phases.data;
  }

  /** @throws InternalOrchestrationError for an unknown tool */
  get(name: string): ToolDescriptor {
    const tool = this.tools.get(name);
    if (tool === undefined) {
      throw new InternalOrchestrationError(`Unknown tool: ${name}`);
    }
    return tool;
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()];
  }

  /** The phase plan with descriptors resolved, in execution order. */
  plan(): PlannedPhase[] {
    return this.phaseDefs.map((phase) => ({
      name: phase.name,
      tools: phase.tools.map((name) => this.get(name)),
    }));
  }
}
