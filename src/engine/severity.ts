/**
 * portcullis — Severity ladder
 *
 * info < low < medium < high < critical. Tool-specific labels are folded
 * onto the ladder; assets and paths carry no severity (null).
 */

import { SEVERITIES, type Severity } from '../types/entities.js';

const SEVERITY_ALIASES: Record<string, Severity> = {
  info: 'info',
  informational: 'info',
  information: 'info',
  good: 'info',
  secure: 'info',
  low: 'low',
  medium: 'medium',
  moderate: 'medium',
  warning: 'medium',
  high: 'high',
  critical: 'critical',
};

export function severityRank(severity: Severity | null): number {
  return severity === null ? -1 : SEVERITIES.indexOf(severity);
}

/** Map a tool label onto the ladder. Unknown labels become `info`. */
export function normalizeSeverity(raw: string | undefined): Severity | null {
  if (raw === undefined) return null;
  const key = raw.trim().toLowerCase();
  if (key === '') return null;
  return SEVERITY_ALIASES[key] ?? 'info';
}

export function severityAtLeast(severity: Severity | null, minimum: Severity): boolean {
  return severityRank(severity) >= severityRank(minimum);
}
