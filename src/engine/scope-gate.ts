/**
 * portcullis — Scope Gate
 *
 * Validates targets against allow/deny rules before anything executes.
 * Pure: no I/O except loadScope().
 *
 * Matching:
 *   example.com    exact (case-insensitive, trailing dot ignored)
 *   *.example.com  strict sub-domains only; the apex does not match
 *   app packages   exact, case-sensitive, against the file identifier
 * Deny always wins. No allow match means rejection.
 */

import fs from 'node:fs';
import net from 'node:net';
import YAML from 'yaml';
import { z } from 'zod';
import { InputError, ScopeViolation, errorMessage } from '../errors.js';
import type { Target, TargetKind } from '../types/entities.js';

export type ScopeEffect = 'allow' | 'deny';

export interface ScopeRule {
  effect: ScopeEffect;
  /** The pattern as written in the scope document. */
  pattern: string;
  match: 'exact' | 'suffix';
}

/** A target before admission. */
export interface TargetCandidate {
  value: string;
  kind: TargetKind;
  location?: string;
  digest?: string;
}

// ============================================================
// Host normalization
// ============================================================

/**
 * Reduce a domain, host, URL or `host:port` to a lowercase hostname without
 * trailing dots. Returns undefined when nothing host-like remains.
 */
export function normalizeHost(value: string): string | undefined {
  let host = value.trim();
  if (host === '') return undefined;

  if (host.includes('://')) {
    try {
      host = new URL(host).hostname;
    } catch {
      return undefined;
    }
  } else {
    host = host.split(/[/?#]/, 1)[0] ?? '';
    const portMatch = /^([^:]+):\d+$/.exec(host);
    if (portMatch?.[1] !== undefined) host = portMatch[1];
  }

  if (host.startsWith('[') && host.endsWith(']')) host = host.slice(1, -1);
  host = host.toLowerCase().replace(/\.+$/, '');
  return host === '' ? undefined : host;
}

/** IP literals are hosts; everything else is a domain. */
export function classifyHost(host: string): Extract<TargetKind, 'domain' | 'host'> {
  return net.isIP(host) === 0 ? 'domain' : 'host';
}

// ============================================================
// Rules
// ============================================================

export function parseScopeRule(effect: ScopeEffect, pattern: string): ScopeRule {
  const trimmed = pattern.trim();
  return {
    effect,
    pattern: trimmed,
    match: trimmed.startsWith('*.') ? 'suffix' : 'exact',
  };
}

function ruleMatches(rule: ScopeRule, target: TargetCandidate): boolean {
  if (target.kind === 'app_package') {
    return rule.match === 'exact' && rule.pattern === target.value;
  }

  const host = normalizeHost(target.value);
  if (host === undefined) return false;

  if (rule.match === 'suffix') {
    const base = normalizeHost(rule.pattern.slice(2));
    return base !== undefined && host.endsWith(`.${base}`);
  }
  return normalizeHost(rule.pattern) === host;
}

/**
 * Admit every target or none.
 *
 * @throws ScopeViolation listing each rejected target
 */
export function validate(targets: TargetCandidate[], rules: ScopeRule[]): Target[] {
  const allows = rules.filter((r) => r.effect === 'allow');
  const denies = rules.filter((r) => r.effect === 'deny');
  const violations: string[] = [];
  const admitted: Target[] = [];

  for (const candidate of targets) {
    const denied = denies.find((r) => ruleMatches(r, candidate));
    if (denied !== undefined) {
      violations.push(`${candidate.value} is explicitly denied (${denied.pattern})`);
      continue;
    }
    const allowed = allows.find((r) => ruleMatches(r, candidate));
    if (allowed === undefined) {
      violations.push(`${candidate.value} is not in allow list`);
      continue;
    }
    admitted.push({
      value: candidate.value,
      kind: candidate.kind,
      matchedRule: allowed.pattern,
      ...(candidate.location !== undefined ? { location: candidate.location } : {}),
      ...(candidate.digest !== undefined ? { digest: candidate.digest } : {}),
    });
  }

  if (violations.length > 0) {
    throw new ScopeViolation(violations);
  }
  return admitted;
}

/** Whether a discovered host or URL stays inside scope. */
export function isInScope(value: string, rules: ScopeRule[]): boolean {
  const host = normalizeHost(value);
  if (host === undefined) return false;
  const candidate: TargetCandidate = { value: host, kind: classifyHost(host) };
  if (rules.some((r) => r.effect === 'deny' && ruleMatches(r, candidate))) return false;
  return rules.some((r) => r.effect === 'allow' && ruleMatches(r, candidate));
}

// ============================================================
// Scope document
// ============================================================

const ScopeDocumentSchema = z
  .object({
    allow: z.array(z.string().min(1)).nullish(),
    deny: z.array(z.string().min(1)).nullish(),
  })
  .nullish();

/** Parse a YAML `{ allow: [...], deny: [...] }` document into rules. */
export function parseScopeDocument(text: string): ScopeRule[] {
  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (err) {
    throw new InputError(`Invalid scope document: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = ScopeDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new InputError(`Invalid scope document: ${detail}`);
  }
  const doc = parsed.data ?? {};
  return [
    ...(doc.deny ?? []).map((p) => parseScopeRule('deny', p)),
    ...(doc.allow ?? []).map((p) => parseScopeRule('allow', p)),
  ];
}

export function loadScope(filePath: string): ScopeRule[] {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new InputError(`Cannot read scope file ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  return parseScopeDocument(text);
}
