import fs from 'node:fs/promises';
import type { Policy, PolicyRule } from '../types.js';
import { DEFAULT_DIRECTIVE_MARKERS } from './markers.js';
import { isValidPattern, patternMatches } from './utils/glob.js';

const RULE_LINE = /^(\S+)\s+(.+)$/;

export function isEncryptionDirective(directive: string, markers: readonly string[] = DEFAULT_DIRECTIVE_MARKERS): boolean {
  return markers.some((m) => directive.includes(m));
}

/**
 * Parses gitattributes-shaped text into the encryption-relevant rules, in
 * file order. Comments, blank lines and lines not shaped `<pattern> <attrs>`
 * are dropped, and so are patterns that do not compile.
 */
export function parseRules(text: string, markers: readonly string[] = DEFAULT_DIRECTIVE_MARKERS): PolicyRule[] {
  const rules: PolicyRule[] = [];
  const lines = text.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].replace(/\r$/, '');
    if (!line.trim() || /^\s*#/.test(line)) continue;
    const m = RULE_LINE.exec(line);
    if (!m) continue;
    const [, pattern, directive] = m;
    if (!isEncryptionDirective(directive, markers)) continue;
    if (!isValidPattern(pattern)) continue;
    rules.push({ pattern, directive: directive.trim(), line: i + 1 });
  }
  return rules;
}

/** Reads the rules file once; null when it does not exist. */
export async function loadPolicy(rulesFile: string, markers?: readonly string[]): Promise<Policy | null> {
  let text: string;
  try {
    text = await fs.readFile(rulesFile, 'utf8');
  } catch (e) {
    if (isNotFound(e)) return null;
    throw e;
  }
  return { source: rulesFile, rules: parseRules(text, markers) };
}

// First match wins; later rules never override earlier ones.
export function matchRule(path: string, policy: Policy): PolicyRule | undefined {
  return policy.rules.find((r) => patternMatches(r.pattern, path));
}

export async function isGoverned(path: string, rulesFile: string): Promise<{ governed: boolean; rule?: PolicyRule }> {
  const policy = await loadPolicy(rulesFile);
  const rule = policy ? matchRule(path, policy) : undefined;
  return rule ? { governed: true, rule } : { governed: false };
}

export function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && (e.code === 'ENOENT' || e.code === 'ENOTDIR');
}
