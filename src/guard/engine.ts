import fs from 'node:fs/promises';
import path from 'node:path';
import pMap from 'p-map';
import type { CheckReport, ContentSource, FileResult, Policy, PolicyMode } from '../types.js';
import { classify, type ClassifyOptions } from './classify.js';
import { isNotFound, loadPolicy, matchRule } from './policy.js';
import { gitIndexContent } from './utils/git.js';
import { isUnder, normalizePath } from './utils/glob.js';

export const DEFAULT_RULES_FILE = '.gitattributes';
export const DEFAULT_CONCURRENCY = 8;

export type CheckOptions = ClassifyOptions & {
  cwd?: string;
  rulesFile?: string;
  policy?: PolicyMode;
  scope?: string;
  extensions?: string[];
  source?: ContentSource;
  directiveMarkers?: readonly string[];
  /** Files read at the same time. */
  concurrency?: number;
};

export function hasExtension(file: string, extensions: string[]): boolean {
  if (!extensions.length) return true;
  const ext = path.posix.extname(file).slice(1).toLowerCase();
  return extensions.some((e) => e.replace(/^\./, '').toLowerCase() === ext);
}

/** Absolute paths are made relative to `cwd`; rules only ever see repository-relative paths. */
export function toRepoPath(file: string, cwd: string): string {
  return normalizePath(path.isAbsolute(file) ? path.relative(cwd, file) : file);
}

export function selectCandidates(files: string[], opts: Pick<CheckOptions, 'cwd' | 'scope' | 'extensions'>): string[] {
  const { cwd = process.cwd(), scope, extensions = [] } = opts;
  return files
    .map((f) => toRepoPath(f, cwd))
    .filter((f) => f && hasExtension(f, extensions))
    .filter((f) => !scope || isUnder(scope, f));
}

async function readContent(file: string, cwd: string, source: ContentSource): Promise<Uint8Array> {
  if (source === 'index') return gitIndexContent(file, cwd);
  return fs.readFile(path.resolve(cwd, file));
}

async function checkFile(file: string, policy: Policy | null, opts: CheckOptions): Promise<FileResult> {
  const { cwd = process.cwd(), source = 'worktree', policy: mode = 'attributes' } = opts;

  const rule = mode === 'scope' ? undefined : policy ? matchRule(file, policy) : undefined;
  if (mode === 'attributes' && !rule) return { path: file, verdict: 'ungoverned' };

  let bytes: Uint8Array;
  try {
    bytes = await readContent(file, cwd, source);
  } catch (e) {
    const reason = isNotFound(e) ? 'missing' : e instanceof Error ? e.message : String(e);
    return { path: file, verdict: 'skipped', rule, reason };
  }

  const { encrypted, evidence } = classify(bytes, opts);
  return { path: file, verdict: encrypted ? 'governed-encrypted' : 'governed-plaintext', rule, evidence };
}

/**
 * Checks every candidate file and aggregates the batch verdict. The batch
 * fails iff at least one governed file is plaintext; ungoverned and skipped
 * files never count.
 */
export async function runCheck(files: string[], opts: CheckOptions = {}): Promise<CheckReport> {
  const { cwd = process.cwd(), rulesFile = DEFAULT_RULES_FILE, policy: mode = 'attributes', concurrency = DEFAULT_CONCURRENCY } = opts;
  const rulesPath = path.resolve(cwd, rulesFile);

  const policy = mode === 'attributes' ? await loadPolicy(rulesPath, opts.directiveMarkers) : null;
  const candidates = selectCandidates(files, opts);
  // results keep candidate order
  const results = await pMap(candidates, (f) => checkFile(f, policy, opts), { concurrency });

  const violations = results.filter((r) => r.verdict === 'governed-plaintext').map((r) => r.path);
  const encrypted = results.filter((r) => r.verdict === 'governed-encrypted').length;
  const skipped = results.flatMap((r) => (r.verdict === 'skipped' ? [{ path: r.path, reason: r.reason ?? 'unreadable' }] : []));

  return {
    status: violations.length ? 'fail' : 'pass',
    mode,
    scope: opts.scope,
    policyFound: mode === 'scope' || policy !== null,
    rulesFile: rulesPath,
    checked: encrypted + violations.length,
    encrypted,
    violations,
    skipped,
    results,
  };
}
