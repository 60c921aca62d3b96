import { spawnSync } from 'node:child_process';

export class GitError extends Error {
  constructor(message: string, readonly status: number | null) {
    super(message);
    this.name = 'GitError';
  }
}

export function git(args: string[], opts: { cwd?: string } = {}): string {
  const res = spawnSync('git', args, { cwd: opts.cwd, encoding: 'utf8', stdio: 'pipe' });
  if (res.error) throw new GitError(res.error.message, null);
  if (res.status !== 0) {
    const msg = res.stderr?.toString().trim() || `git ${args.join(' ')} failed with code ${res.status}`;
    throw new GitError(msg, res.status);
  }
  return res.stdout?.toString() ?? '';
}

export function gitStagedFiles(cwd = process.cwd()): string[] {
  // added, copied, modified, renamed: deletions have nothing to check
  const out = git(['diff', '--cached', '--name-only', '-z', '--diff-filter=ACMR'], { cwd });
  return out.split('\u0000').filter(Boolean);
}

export function gitRoot(cwd = process.cwd()): string | null {
  try { return git(['rev-parse', '--show-toplevel'], { cwd }).trim() || null; } catch { return null; }
}

/** Staged blob for `file`, i.e. the bytes the commit will record after clean filters ran. */
export function gitIndexContent(file: string, cwd = process.cwd()): Buffer {
  const res = spawnSync('git', ['cat-file', 'blob', `:${file}`], { cwd, stdio: 'pipe' });
  if (res.error) throw new GitError(res.error.message, null);
  if (res.status !== 0) {
    const msg = res.stderr.toString().trim() || `git cat-file blob :${file} failed with code ${res.status}`;
    throw new GitError(msg, res.status);
  }
  return res.stdout;
}
