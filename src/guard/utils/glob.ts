// Glob matcher for rules-file patterns: **, *, ?, [...] classes and a leading / anchor.
// Paths are matched POSIX-style with forward slashes.

export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/').replace(/^(?:\.\/)+/, '');
}

export function toRegex(glob: string): RegExp {
  let re = '^';
  let i = 0;
  while (i < glob.length) {
    const c = glob[i];
    if (c === '*') {
      if (glob[i + 1] === '*') {
        // ** -> match across segments
        while (glob[i + 1] === '*') i++;
        if (glob[i + 1] === '/') { i++; re += '(?:.*/)?'; }
        else re += '.*';
      } else {
        re += '[^/]*';
      }
    } else if (c === '?') {
      re += '[^/]';
    } else if (c === '[') {
      const end = glob.indexOf(']', i + 2);
      if (end === -1) {
        re += '\\[';
      } else {
        let body = glob.slice(i + 1, end);
        if (body.startsWith('!')) body = '^' + body.slice(1);
        re += '[' + body.replace(/\\/g, '\\\\') + ']';
        i = end;
      }
    } else if ('.+^$(){}|\\]'.includes(c)) {
      re += '\\' + c;
    } else {
      re += c;
    }
    i++;
  }
  re += '$';
  return new RegExp(re);
}

/**
 * Tests `path` against a rules-file pattern.
 *
 * A pattern without a slash also matches the basename at any depth, and a
 * trailing `/**` matches the directory itself and everything beneath it.
 */
export function patternMatches(pattern: string, path: string): boolean {
  const p = normalizePath(path);
  let pat = pattern.replace(/\\/g, '/');
  const anchored = pat.startsWith('/');
  if (anchored) pat = pat.slice(1);
  if (!pat) return false;

  if (toRegex(pat).test(p)) return true;

  if (pat.endsWith('/**')) {
    const dirPrefix = pat.slice(0, -3);
    if (p.startsWith(`${dirPrefix}/`)) return true;
  }

  if (!anchored && !pat.includes('/')) {
    const base = p.slice(p.lastIndexOf('/') + 1);
    return toRegex(pat).test(base);
  }
  return false;
}

/** False when the pattern cannot be compiled, e.g. a reversed range like `[z-a]`. */
export function isValidPattern(pattern: string): boolean {
  const pat = pattern.replace(/\\/g, '/').replace(/^\//, '');
  if (!pat) return false;
  try {
    toRegex(pat);
    return true;
  } catch {
    return false;
  }
}

export function isUnder(dir: string, path: string): boolean {
  const d = normalizePath(dir).replace(/\/+$/, '');
  if (!d || d === '.') return true;
  return normalizePath(path).startsWith(`${d}/`);
}
