const regexCache = new Map<string, RegExp>();

/**
 * Match a file name against a task pattern: a comma-separated list of globs,
 * optionally prefixed with `!`. For a negated list, "no alternative matched"
 * is the positive result.
 */
export function matchFileName(pattern: string, name: string): boolean {
  const negated = pattern.startsWith('!');
  const body = negated ? pattern.replace(/^!+/, '') : pattern;
  for (const part of body.split(',')) {
    if (globToRegExp(part).test(name)) {
      return !negated;
    }
  }
  return negated;
}

export function matchesAny(patterns: readonly string[], name: string): boolean {
  return patterns.some((pattern) => globToRegExp(pattern).test(name));
}

/**
 * Compile a shell glob to an anchored, case-insensitive RegExp.
 * `*` and `?` also match `/`; `[...]` supports ranges and `!`/`^` negation.
 */
export function globToRegExp(glob: string): RegExp {
  const cached = regexCache.get(glob);
  if (cached) return cached;

  let re = '^';
  let i = 0;
  while (i < glob.length) {
    const c = glob.charAt(i);
    if (c === '*') {
      re += '.*';
      i++;
      continue;
    }
    if (c === '?') {
      re += '.';
      i++;
      continue;
    }
    if (c === '\\' && i + 1 < glob.length) {
      re += escapeRegExpChar(glob.charAt(i + 1));
      i += 2;
      continue;
    }
    if (c === '[') {
      const cls = readCharClass(glob, i);
      if (cls) {
        re += cls.source;
        i = cls.end;
        continue;
      }
    }
    re += escapeRegExpChar(c);
    i++;
  }
  re += '$';

  const compiled = new RegExp(re, 'is');
  regexCache.set(glob, compiled);
  return compiled;
}

/** Returns null for an unterminated class, which is then matched literally. */
function readCharClass(glob: string, start: number): { source: string; end: number } | null {
  let i = start + 1;
  let negated = false;
  if (glob.charAt(i) === '!' || glob.charAt(i) === '^') {
    negated = true;
    i++;
  }

  let body = '';
  // A leading ']' is a literal member.
  if (glob.charAt(i) === ']') {
    body += '\\]';
    i++;
  }
  while (i < glob.length && glob.charAt(i) !== ']') {
    const c = glob.charAt(i);
    if (c === '\\' && i + 1 < glob.length) {
      body += escapeClassChar(glob.charAt(i + 1));
      i += 2;
      continue;
    }
    body += c === '-' ? '-' : escapeClassChar(c);
    i++;
  }
  if (i >= glob.length) {
    return null;
  }
  return { source: `[${negated ? '^' : ''}${body}]`, end: i + 1 };
}

function escapeRegExpChar(c: string): string {
  return /[\\^$.*+?()[\]{}|/]/.test(c) ? `\\${c}` : c;
}

function escapeClassChar(c: string): string {
  return /[\\\]^[]/.test(c) ? `\\${c}` : c;
}
