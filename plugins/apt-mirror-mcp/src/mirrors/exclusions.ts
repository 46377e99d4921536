import { ConfigurationError } from "../shared/errors.js";

/** Strip trailing slashes so `http://a/ubuntu/` and `http://a/ubuntu` compare equal. */
export function normalizeMirrorUrl(url: string): string {
  return url.trim().replace(/\/+$/, "");
}

/** Translate a shell glob (`*`, `?`, `[seq]`, `[!seq]`) into an anchored RegExp. */
export function globToRegExp(pattern: string): RegExp {
  if (pattern.length === 0) {
    throw new ConfigurationError("Exclusion pattern must not be empty");
  }
  let source = "";
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === "*") {
      source += ".*";
    } else if (ch === "?") {
      source += ".";
    } else if (ch === "[") {
      const close = findBracketEnd(pattern, i);
      if (close < 0) {
        throw new ConfigurationError(`Unterminated '[' in exclusion pattern '${pattern}'`, { pattern });
      }
      let body = pattern.slice(i + 1, close);
      let negate = false;
      if (body.startsWith("!")) {
        negate = true;
        body = body.slice(1);
      }
      source += `[${negate ? "^" : ""}${body.replace(/[\\\]^]/g, (c) => (c === "]" ? "\\]" : `\\${c}`))}]`;
      i = close;
    } else {
      source += ch.replace(/[.+^${}()|\\/\]]/g, "\\$&");
    }
    i += 1;
  }
  return new RegExp(`^${source}$`);
}

// A `]` right after `[` or `[!` is part of the set.
function findBracketEnd(pattern: string, open: number): number {
  let j = open + 1;
  if (pattern[j] === "!") j += 1;
  if (pattern[j] === "]") j += 1;
  const close = pattern.indexOf("]", j);
  return close;
}

/** Escape a literal URL so it can be added to an exclusion set. */
export function escapeGlob(text: string): string {
  return text.replace(/[*?[]/g, (c) => `[${c}]`);
}

/**
 * Immutable, ordered set of glob patterns matched against normalised mirror URLs.
 * `with()` returns a new set, so exclusions added during one update never leak
 * into another.
 */
export class ExclusionSet {
  private readonly compiled: readonly RegExp[];

  private constructor(readonly patterns: readonly string[], compiled: readonly RegExp[]) {
    this.compiled = compiled;
  }

  static of(patterns: readonly string[] = []): ExclusionSet {
    return new ExclusionSet([...patterns], patterns.map(globToRegExp));
  }

  static empty(): ExclusionSet {
    return ExclusionSet.of([]);
  }

  with(pattern: string): ExclusionSet {
    if (this.patterns.includes(pattern)) return this;
    return new ExclusionSet([...this.patterns, pattern], [...this.compiled, globToRegExp(pattern)]);
  }

  /** Exclude one mirror by its exact (normalised) URL. */
  withMirror(url: string): ExclusionSet {
    return this.with(escapeGlob(normalizeMirrorUrl(url)));
  }

  matches(url: string): boolean {
    const normalized = normalizeMirrorUrl(url);
    return this.compiled.some((re) => re.test(normalized));
  }

  get size(): number {
    return this.patterns.length;
  }
}
