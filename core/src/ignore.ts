/**
 * Include and exclude rule matching.
 * Includes are globs (`*`, `**`, `?`, `{a,b}`, classes); a path is tracked
 * when any one matches. Excludes use gitignore syntax: later rules win and
 * `!` re-includes.
 */

import ignoreModule from 'ignore';
import { Minimatch } from 'minimatch';

/** The client's own bookkeeping directory, never synchronized */
export const STATE_DIRECTORY = '.modsync';

export const DEFAULT_EXCLUDE_PATTERNS = [`${STATE_DIRECTORY}/`];

export interface IncludeMatcher {
  /** Whether `path` (relative, forward slashes) matches any include glob */
  matches(path: string): boolean;
}

export interface PathMatcher {
  /** Whether `path` (relative, forward slashes) matches the rules */
  matches(path: string): boolean;
  filter(paths: string[]): string[];
  add(patterns: string[]): void;
}

/**
 * Create a matcher from gitignore-style patterns
 */
export function createPathMatcher(patterns: string[] = []): PathMatcher {
  const ig = ignoreModule().add(patterns);

  return {
    matches(path: string): boolean {
      return ig.ignores(normalizePath(path));
    },

    filter(paths: string[]): string[] {
      // Paths the rules do NOT match
      return ig.filter(paths.map(normalizePath));
    },

    add(newPatterns: string[]): void {
      ig.add(newPatterns);
    },
  };
}

/**
 * Create a matcher from include globs. An empty list matches nothing.
 * `*` stays within one path segment; `**` crosses them.
 */
export function createIncludeMatcher(globs: string[]): IncludeMatcher {
  const compiled = globs.map((glob) => new Minimatch(glob, { dot: true }));

  return {
    matches(path: string): boolean {
      const normalized = normalizePath(path);
      return compiled.some((glob) => glob.match(normalized));
    },
  };
}

/**
 * Create the exclude matcher for a sync directory:
 * the built-in defaults followed by the configured rules
 */
export function createExcludeMatcher(excludes: string[]): PathMatcher {
  const matcher = createPathMatcher(DEFAULT_EXCLUDE_PATTERNS);
  matcher.add(excludes);
  return matcher;
}

function normalizePath(path: string): string {
  return path.replace(/\\/g, '/');
}
