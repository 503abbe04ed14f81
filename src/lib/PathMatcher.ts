/**
 * Path matcher for ignore patterns
 *
 * Patterns are applied in order and the last one that matches decides, so a
 * later "!pattern" re-includes a path an earlier pattern excluded. This is
 * the same precedence git uses for a single ignore file.
 */

import * as path from "path";
import { minimatch } from "minimatch";
import { IgnoreMatch, IgnorePattern } from "../interfaces/IFileAccessGuard";

// Patterns arrive with "!" and "#" already interpreted by the parser
const GLOB_OPTIONS = { dot: true, nonegate: true, nocomment: true };

// Stands in for "/" so that "*" and "?" match across directories
const FLAT_SEPARATOR = "\uE000";

function flatten(value: string): string {
  return value.split("/").join(FLAT_SEPARATOR);
}

/**
 * Convert a relative path to forward-slash form
 */
export function toPosixPath(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}

/**
 * Test a single normalized pattern against a relative path
 */
export function patternMatches(relativePath: string, pattern: string): boolean {
  if (!pattern) {
    return false;
  }

  // (i) whole path
  if (minimatch(relativePath, pattern, GLOB_OPTIONS)) {
    return true;
  }

  // (i-b) whole path with "/" as an ordinary character, so "config/*.secret"
  // hits "config/prod/db.secret"
  if (minimatch(flatten(relativePath), flatten(pattern), GLOB_OPTIONS)) {
    return true;
  }

  // (ii) basename only, so "*.key" hits "certs/server.key"
  if (minimatch(path.posix.basename(relativePath), pattern, GLOB_OPTIONS)) {
    return true;
  }

  // (iii) "dir/**" covers dir itself and everything below it
  if (pattern.endsWith("/**")) {
    const prefix = pattern.slice(0, -3);
    if (relativePath === prefix || relativePath.startsWith(prefix + "/")) {
      return true;
    }
  }

  // (iv) bare directory-style pattern; the "/" boundary keeps "secret"
  // from matching "secrets_public.txt"
  return relativePath === pattern || relativePath.startsWith(pattern + "/");
}

/**
 * Evaluate an ordered pattern list against a relative path
 */
export function matchPath(
  relativePath: string,
  patterns: readonly IgnorePattern[]
): IgnoreMatch {
  const candidate = toPosixPath(relativePath);
  let ignored = false;
  let decidedBy: IgnorePattern | null = null;

  for (const pattern of patterns) {
    if (patternMatches(candidate, pattern.normalized)) {
      ignored = !pattern.negated;
      decidedBy = pattern;
    }
  }

  return { ignored, pattern: decidedBy };
}

export function isIgnored(
  relativePath: string,
  patterns: readonly IgnorePattern[]
): boolean {
  return matchPath(relativePath, patterns).ignored;
}
