/**
 * File access guard
 * Confines reads and writes to a working directory and honours .gitignore
 * and .ai-ignore exclusions at its root
 */

import * as fs from "fs";
import * as path from "path";
import {
  AccessDecision,
  FileAccessGuardOptions,
  IFileAccessGuard,
  IgnorePattern,
} from "../interfaces/IFileAccessGuard";
import {
  AI_IGNORE_FILE,
  GITIGNORE_FILE,
  compileIgnorePatterns,
  parseIgnoreFile,
} from "./IgnoreFileParser";
import { matchPath } from "./PathMatcher";

/** Link chains longer than this are treated as loops */
const MAX_LINK_HOPS = 40;

export const OUTSIDE_WORKING_DIR_REASON = "is outside the allowed working directory.";
export const IGNORED_PATH_REASON = "and is blocked.";

function isSymlink(p: string): boolean {
  return fs.lstatSync(p, { throwIfNoEntry: false })?.isSymbolicLink() ?? false;
}

function resolveFrom(absolute: string, hops: number): string {
  try {
    return fs.realpathSync(absolute);
  } catch {
    // A dangling link resolves to its target: that is where a write lands
    if (isSymlink(absolute) && hops < MAX_LINK_HOPS) {
      const directory = resolveFrom(path.dirname(absolute), hops);
      return resolveFrom(path.resolve(directory, fs.readlinkSync(absolute)), hops + 1);
    }
    const parent = path.dirname(absolute);
    if (parent === absolute) {
      return absolute;
    }
    return path.join(resolveFrom(parent, hops), path.basename(absolute));
  }
}

/**
 * Resolve symlinks along a path, dangling ones included. For a path that
 * does not exist yet (a file about to be written), resolve its nearest
 * existing ancestor and re-attach the remaining segments.
 */
export function resolveRealPath(filePath: string): string {
  return resolveFrom(path.resolve(filePath), 0);
}

function normalizeCase(p: string): string {
  return process.platform === "win32" ? p.toLowerCase() : p;
}

/**
 * True when candidate is root or lies below it on a separator boundary
 */
export function isWithinDirectory(candidate: string, root: string): boolean {
  if (candidate === root) {
    return true;
  }
  const prefix = root.endsWith(path.sep) ? root : root + path.sep;
  return candidate.startsWith(prefix);
}

export class FileAccessGuard implements IFileAccessGuard {
  readonly workingDir: string | null;
  readonly enabled: boolean;
  readonly patterns: readonly IgnorePattern[];

  constructor(options: FileAccessGuardOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.workingDir = options.workingDir ? path.resolve(options.workingDir) : null;

    let patterns: IgnorePattern[] = [];
    if (this.enabled && this.workingDir) {
      patterns = compileIgnorePatterns([
        ...parseIgnoreFile(path.join(this.workingDir, GITIGNORE_FILE)),
        ...parseIgnoreFile(path.join(this.workingDir, AI_IGNORE_FILE)),
      ]);
    }
    this.patterns = Object.freeze(patterns.map((p) => Object.freeze(p)));
    Object.freeze(this);
  }

  /**
   * Guard that allows everything. Containment is opt-in.
   */
  static disabled(): FileAccessGuard {
    return new FileAccessGuard({ enabled: false });
  }

  isPathAllowed(filePath: string): AccessDecision {
    if (!this.enabled || this.workingDir === null) {
      return { allowed: true, reason: "" };
    }

    // Symlinks are resolved on both sides before comparing so a link inside
    // the tree cannot point the agent outside it
    const candidate = normalizeCase(resolveRealPath(filePath));
    const root = normalizeCase(resolveRealPath(this.workingDir));

    if (!isWithinDirectory(candidate, root)) {
      return {
        allowed: false,
        reason: `Path '${filePath}' ${OUTSIDE_WORKING_DIR_REASON}`,
      };
    }

    if (candidate === root || this.patterns.length === 0) {
      return { allowed: true, reason: "" };
    }

    const relative = path.relative(root, candidate);
    const match = matchPath(relative, this.patterns);
    if (match.ignored && match.pattern) {
      return {
        allowed: false,
        reason: `Path '${filePath}' matches ignore pattern '${match.pattern.raw}' ${IGNORED_PATH_REASON}`,
      };
    }

    return { allowed: true, reason: "" };
  }

  getProtectedPatternsText(): string {
    return this.patterns
      .filter((p) => !p.negated)
      .map((p) => `  - ${p.raw}`)
      .join("\n");
  }
}
