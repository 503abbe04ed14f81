/**
 * Ignore file parser
 * Reads gitignore-style files into ordered pattern lists
 */

import * as fs from "fs";
import { IgnorePattern } from "../interfaces/IFileAccessGuard";

/** Generic ignore file, read first */
export const GITIGNORE_FILE = ".gitignore";

/** Agent-specific ignore file, read after the generic one */
export const AI_IGNORE_FILE = ".ai-ignore";

/**
 * Parse an ignore file into its pattern lines, in file order.
 * Blank lines and "#" comments are skipped. A missing file yields [].
 */
export function parseIgnoreFile(filePath: string): string[] {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    return [];
  }

  return parseIgnoreText(fs.readFileSync(filePath, "utf-8"));
}

export function parseIgnoreText(text: string): string[] {
  const lines: string[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }
    lines.push(line);
  }
  return lines;
}

/**
 * Derive negation flag and normalized form for each pattern line
 */
export function compileIgnorePatterns(lines: readonly string[]): IgnorePattern[] {
  return lines.map((raw) => {
    const negated = raw.startsWith("!");
    const body = negated ? raw.slice(1) : raw;
    return {
      raw,
      negated,
      normalized: body.replace(/\/+$/, ""),
    };
  });
}
