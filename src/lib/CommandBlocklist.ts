/**
 * Command blocklist
 *
 * Matches generated shell/script text against dangerous-command patterns
 * before anything is spawned. Patterns are plain substrings, or two-stage
 * pipe chains such as "curl|bash" where the left command must feed the
 * right one through a pipe.
 *
 * This is textual defense in depth. Variable expansion, command
 * substitution and encoding tricks get past it.
 */

import * as fs from "fs";
import * as path from "path";
import {
  BlockCheckResult,
  ICommandBlocklist,
  PipePattern,
} from "../interfaces/ICommandBlocklist";

/** Bundled pattern source, shipped in resources/ */
export const DEFAULT_BLOCKLIST_PATH = path.join(
  __dirname,
  "..",
  "..",
  "resources",
  "default_blocked_commands.csv"
);

const REQUIRED_COLUMNS = ["command", "type"] as const;

export type BlocklistWarningHandler = (message: string, source: string) => void;

function defaultWarningHandler(message: string, source: string): void {
  console.error(
    JSON.stringify({
      timestamp: new Date().toISOString(),
      level: "BLOCKLIST_WARNING",
      message,
      source,
    })
  );
}

/**
 * Split CSV text into rows of fields. Handles quoted fields with embedded
 * commas, doubled quotes and line breaks.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") {
        i++;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += ch;
    }
  }

  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  // Blank lines come through as a single empty field
  return rows.filter((r) => !(r.length === 1 && r[0]?.trim() === ""));
}

/**
 * Split a pipe-chain pattern into exactly two stages.
 * Returns null for anything that is not a two-stage chain.
 */
export function splitPipePattern(pattern: string): PipePattern | null {
  const parts = pattern.split("|").map((p) => p.trim());
  if (parts.length !== 2) {
    return null;
  }
  const [left, right] = parts;
  if (!left || !right) {
    return null;
  }
  return { left, right };
}

function matchesPipeChain(stages: readonly string[], pipe: PipePattern): boolean {
  for (let i = 0; i < stages.length - 1; i++) {
    if (!stages[i]?.startsWith(pipe.left)) {
      continue;
    }
    for (let j = i + 1; j < stages.length; j++) {
      if (stages[j]?.startsWith(pipe.right)) {
        return true;
      }
    }
  }
  return false;
}

export class CommandBlocklist implements ICommandBlocklist {
  private readonly patterns: readonly string[];

  constructor(patterns: readonly string[]) {
    this.patterns = Object.freeze(patterns.map((p) => p.trim()).filter(Boolean));
  }

  /**
   * Load patterns from a CSV source with "command" and "type" columns.
   * Rows typed "blocked" contribute their command. A missing or malformed
   * source gives an empty blocklist and a warning, never an exception.
   */
  static load(
    source: string = DEFAULT_BLOCKLIST_PATH,
    onWarning: BlocklistWarningHandler = defaultWarningHandler
  ): CommandBlocklist {
    let text: string;
    try {
      if (!fs.existsSync(source)) {
        onWarning("Blocked commands source not found. No commands loaded.", source);
        return new CommandBlocklist([]);
      }
      text = fs.readFileSync(source, "utf-8");
    } catch (error) {
      onWarning(
        `Blocked commands source could not be read: ${
          error instanceof Error ? error.message : String(error)
        }. No commands loaded.`,
        source
      );
      return new CommandBlocklist([]);
    }

    return CommandBlocklist.fromCsv(text, source, onWarning);
  }

  static fromCsv(
    text: string,
    source = "<inline>",
    onWarning: BlocklistWarningHandler = defaultWarningHandler
  ): CommandBlocklist {
    const [header, ...rows] = parseCsv(text.replace(/^\uFEFF/, ""));
    const columns = (header ?? []).map((h) => h.trim().toLowerCase());
    const commandIndex = columns.indexOf(REQUIRED_COLUMNS[0]);
    const typeIndex = columns.indexOf(REQUIRED_COLUMNS[1]);

    if (commandIndex === -1 || typeIndex === -1) {
      onWarning(
        "Blocked commands source is missing required 'command' and/or 'type' columns. No commands loaded.",
        source
      );
      return new CommandBlocklist([]);
    }

    const patterns: string[] = [];
    for (const row of rows) {
      const type = (row[typeIndex] ?? "").trim().toLowerCase();
      const command = (row[commandIndex] ?? "").trim();
      if (type === "blocked" && command) {
        patterns.push(command);
      }
    }

    return new CommandBlocklist(patterns);
  }

  isBlocked(text: string): BlockCheckResult {
    const code = text.toLowerCase().trim();
    const stages = code.split(/\s*\|\s*/).map((s) => s.trim());

    for (const pattern of this.patterns) {
      const needle = pattern.toLowerCase().trim();

      if (needle.includes("|") && stages.length >= 2) {
        const pipe = splitPipePattern(needle);
        if (pipe && matchesPipeChain(stages, pipe)) {
          return { blocked: true, matchedPattern: pattern };
        }
      }

      if (code.includes(needle)) {
        return { blocked: true, matchedPattern: pattern };
      }
    }

    return { blocked: false, matchedPattern: null };
  }

  getPatterns(): readonly string[] {
    return this.patterns;
  }
}

let defaultBlocklist: CommandBlocklist | null = null;

/**
 * Process-wide blocklist, loaded on first use and cached.
 *
 * Loading is synchronous, so the first caller populates the cache before
 * any other caller can observe it empty. Collaborators should prefer an
 * injected CommandBlocklist; this accessor backs their defaults.
 */
export function getDefaultBlocklist(source?: string): CommandBlocklist {
  if (defaultBlocklist === null) {
    defaultBlocklist = CommandBlocklist.load(source);
  }
  return defaultBlocklist;
}

/**
 * Drop the cached blocklist and load it again
 */
export function reloadDefaultBlocklist(source?: string): CommandBlocklist {
  defaultBlocklist = CommandBlocklist.load(source);
  return defaultBlocklist;
}
