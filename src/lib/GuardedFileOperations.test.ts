/**
 * Unit tests for GuardedFileOperations
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { IAuditLog, PruneResult } from "../interfaces/IAuditLog";
import { FileSystemError, SecurityError, ValidationError } from "../types";
import { FileAccessGuard } from "./FileAccessGuard";
import {
  GuardedFileOperations,
  findCloseMatches,
  similarity,
} from "./GuardedFileOperations";

class RecordingAuditLog implements IAuditLog {
  readonly entries: Array<{ eventType: string; details: string }> = [];

  append(eventType: string, details = ""): void {
    this.entries.push({ eventType, details });
  }

  prune(): PruneResult | null {
    return null;
  }

  getLogFile(): string {
    return "audit.log";
  }
}

describe("GuardedFileOperations", () => {
  let workDir: string;
  let outsideDir: string;
  let auditLog: RecordingAuditLog;
  let ops: GuardedFileOperations;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "guarded-ops-test-"));
    outsideDir = fs.mkdtempSync(path.join(os.tmpdir(), "guarded-ops-outside-"));
    fs.writeFileSync(path.join(workDir, ".ai-ignore"), ".env\n");
    auditLog = new RecordingAuditLog();
    ops = new GuardedFileOperations({
      auditLog,
      guard: new FileAccessGuard({ workingDir: workDir }),
    });
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
    fs.rmSync(outsideDir, { recursive: true, force: true });
  });

  describe("readFile", () => {
    it("should read an allowed file", () => {
      const file = path.join(workDir, "notes.md");
      fs.writeFileSync(file, "hello");

      expect(ops.readFile(file)).toBe("hello");
      expect(auditLog.entries).toEqual([]);
    });

    it("should refuse and audit an ignored file", () => {
      const file = path.join(workDir, ".env");
      fs.writeFileSync(file, "TOKEN=placeholder");
      const reason = `Path '${file}' matches ignore pattern '.env' and is blocked.`;

      expect(() => ops.readFile(file)).toThrow(SecurityError);
      expect(() => ops.readFile(file)).toThrow(reason);
      expect(auditLog.entries[0]).toEqual({
        eventType: "file_access_denied",
        details: reason,
      });
    });

    it("should refuse a file outside the working directory", () => {
      const file = path.join(outsideDir, "other.txt");
      fs.writeFileSync(file, "x");

      expect(() => ops.readFile(file)).toThrow(
        `Path '${file}' is outside the allowed working directory.`
      );
    });

    it("should report a missing file", () => {
      const file = path.join(workDir, "missing.txt");
      expect(() => ops.readFile(file)).toThrow(FileSystemError);
      expect(() => ops.readFile(file)).toThrow(`File not found: ${file}`);
    });
  });

  describe("writeFile", () => {
    it("should create parent directories and audit the write", () => {
      const file = path.join(workDir, "src", "generated", "out.ts");
      ops.writeFile(file, "export {};\n");

      expect(fs.readFileSync(file, "utf-8")).toBe("export {};\n");
      expect(auditLog.entries).toEqual([
        { eventType: "file_write", details: `path=${file}` },
      ]);
    });

    it("should audit a failed write as failed and rethrow", () => {
      fs.writeFileSync(path.join(workDir, "blocker"), "");
      const file = path.join(workDir, "blocker", "out.ts");

      expect(() => ops.writeFile(file, "export {};\n")).toThrow();
      expect(auditLog.entries).toHaveLength(1);
      expect(auditLog.entries[0]?.eventType).toBe("file_write_failed");
      expect(auditLog.entries[0]?.details.startsWith(`path=${file} error=`)).toBe(true);
    });

    it("should not write through a dangling symlink that points outside", () => {
      const planted = path.join(outsideDir, "planted.sh");
      const link = path.join(workDir, "link");
      fs.symlinkSync(planted, link);

      expect(() => ops.writeFile(link, "echo placeholder")).toThrow(SecurityError);
      expect(fs.existsSync(planted)).toBe(false);
    });

    it("should not write a denied path", () => {
      const file = path.join(outsideDir, "pwned.txt");

      expect(() => ops.writeFile(file, "x")).toThrow(SecurityError);
      expect(fs.existsSync(file)).toBe(false);
      expect(auditLog.entries.map((e) => e.eventType)).toEqual([
        "file_access_denied",
      ]);
    });
  });

  describe("editFile", () => {
    it("should replace every occurrence and audit the edit", () => {
      const file = path.join(workDir, "app.ts");
      fs.writeFileSync(file, "let a = 1;\nlet b = a + 1;\n");

      expect(ops.editFile(file, "let", "const")).toEqual({
        path: file,
        replacements: 2,
      });
      expect(fs.readFileSync(file, "utf-8")).toBe("const a = 1;\nconst b = a + 1;\n");
      expect(auditLog.entries).toEqual([
        { eventType: "file_edit", details: `path=${file}` },
      ]);
    });

    it("should suggest close matches when the text is missing", () => {
      const file = path.join(workDir, "answer.ts");
      fs.writeFileSync(file, "const answer = 42;\n");

      expect(() => ops.editFile(file, "const answr = 42;", "x")).toThrow(
        new ValidationError(
          "Original text not found. Did you mean one of these? const answer = 42;"
        )
      );
      expect(fs.readFileSync(file, "utf-8")).toBe("const answer = 42;\n");
    });

    it("should omit suggestions when nothing is comparable", () => {
      const file = path.join(workDir, "empty.ts");
      fs.writeFileSync(file, "");

      expect(() => ops.editFile(file, "anything", "x")).toThrow(
        new ValidationError("Original text not found.")
      );
      expect(auditLog.entries).toEqual([
        {
          eventType: "file_edit_failed",
          details: `path=${file} error=Original text not found.`,
        },
      ]);
    });

    it("should refuse an ignored file before reading it", () => {
      const file = path.join(workDir, ".env");
      fs.writeFileSync(file, "TOKEN=placeholder");

      expect(() => ops.editFile(file, "TOKEN", "KEY")).toThrow(SecurityError);
      expect(fs.readFileSync(file, "utf-8")).toBe("TOKEN=placeholder");
    });
  });

  describe("setWorkingDirectory", () => {
    it("should start unrestricted and confine after a working directory is set", () => {
      const unguarded = new GuardedFileOperations({ auditLog });
      const file = path.join(outsideDir, "free.txt");
      fs.writeFileSync(file, "ok");
      expect(unguarded.readFile(file)).toBe("ok");

      unguarded.setWorkingDirectory(workDir);

      expect(unguarded.guard.workingDir).toBe(path.resolve(workDir));
      expect(() => unguarded.readFile(file)).toThrow(SecurityError);
    });

    it("should honour the enabled flag", () => {
      ops.setWorkingDirectory(workDir, false);
      expect(ops.guard.enabled).toBe(false);
      expect(ops.guard.isPathAllowed(path.join(workDir, ".env")).allowed).toBe(true);
    });
  });
});

describe("similarity", () => {
  it("should score identical and disjoint strings", () => {
    expect(similarity("abc", "abc")).toBe(1);
    expect(similarity("", "")).toBe(1);
    expect(similarity("abc", "")).toBe(0);
    expect(similarity("abc", "xyz")).toBe(0);
  });

  it("should use the common subsequence length", () => {
    expect(similarity("abcd", "abxd")).toBe(0.75);
  });
});

describe("findCloseMatches", () => {
  it("should rank windows of the same word count", () => {
    const matches = findCloseMatches(
      "hello world",
      "hello there hello world again",
      2
    );
    expect(matches).toHaveLength(2);
    expect(matches[0]).toBe("hello world");
  });

  it("should return nothing for blank input or a shorter file", () => {
    expect(findCloseMatches("   ", "a b c")).toEqual([]);
    expect(findCloseMatches("a b c", "a b")).toEqual([]);
  });
});
