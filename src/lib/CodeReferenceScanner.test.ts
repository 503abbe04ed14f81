/**
 * Unit tests for CodeReferenceScanner
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { IFileAccessGuard } from "../interfaces/IFileAccessGuard";
import { scanCode } from "./CodeReferenceScanner";
import { FileAccessGuard } from "./FileAccessGuard";
import { compileIgnorePatterns } from "./IgnoreFileParser";

function fakeGuard(lines: string[], enabled = true): IFileAccessGuard {
  return {
    workingDir: "/workspace",
    enabled,
    patterns: compileIgnorePatterns(lines),
    isPathAllowed: () => ({ allowed: true, reason: "" }),
    getProtectedPatternsText: () => "",
  };
}

describe("CodeReferenceScanner", () => {
  describe("without an active guard", () => {
    it("should not flag anything", () => {
      expect(scanCode("cat .env", null)).toEqual({ flagged: false, reason: "" });
      expect(scanCode("cat .env", undefined).flagged).toBe(false);
      expect(scanCode("cat .env", fakeGuard([".env"], false)).flagged).toBe(false);
      expect(scanCode("cat .env", FileAccessGuard.disabled()).flagged).toBe(false);
    });
  });

  describe("with patterns from ignore files", () => {
    let workDir: string;
    let guard: FileAccessGuard;

    beforeEach(() => {
      workDir = fs.mkdtempSync(path.join(os.tmpdir(), "scanner-test-"));
      fs.writeFileSync(
        path.join(workDir, ".gitignore"),
        ".env\n*.key\nsecrets/\n!public.txt\n"
      );
      guard = new FileAccessGuard({ workingDir: workDir });
    });

    afterEach(() => {
      fs.rmSync(workDir, { recursive: true, force: true });
    });

    it("should flag a literal file reference", () => {
      expect(scanCode("cat .env", guard)).toEqual({
        flagged: true,
        reason: "Code references protected file/directory '.env'",
      });
    });

    it("should flag a wildcard pattern by its suffix", () => {
      expect(scanCode("openssl rsa -in server.key", guard)).toEqual({
        flagged: true,
        reason: "Code references protected pattern '*.key'",
      });
    });

    it("should flag a directory without its trailing slash", () => {
      expect(scanCode("tar czf out.tgz secrets", guard).reason).toBe(
        "Code references protected file/directory 'secrets/'"
      );
    });

    it("should report the first pattern in file order", () => {
      expect(scanCode("cp server.key .env", guard).reason).toBe(
        "Code references protected file/directory '.env'"
      );
    });

    it("should skip negated patterns", () => {
      expect(scanCode("cat public.txt", guard).flagged).toBe(false);
    });

    it("should pass code that names nothing protected", () => {
      expect(scanCode("ls -la src", guard)).toEqual({ flagged: false, reason: "" });
    });

    it("should flag longer names that contain a protected one", () => {
      expect(scanCode("cp .env.example .env.local", guard).flagged).toBe(true);
    });
  });

  it("should ignore a bare wildcard", () => {
    expect(scanCode("anything at all", fakeGuard(["*"])).flagged).toBe(false);
  });

  it("should not flag for an empty pattern list", () => {
    expect(scanCode("cat .env", fakeGuard([])).flagged).toBe(false);
  });
});
