/**
 * Unit tests for ConfigLoader
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { ValidationError } from "../types";
import { ConfigLoader } from "./ConfigLoader";

describe("ConfigLoader", () => {
  let testDir: string;
  let configPath: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-test-"));
    configPath = path.join(testDir, "agent-access-guard.config.json");
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe("parse", () => {
    it("should fill in defaults", () => {
      expect(ConfigLoader.parse({})).toEqual({
        workingDir: null,
        safeMode: false,
        auditMaxAgeDays: 30,
        pruneOnStartup: true,
        commandTimeoutMs: 60000,
      });
    });

    it("should keep provided values", () => {
      const config = ConfigLoader.parse({
        workingDir: "/srv/project",
        safeMode: true,
        blocklistPath: "/etc/guard/blocked.csv",
        auditLogFile: "/var/log/guard/audit.log",
        auditMaxAgeDays: 0,
        pruneOnStartup: false,
        commandTimeoutMs: 1000,
      });

      expect(config.workingDir).toBe("/srv/project");
      expect(config.blocklistPath).toBe("/etc/guard/blocked.csv");
      expect(config.auditMaxAgeDays).toBe(0);
      expect(config.pruneOnStartup).toBe(false);
    });

    it("should reject unknown keys", () => {
      expect(() => ConfigLoader.parse({ workspaceRoot: "/tmp" })).toThrow(
        ValidationError
      );
      expect(() => ConfigLoader.parse({ workspaceRoot: "/tmp" })).toThrow(
        /^Invalid configuration in <inline>: \(root\): Unrecognized key/
      );
    });

    it("should name the offending field", () => {
      expect(() => ConfigLoader.parse({ auditMaxAgeDays: -1 }, "test.json")).toThrow(
        /^Invalid configuration in test\.json: auditMaxAgeDays: /
      );
      expect(() => ConfigLoader.parse({ commandTimeoutMs: 1.5 })).toThrow(
        /commandTimeoutMs: /
      );
    });
  });

  describe("loadConfig", () => {
    it("should use defaults when the file does not exist", () => {
      const config = ConfigLoader.loadConfig({
        AGENT_ACCESS_GUARD_CONFIG: configPath,
      });
      expect(config.workingDir).toBeNull();
      expect(config.safeMode).toBe(false);
    });

    it("should read the configured file", () => {
      fs.writeFileSync(
        configPath,
        JSON.stringify({ workingDir: testDir, safeMode: true, auditMaxAgeDays: 7 })
      );

      const config = ConfigLoader.loadConfig({
        AGENT_ACCESS_GUARD_CONFIG: configPath,
      });

      expect(config.workingDir).toBe(testDir);
      expect(config.safeMode).toBe(true);
      expect(config.auditMaxAgeDays).toBe(7);
    });

    it("should let the environment override the file", () => {
      fs.writeFileSync(
        configPath,
        JSON.stringify({ workingDir: "/from/file", safeMode: true })
      );

      const config = ConfigLoader.loadConfig({
        AGENT_ACCESS_GUARD_CONFIG: configPath,
        AGENT_ACCESS_GUARD_WORKING_DIR: "/from/env",
        AGENT_ACCESS_GUARD_SAFE_MODE: "off",
      });

      expect(config.workingDir).toBe("/from/env");
      expect(config.safeMode).toBe(false);
    });

    it.each(["1", "true", "YES", " on "])(
      "should read %p as safe mode on",
      (value) => {
        const config = ConfigLoader.loadConfig({
          AGENT_ACCESS_GUARD_CONFIG: configPath,
          AGENT_ACCESS_GUARD_SAFE_MODE: value,
        });
        expect(config.safeMode).toBe(true);
      }
    );

    it("should reject a file that is not JSON", () => {
      fs.writeFileSync(configPath, "{ not json");

      expect(() =>
        ConfigLoader.loadConfig({ AGENT_ACCESS_GUARD_CONFIG: configPath })
      ).toThrow(new RegExp(`^Invalid configuration in ${escapeRegExp(configPath)}: `));
    });

    it("should reject JSON that is not an object", () => {
      fs.writeFileSync(configPath, "[1, 2]");

      expect(() =>
        ConfigLoader.loadConfig({ AGENT_ACCESS_GUARD_CONFIG: configPath })
      ).toThrow(
        new ValidationError(
          `Invalid configuration in ${configPath}: expected a JSON object`
        )
      );
    });
  });
});

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
