import { describe, it, expect, vi, beforeEach } from "vitest";
import { homedir } from "os";
import { join } from "path";
import {
  resolveConfig,
  loadConfig,
  loadConfigFile,
  expandHome,
  ConfigFileSchema,
  CONFIG_DEFAULTS,
} from "./config.js";
import { CLIError } from "./errors/types.js";

vi.mock("fs", () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import { existsSync, readFileSync } from "fs";

describe("config", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe("resolveConfig", () => {
    it("returns defaults when no config provided", () => {
      const config = resolveConfig();

      expect(config.executable).toBe("wcpcli");
      expect(config.apiBaseUrl).toBe(CONFIG_DEFAULTS.apiBaseUrl);
      expect(config.downloadDir).toBe(join(homedir(), "Downloads"));
      expect(config.downloadMethod).toBe("browser");
      expect(config.downloadTimeoutSeconds).toBe(60);
      expect(config.pollIntervalMs).toBe(1000);
      expect(config.companyCode).toBeUndefined();
      expect(config.logLevel).toBe("info");
      expect(config.logJson).toBe(false);
    });

    it("user config overrides system config", () => {
      const systemConfig = { download: { timeoutSeconds: 30 } };
      const userConfig = { download: { timeoutSeconds: 90 } };

      const config = resolveConfig({}, userConfig, systemConfig);

      expect(config.downloadTimeoutSeconds).toBe(90);
    });

    it("environment overrides config files", () => {
      const userConfig = { cli: { executable: "/opt/platform/bin/wcpcli" } };

      const config = resolveConfig({}, userConfig, undefined, {
        APP_SYNC_CLI: "/usr/local/bin/wcpcli",
        APP_SYNC_DOWNLOAD_DIR: "/tmp/downloads",
      });

      expect(config.executable).toBe("/usr/local/bin/wcpcli");
      expect(config.downloadDir).toBe("/tmp/downloads");
    });

    it("CLI options override environment and ignore undefined values", () => {
      const config = resolveConfig(
        { downloadDir: "/srv/dl", downloadMethod: undefined },
        { download: { method: "cli" } },
        undefined,
        { APP_SYNC_DOWNLOAD_DIR: "/tmp/downloads" }
      );

      expect(config.downloadDir).toBe("/srv/dl");
      expect(config.downloadMethod).toBe("cli");
    });

    it("applies metadata and logging settings", () => {
      const config = resolveConfig({}, {
        metadata: { companyCode: "acme" },
        logging: { level: "debug", json: true },
      });

      expect(config.companyCode).toBe("acme");
      expect(config.logLevel).toBe("debug");
      expect(config.logJson).toBe(true);
    });

    it("expands ~ in the download directory", () => {
      const config = resolveConfig({}, { download: { directory: "~/browser-downloads" } });

      expect(config.downloadDir).toBe(join(homedir(), "browser-downloads"));
    });
  });

  describe("expandHome", () => {
    it("leaves other paths alone", () => {
      expect(expandHome("/data/~cache", "/home/dev")).toBe("/data/~cache");
      expect(expandHome("~", "/home/dev")).toBe("/home/dev");
    });
  });

  describe("ConfigFileSchema", () => {
    it("validates a complete config", () => {
      const result = ConfigFileSchema.safeParse({
        cli: { executable: "wcpcli", apiBaseUrl: "https://api.eu.example.test" },
        download: { directory: "~/Downloads", method: "cli", timeoutSeconds: 120 },
        metadata: { companyCode: "acme_01" },
        logging: { level: "warn" },
      });

      expect(result.success).toBe(true);
    });

    it("rejects an unknown download method", () => {
      const result = ConfigFileSchema.safeParse({ download: { method: "ftp" } });

      expect(result.success).toBe(false);
    });

    it("rejects a timeout below five seconds", () => {
      const result = ConfigFileSchema.safeParse({ download: { timeoutSeconds: 1 } });

      expect(result.success).toBe(false);
    });

    it("rejects a company code with path separators", () => {
      const result = ConfigFileSchema.safeParse({ metadata: { companyCode: "../acme" } });

      expect(result.success).toBe(false);
    });
  });

  describe("loadConfigFile", () => {
    it("returns undefined if file does not exist", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(loadConfigFile("/nonexistent.yaml")).toBeUndefined();
    });

    it("returns empty object for an empty file", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("");

      expect(loadConfigFile("/empty.yaml")).toEqual({});
    });

    it("parses valid YAML", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(
        "download:\n  directory: /srv/downloads\n  method: cli\n"
      );

      expect(loadConfigFile("/config.yaml")).toEqual({
        download: { directory: "/srv/downloads", method: "cli" },
      });
    });

    it("throws a config error for invalid YAML", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("download: [unclosed");

      expect(() => loadConfigFile("/bad.yaml")).toThrow(CLIError);
      expect(() => loadConfigFile("/bad.yaml")).toThrow("Config file /bad.yaml has errors");
    });

    it("names the offending field when validation fails", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("download:\n  timeoutSeconds: 1\n");

      try {
        loadConfigFile("/invalid.yaml");
        expect.unreachable("loadConfigFile should throw");
      } catch (error) {
        expect(error).toBeInstanceOf(CLIError);
        const cliError = error as CLIError;
        expect(cliError.code).toBe("VALIDATION_CONFIG_INVALID");
        expect(cliError.details).toContain("download.timeoutSeconds");
      }
    });
  });

  describe("loadConfig", () => {
    it("fails when an explicit config path is missing", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(() => loadConfig("/missing.yaml", {}, {})).toThrow("Config file /missing.yaml not found");
    });

    it("reports the explicit file as the only source", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("metadata:\n  companyCode: acme\n");

      const { config, sources } = loadConfig("/project/app-sync.yaml", {}, {});

      expect(sources).toEqual(["/project/app-sync.yaml"]);
      expect(config.companyCode).toBe("acme");
    });
  });
});
