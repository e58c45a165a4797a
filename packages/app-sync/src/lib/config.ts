import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { CLIError } from "./errors/types.js";
import { invalidConfig } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path */
export const SYSTEM_CONFIG_PATH = "/etc/app-sync/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "app-sync", "config.yaml");

export const DOWNLOAD_METHODS = ["browser", "cli"] as const;
export type DownloadMethod = (typeof DOWNLOAD_METHODS)[number];

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  executable: "wcpcli",
  // Differs outside the US data center
  apiBaseUrl: "https://api.us.developer.workday.com",
  downloadCommand: "apps:download",
  downloadDir: join(homedir(), "Downloads"),
  downloadMethod: "browser",
  downloadTimeoutSeconds: 60,
  pollIntervalMs: 1000,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  cli: z
    .object({
      executable: z.string().min(1).optional(),
      apiBaseUrl: z.string().url().optional(),
      downloadCommand: z.string().min(1).optional(),
    })
    .optional(),
  download: z
    .object({
      directory: z.string().min(1).optional(),
      method: z.enum(DOWNLOAD_METHODS).optional(),
      browser: z.string().min(1).optional(),
      timeoutSeconds: z.number().int().min(5).max(3600).optional(),
      pollIntervalMs: z.number().int().min(100).max(10000).optional(),
    })
    .optional(),
  metadata: z
    .object({
      companyCode: z.string().regex(/^[A-Za-z0-9_-]+$/, "letters, digits, - and _ only").optional(),
    })
    .optional(),
  logging: z
    .object({
      level: LogLevelSchema.optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  executable: string;
  apiBaseUrl: string;
  downloadCommand: string;
  downloadDir: string;
  downloadMethod: DownloadMethod;
  /** Browser app to open the download URL with; system default when unset */
  browser?: string;
  downloadTimeoutSeconds: number;
  pollIntervalMs: number;
  companyCode?: string;
  logLevel: z.infer<typeof LogLevelSchema>;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Expand a leading "~" to the user's home directory.
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/") || path.startsWith("~\\")) {
    return join(home, path.slice(2));
  }
  return path;
}

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot be read: ${(err as Error).message}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${(err as Error).message}`]);
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  const { cli, download, metadata, logging } = source;

  if (cli?.executable !== undefined) target.executable = cli.executable;
  if (cli?.apiBaseUrl !== undefined) target.apiBaseUrl = cli.apiBaseUrl;
  if (cli?.downloadCommand !== undefined) target.downloadCommand = cli.downloadCommand;
  if (download?.directory !== undefined) target.downloadDir = download.directory;
  if (download?.method !== undefined) target.downloadMethod = download.method;
  if (download?.browser !== undefined) target.browser = download.browser;
  if (download?.timeoutSeconds !== undefined) {
    target.downloadTimeoutSeconds = download.timeoutSeconds;
  }
  if (download?.pollIntervalMs !== undefined) target.pollIntervalMs = download.pollIntervalMs;
  if (metadata?.companyCode !== undefined) target.companyCode = metadata.companyCode;
  if (logging?.level !== undefined) target.logLevel = logging.level;
  if (logging?.json !== undefined) target.logJson = logging.json;
}

/**
 * Values taken from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<ResolvedConfig> {
  const overrides: Partial<ResolvedConfig> = {};
  if (env.APP_SYNC_DOWNLOAD_DIR) overrides.downloadDir = env.APP_SYNC_DOWNLOAD_DIR;
  if (env.APP_SYNC_CLI) overrides.executable = env.APP_SYNC_CLI;
  return overrides;
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > Environment > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  env: NodeJS.ProcessEnv = {}
): ResolvedConfig {
  const config: ResolvedConfig = {
    executable: CONFIG_DEFAULTS.executable,
    apiBaseUrl: CONFIG_DEFAULTS.apiBaseUrl,
    downloadCommand: CONFIG_DEFAULTS.downloadCommand,
    downloadDir: CONFIG_DEFAULTS.downloadDir,
    downloadMethod: CONFIG_DEFAULTS.downloadMethod,
    downloadTimeoutSeconds: CONFIG_DEFAULTS.downloadTimeoutSeconds,
    pollIntervalMs: CONFIG_DEFAULTS.pollIntervalMs,
    logLevel: "info",
    logJson: false,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  Object.assign(config, configFromEnv(env));
  Object.assign(config, filterUndefined(cliOptions));

  config.downloadDir = expandHome(config.downloadDir);

  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Config file given with --config; replaces the user config
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): { config: ResolvedConfig; sources: string[] } {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (!userConfig) {
      throw new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${explicitPath} not found`, {
        suggestion: "Check the --config path",
      });
    }
    sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig, env);

  return { config, sources };
}
