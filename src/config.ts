/**
 * Config loading and validation.
 *
 * Loads config.yml from the data directory, substitutes ${ENV_VAR} references,
 * fills defaults, and validates required fields at startup.
 */

import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { isLogLevel, type LogLevel } from "./logger.js";

export interface AuthConfig {
  /** Application (client) id of the app registration. */
  client_id: string;
  /** Directory (tenant) id. "common" for multi-tenant apps. */
  tenant_id: string;
  redirect_uri: string;
  /** Absolute path of the JSON token file. */
  token_file: string;
  scope: string;
}

export interface GraphConfig {
  /** v1.0 endpoint root, no trailing slash. */
  base_url: string;
  /** Beta endpoint root, used for copyToSection. */
  beta_url: string;
  timeout_ms: number;
}

export interface TransferConfig {
  /** Status checks before a copy is reported as timed out. */
  max_attempts: number;
  /** Unit of the jitter backoff between status checks. */
  base_delay_ms: number;
}

export interface Config {
  auth: AuthConfig;
  graph: GraphConfig;
  transfer: TransferConfig;
  logging: {
    level: LogLevel;
    /** Log page HTML and command JSON at debug level. */
    log_content: boolean;
  };
  data_dir: string;
}

export const DEFAULT_GRAPH_URL = "https://graph.microsoft.com/v1.0";
export const DEFAULT_GRAPH_BETA_URL = "https://graph.microsoft.com/beta";
export const DEFAULT_SCOPE = "offline_access Notes.ReadWrite";

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

function toStringValue(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function toBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  return undefined;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Replace ${VAR} references with values from process.env.
 */
function substituteEnvVars(text: string): string {
  // Only uppercase env-style names, so HTML snippets like ${id} survive.
  return text.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Environment variable ${varName} is not set`);
    }
    return value;
  });
}

/**
 * Recursively substitute env vars in all string values of an object.
 */
function substituteDeep(obj: unknown): unknown {
  if (typeof obj === "string") {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteDeep);
  }
  if (isRecord(obj)) {
    const result: RawSection = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteDeep(value);
    }
    return result;
  }
  return obj;
}

export function loadConfig(configPath?: string): Config {
  const dataDir = path.resolve(process.env.ONENOTE_DATA_DIR || "./data");
  const cfgPath = configPath || path.join(dataDir, "config.yml");

  if (!fs.existsSync(cfgPath)) {
    throw new Error(`Config file not found: ${cfgPath}`);
  }

  const parsed: unknown = parseYaml(fs.readFileSync(cfgPath, "utf-8"));
  const substituted = substituteDeep(parsed);
  const raw = isRecord(substituted) ? substituted : {};

  const auth = section(raw, "auth");
  const graph = section(raw, "graph");
  const transfer = section(raw, "transfer");
  const logging = section(raw, "logging");

  const rawLevel = logging.level ?? "info";

  const config: Config = {
    auth: {
      client_id: toStringValue(auth.client_id) ?? "",
      tenant_id: toStringValue(auth.tenant_id) || "common",
      redirect_uri: toStringValue(auth.redirect_uri) ?? "",
      token_file: path.resolve(dataDir, toStringValue(auth.token_file) || "tokens.json"),
      scope: toStringValue(auth.scope) || DEFAULT_SCOPE,
    },
    graph: {
      base_url: stripTrailingSlash(toStringValue(graph.base_url) || DEFAULT_GRAPH_URL),
      beta_url: stripTrailingSlash(toStringValue(graph.beta_url) || DEFAULT_GRAPH_BETA_URL),
      timeout_ms: toFiniteNumber(graph.timeout_ms) ?? 30_000,
    },
    transfer: {
      max_attempts: toFiniteNumber(transfer.max_attempts) ?? 30,
      base_delay_ms: toFiniteNumber(transfer.base_delay_ms) ?? 1000,
    },
    logging: {
      level: isLogLevel(rawLevel) ? rawLevel : "info",
      log_content: toBoolean(logging.log_content) ?? false,
    },
    data_dir: dataDir,
  };

  validateConfig(config, rawLevel);

  return config;
}

/**
 * Validate config at startup. Every problem is collected so a single run
 * reports all of them.
 */
function validateConfig(config: Config, rawLevel: unknown): void {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.auth.client_id) {
    errors.push("auth.client_id is required");
  }
  if (!config.auth.redirect_uri) {
    errors.push("auth.redirect_uri is required");
  }
  if (!Number.isInteger(config.transfer.max_attempts) || config.transfer.max_attempts < 1) {
    errors.push(`transfer.max_attempts must be a positive integer, got ${config.transfer.max_attempts}`);
  }
  if (config.transfer.base_delay_ms < 0) {
    errors.push("transfer.base_delay_ms cannot be negative");
  }
  if (!isLogLevel(rawLevel)) {
    errors.push(`logging.level "${String(rawLevel)}" is not one of debug, info, warn, error`);
  }

  if (!config.graph.base_url.startsWith("https://")) {
    warnings.push(`graph.base_url "${config.graph.base_url}" is not https; bearer tokens will travel in clear text`);
  }

  for (const w of warnings) {
    console.warn(`Config warning: ${w}`);
  }
  if (errors.length > 0) {
    throw new Error(`Config errors:\n  - ${errors.join("\n  - ")}`);
  }
}

/**
 * Ensure the data directory, its log directory and the token file's
 * directory exist.
 */
export function ensureDataDirs(config: Config): void {
  const dirs = [
    config.data_dir,
    path.join(config.data_dir, "logs"),
    path.dirname(config.auth.token_file),
  ];

  for (const dir of dirs) {
    fs.mkdirSync(dir, { recursive: true });
  }
}
