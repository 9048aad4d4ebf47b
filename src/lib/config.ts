import { parse } from "yaml";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { ConfigError } from "./api/errors.js";

export const CONFIG_FILE = "sysml-explorer.yaml";
export const BASE_URL_ENV = "SYSMLV2_BASE_URL";

export interface ExplorerConfig {
  baseUrl: string;
  timeoutMs: number;
  /** Parallel element fetches during tree expansion. */
  concurrency: number;
  /** Parallel access probes when listing projects. */
  probeConcurrency: number;
  pageSize: number;
  outputDir: string;
  diagnosticsDir: string;
}

export const DEFAULT_CONFIG: ExplorerConfig = {
  baseUrl: "http://localhost:9000",
  timeoutMs: 180_000,
  concurrency: 8,
  probeConcurrency: 10,
  pageSize: 100,
  outputDir: "output",
  diagnosticsDir: "diagnostics",
};

const NUMBER_KEYS = ["timeoutMs", "concurrency", "probeConcurrency", "pageSize"] as const;
const STRING_KEYS = ["baseUrl", "outputDir", "diagnosticsDir"] as const;

/**
 * Parse a YAML config document. Unknown keys are ignored; a known key with a
 * value of the wrong type is an error.
 */
export function parseConfig(text: string, source = CONFIG_FILE): Partial<ExplorerConfig> {
  let doc: unknown;
  try {
    doc = parse(text);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (doc === null || doc === undefined) return {};
  if (typeof doc !== "object" || Array.isArray(doc)) {
    throw new ConfigError(`${source} must contain a mapping`);
  }

  const config: Partial<ExplorerConfig> = {};
  for (const key of NUMBER_KEYS) {
    const value: unknown = Reflect.get(doc, key);
    if (value === undefined) continue;
    if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
      throw new ConfigError(`${source}: ${key} must be a positive integer`);
    }
    config[key] = value;
  }
  for (const key of STRING_KEYS) {
    const value: unknown = Reflect.get(doc, key);
    if (value === undefined) continue;
    if (typeof value !== "string" || value.length === 0) {
      throw new ConfigError(`${source}: ${key} must be a non-empty string`);
    }
    config[key] = value;
  }
  return config;
}

/**
 * Read the config file. An explicit path must exist; the default file in `cwd` is optional.
 */
export async function loadConfigFile(path: string | undefined, cwd = process.cwd()): Promise<Partial<ExplorerConfig>> {
  const target = path ?? join(cwd, CONFIG_FILE);
  let text: string;
  try {
    text = await readFile(target, "utf-8");
  } catch (error) {
    if (path === undefined && error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw new ConfigError(`Cannot read config file ${target}`, { cause: error });
  }
  return parseConfig(text, target);
}

export interface ConfigSources {
  file?: Partial<ExplorerConfig>;
  /** SYSMLV2_BASE_URL from credentials.properties */
  credentialsBaseUrl?: string;
  env?: NodeJS.ProcessEnv;
  flags?: Partial<ExplorerConfig>;
}

function defined<T extends object>(values: T | undefined): Partial<T> {
  const result: Partial<T> = {};
  if (!values) return result;
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) Reflect.set(result, key, value);
  }
  return result;
}

/**
 * Merge config sources. Precedence: flags, environment, credentials file, config file, defaults.
 */
export function resolveConfig(sources: ConfigSources = {}): ExplorerConfig {
  const envBaseUrl = sources.env?.[BASE_URL_ENV];
  return {
    ...DEFAULT_CONFIG,
    ...defined(sources.file),
    ...(sources.credentialsBaseUrl ? { baseUrl: sources.credentialsBaseUrl } : {}),
    ...(envBaseUrl ? { baseUrl: envBaseUrl } : {}),
    ...defined(sources.flags),
  };
}
