/**
 * Configuration loading.
 *
 * Values are resolved in order, later wins: built-in defaults, the YAML
 * config file, command-line flags. The access token only comes from the
 * DROPBOX_ACCESS_TOKEN environment variable.
 *
 * Example `dropbox-sync.yml`:
 *
 * ```yaml
 * localRoot: ./notes
 * remoteRoot: /Notes
 * failFast: false
 * exclude:
 *   extensions: [".pyc", ".pyo", ".o"]
 *   reservedDirectories: [temp]
 *   reservedDirectoryPrefixes: [site]
 * ```
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse } from "yaml";
import type { SyncConfig } from "./types.js";
import { ConfigError, errorMessage, isErrnoException } from "./errors.js";
import { DEFAULT_STATE_FILE_NAME } from "./sync/state.js";
import { DEFAULT_SCAN_RULES } from "./sync/local-scanner.js";
import { DEFAULT_CHUNK_SIZE, DEFAULT_LARGE_FILE_THRESHOLD } from "./sync/transfer.js";
import { normalizeRemoteRoot } from "./sync/paths.js";

/** Config file looked up in the current directory when none is given */
export const DEFAULT_CONFIG_FILE = "dropbox-sync.yml";

export const ACCESS_TOKEN_ENV = "DROPBOX_ACCESS_TOKEN";

/**
 * Shape of the YAML config file. Every key is optional.
 */
export interface FileConfig {
  localRoot?: string;
  remoteRoot?: string;
  stateFile?: string;
  largeFileThreshold?: number;
  chunkSize?: number;
  failFast?: boolean;
  exclude?: {
    extensions?: string[];
    reservedDirectories?: string[];
    reservedDirectoryPrefixes?: string[];
  };
}

/**
 * Values given on the command line.
 */
export interface ConfigOverrides {
  localRoot?: string;
  remoteRoot?: string;
  stateFile?: string;
  failFast?: boolean;
}

const TOP_LEVEL_KEYS = [
  "localRoot",
  "remoteRoot",
  "stateFile",
  "largeFileThreshold",
  "chunkSize",
  "failFast",
  "exclude",
];

const EXCLUDE_KEYS = ["extensions", "reservedDirectories", "reservedDirectoryPrefixes"];

/**
 * Load and validate a YAML config file.
 *
 * A missing file yields an empty config unless `required` is set (an
 * explicit `--config` path).
 *
 * @throws ConfigError for unreadable files, invalid YAML, unknown keys or
 * values of the wrong type
 */
export async function loadConfigFile(filePath: string, required = false): Promise<FileConfig> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT" && !required) {
      return {};
    }
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  return parseFileConfig(raw, filePath);
}

/**
 * Validates parsed YAML content.
 */
export function parseFileConfig(raw: unknown, source: string): FileConfig {
  if (raw === null || raw === undefined) return {};

  const fields = toFieldMap(raw, source, "");
  const config: FileConfig = {
    localRoot: optionalString(fields, "localRoot", source),
    remoteRoot: optionalString(fields, "remoteRoot", source),
    stateFile: optionalString(fields, "stateFile", source),
    largeFileThreshold: optionalPositiveInteger(fields, "largeFileThreshold", source),
    chunkSize: optionalPositiveInteger(fields, "chunkSize", source),
    failFast: optionalBoolean(fields, "failFast", source),
  };
  for (const key of fields.keys()) {
    if (!TOP_LEVEL_KEYS.includes(key)) {
      throw new ConfigError(`Unknown key "${key}" in ${source}`);
    }
  }

  const exclude = fields.get("exclude");
  if (exclude !== undefined && exclude !== null) {
    const excludeFields = toFieldMap(exclude, source, "exclude.");
    for (const key of excludeFields.keys()) {
      if (!EXCLUDE_KEYS.includes(key)) {
        throw new ConfigError(`Unknown key "exclude.${key}" in ${source}`);
      }
    }
    config.exclude = {
      extensions: optionalStringList(excludeFields, "extensions", source, "exclude."),
      reservedDirectories: optionalStringList(excludeFields, "reservedDirectories", source, "exclude."),
      reservedDirectoryPrefixes: optionalStringList(
        excludeFields,
        "reservedDirectoryPrefixes",
        source,
        "exclude."
      ),
    };
  }

  return config;
}

/**
 * Combine file config, command-line overrides and the environment into the
 * final SyncConfig. Relative paths resolve against `cwd` (local root) and
 * the local root (state file).
 */
export function resolveConfig(
  fileConfig: FileConfig,
  overrides: ConfigOverrides,
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd()
): SyncConfig {
  const localRoot = path.resolve(cwd, overrides.localRoot ?? fileConfig.localRoot ?? ".");
  const stateFile = path.resolve(
    localRoot,
    overrides.stateFile ?? fileConfig.stateFile ?? DEFAULT_STATE_FILE_NAME
  );
  const largeFileThreshold = fileConfig.largeFileThreshold ?? DEFAULT_LARGE_FILE_THRESHOLD;
  const chunkSize = fileConfig.chunkSize ?? Math.min(DEFAULT_CHUNK_SIZE, largeFileThreshold);

  if (chunkSize > largeFileThreshold) {
    throw new ConfigError(
      `chunkSize (${chunkSize}) must not exceed largeFileThreshold (${largeFileThreshold})`
    );
  }

  return {
    accessToken: env[ACCESS_TOKEN_ENV] ?? "",
    localRoot,
    remoteRoot: normalizeRemoteRoot(overrides.remoteRoot ?? fileConfig.remoteRoot ?? ""),
    stateFile,
    largeFileThreshold,
    chunkSize,
    failFast: overrides.failFast ?? fileConfig.failFast ?? false,
    scanRules: {
      stateFileName: path.basename(stateFile),
      excludedExtensions: fileConfig.exclude?.extensions ?? [...DEFAULT_SCAN_RULES.excludedExtensions],
      reservedDirectories:
        fileConfig.exclude?.reservedDirectories ?? [...DEFAULT_SCAN_RULES.reservedDirectories],
      reservedDirectoryPrefixes:
        fileConfig.exclude?.reservedDirectoryPrefixes ?? [
          ...DEFAULT_SCAN_RULES.reservedDirectoryPrefixes,
        ],
    },
  };
}

// =============================================================================
// Field validation
// =============================================================================

function toFieldMap(raw: unknown, source: string, prefix: string): Map<string, unknown> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    const what = prefix ? `"${prefix.slice(0, -1)}"` : "config";
    throw new ConfigError(`Expected ${what} in ${source} to be a mapping`);
  }
  return new Map<string, unknown>(Object.entries(raw));
}

function optionalString(fields: Map<string, unknown>, key: string, source: string): string | undefined {
  const value = fields.get(key);
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`"${key}" in ${source} must be a string`);
  }
  return value;
}

function optionalBoolean(fields: Map<string, unknown>, key: string, source: string): boolean | undefined {
  const value = fields.get(key);
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`"${key}" in ${source} must be true or false`);
  }
  return value;
}

function optionalPositiveInteger(
  fields: Map<string, unknown>,
  key: string,
  source: string
): number | undefined {
  const value = fields.get(key);
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`"${key}" in ${source} must be a positive integer`);
  }
  return value;
}

function optionalStringList(
  fields: Map<string, unknown>,
  key: string,
  source: string,
  prefix: string
): string[] | undefined {
  const value = fields.get(key);
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigError(`"${prefix}${key}" in ${source} must be a list of strings`);
  }
  return value;
}
