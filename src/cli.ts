#!/usr/bin/env node

/**
 * CLI entry point for dropbox-folder-sync.
 *
 * Supports:
 * - `sync` subcommand: Dropbox → local pass, then local → Dropbox pass
 * - `--root <dir>` / `--remote <path>` / `--state <file>` overrides
 * - `--config <file>` to read a YAML config other than ./dropbox-sync.yml
 * - `--fail-fast` to stop a pass at the first failed path
 *
 * Configuration via environment variables:
 * - DROPBOX_ACCESS_TOKEN (required): Dropbox access token
 */

import { syncWithDropbox, type SyncOptions } from "./sync/engine.js";
import {
  ACCESS_TOKEN_ENV,
  DEFAULT_CONFIG_FILE,
  loadConfigFile,
  resolveConfig,
  type ConfigOverrides,
} from "./config.js";
import { ConfigError, InitializationError, errorMessage } from "./errors.js";
import type { PathSyncResult, SyncConfig, TransferProgress } from "./types.js";

interface CliArgs {
  command: string | null;
  overrides: ConfigOverrides;
  configFile: string | null;
  quiet: boolean;
  help: boolean;
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    command: null,
    overrides: {},
    configFile: null,
    quiet: false,
    help: false,
  };

  const takeValue = (flag: string, index: number): string => {
    const nextArg = args[index + 1];
    if (nextArg === undefined || nextArg.startsWith("-")) {
      console.error(`Error: ${flag} requires a value`);
      process.exit(1);
    }
    return nextArg;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--quiet" || arg === "-q") {
      result.quiet = true;
    } else if (arg === "--fail-fast") {
      result.overrides.failFast = true;
    } else if (arg === "--root" || arg === "-r") {
      result.overrides.localRoot = takeValue(arg, i);
      i++;
    } else if (arg === "--remote") {
      result.overrides.remoteRoot = takeValue(arg, i);
      i++;
    } else if (arg === "--state") {
      result.overrides.stateFile = takeValue(arg, i);
      i++;
    } else if (arg === "--config" || arg === "-c") {
      result.configFile = takeValue(arg, i);
      i++;
    } else if (!arg.startsWith("-") && !result.command) {
      result.command = arg;
    } else {
      console.error(`Unknown option: ${arg}`);
      process.exit(1);
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
dropbox-folder-sync - Two-way sync between a local directory and Dropbox

Usage:
  dropbox-folder-sync <command> [options]

Commands:
  sync    Apply Dropbox changes locally, then push local changes to Dropbox

Options:
  --root, -r <dir>     Local directory to sync (default: current directory)
  --remote <path>      Dropbox folder to sync (default: app folder root)
  --state <file>       Sync state file (default: <root>/.dropbox-sync-state.json)
  --config, -c <file>  YAML config file (default: ./${DEFAULT_CONFIG_FILE} if present)
  --fail-fast          Stop a pass at the first failed transfer or delete
  --quiet, -q          Only print the summary and errors
  --help, -h           Show this help message

Environment Variables (required):
  ${ACCESS_TOKEN_ENV}  Dropbox access token

Examples:
  dropbox-folder-sync sync
  dropbox-folder-sync sync --root ./notes --remote /Notes
  dropbox-folder-sync sync --config ./sync.yml --fail-fast
`);
}

async function buildConfig(args: CliArgs): Promise<SyncConfig | null> {
  try {
    const fileConfig = await loadConfigFile(
      args.configFile ?? DEFAULT_CONFIG_FILE,
      args.configFile !== null
    );
    const config = resolveConfig(fileConfig, args.overrides, process.env);

    if (!config.accessToken) {
      console.error("Configuration error:");
      console.error(`  - ${ACCESS_TOKEN_ENV} environment variable is not set`);
      console.error("\nSet this environment variable and try again.");
      console.error("Run with --help for more information.");
      return null;
    }

    return config;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error("Configuration error:");
      console.error(`  - ${error.message}`);
      return null;
    }
    throw error;
  }
}

function printProgress(progress: TransferProgress): void {
  const percent = progress.totalBytes > 0
    ? Math.floor((progress.bytesTransferred / progress.totalBytes) * 100)
    : 100;
  console.log(`    ${progress.path}: ${percent}% (${progress.bytesTransferred}/${progress.totalBytes} bytes)`);
}

async function runSync(args: CliArgs): Promise<void> {
  const config = await buildConfig(args);
  if (!config) {
    process.exit(1);
  }

  const options: SyncOptions = {
    quiet: args.quiet,
    onProgress: args.quiet ? () => undefined : printProgress,
  };

  console.log("****************************************");
  console.log("*       Dropbox Folder Sync            *");
  console.log("****************************************");
  console.log(`  Local:  ${config.localRoot}`);
  console.log(`  Remote: ${config.remoteRoot || "/"}`);
  console.log(`  State:  ${config.stateFile}`);
  console.log("");

  try {
    const result = await syncWithDropbox(config, options);

    const count = (list: PathSyncResult[], action: PathSyncResult["action"]) =>
      list.filter((r) => r.action === action).length;

    console.log("");
    console.log("Sync complete:");
    console.log("");
    console.log("  Dropbox → Local:");
    console.log(`    Downloaded: ${count(result.remoteToLocal, "downloaded")}`);
    console.log(`    Folders created: ${count(result.remoteToLocal, "created-folder")}`);
    console.log(`    Deleted: ${count(result.remoteToLocal, "deleted")}`);
    console.log(`    Skipped: ${count(result.remoteToLocal, "skipped")}`);
    console.log("");
    console.log("  Local → Dropbox:");
    console.log(`    Uploaded: ${count(result.localToRemote, "uploaded")}`);
    console.log(`    Deleted: ${count(result.localToRemote, "deleted")}`);
    console.log(`    Skipped: ${count(result.localToRemote, "skipped")}`);

    if (result.conflicts.length > 0) {
      console.log("");
      console.log(`  Conflicts resolved: ${result.conflicts.length}`);
      for (const conflict of result.conflicts) {
        console.log(`    - "${conflict.path}": Dropbox wins (local changes overwritten)`);
      }
    }

    if (result.errors.length > 0) {
      console.log("");
      console.log(`  Errors: ${result.errors.length}`);
      for (const error of result.errors) {
        const where = error.path ? `${error.path}: ` : "";
        console.error(`    - ${error.fatal ? "[fatal] " : ""}${where}${error.message}`);
      }
      process.exit(1);
    }
  } catch (error) {
    if (error instanceof InitializationError) {
      console.error(`!${error.message}!`);
    } else {
      console.error("Sync failed:", errorMessage(error));
    }
    process.exit(1);
  }
}

async function main(): Promise<void> {
  // Skip node and script path
  const args = parseArgs(process.argv.slice(2));

  if (args.help || !args.command) {
    printHelp();
    process.exit(args.help ? 0 : 1);
  }

  switch (args.command) {
    case "sync":
      await runSync(args);
      break;
    default:
      console.error(`Unknown command: ${args.command}`);
      console.error("Run with --help for usage information.");
      process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error("Unexpected error:", error);
  process.exit(1);
});
