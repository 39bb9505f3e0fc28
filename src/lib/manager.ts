/**
 * ComfyUI-Manager configuration and snapshot restore.
 */

import { cpSync, existsSync, mkdirSync, readdirSync, realpathSync, statSync, unlinkSync } from "fs";
import { basename, dirname, join, resolve } from "path";
import type { ComfyCli } from "./comfyCli.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { expandHome, managerConfigPath, snapshotsDir } from "./paths.js";
import { getUserSelection, type Prompter } from "./prompts.js";

export interface ManagerStepOptions {
  skipPrompt?: boolean;
  prompter: Prompter;
  log: Logger;
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/**
 * Copy a ComfyUI-Manager config.ini into the workspace user profile.
 * Returns the destination, or null when the step was skipped.
 */
export async function setupManagerConfig(
  comfyPath: string,
  configSource: string | undefined,
  { skipPrompt = false, prompter, log }: ManagerStepOptions
): Promise<string | null> {
  const targetFile = managerConfigPath(resolve(expandHome(comfyPath)));
  log.debug(`Received config source: ${configSource ?? "(none)"}`);

  let sourcePath: string | null = null;

  if (skipPrompt) {
    if (!configSource) {
      log.info("No ComfyUI-Manager config.ini specified, skipping configuration");
      return null;
    }
    sourcePath = expandHome(configSource);
    if (!isFile(sourcePath)) {
      log.info(`ComfyUI-Manager config.ini not found at ${sourcePath}, skipping configuration`);
      return null;
    }
  } else {
    if (configSource) {
      const defaultPath = expandHome(configSource);
      if (isFile(defaultPath)) {
        log.info(`Found default ComfyUI-Manager config.ini at: ${defaultPath}`);
        sourcePath = defaultPath;
      } else {
        log.warn(`Default config.ini not found at: ${defaultPath}`);
      }
    }

    if (!sourcePath) {
      const response = await getUserSelection(prompter, "Enter path to ComfyUI-Manager config.ini");
      if (response) sourcePath = expandHome(response);
    }

    if (!sourcePath) {
      log.info("Skipping ComfyUI-Manager configuration");
      return null;
    }
    if (!isFile(sourcePath)) {
      log.warn(`Config.ini file not found at ${sourcePath}`);
      return null;
    }
  }

  if (existsSync(targetFile) && realpathSync(sourcePath) === realpathSync(targetFile)) {
    log.info(`ComfyUI-Manager config.ini already in place at ${targetFile}`);
    return targetFile;
  }
  mkdirSync(dirname(targetFile), { recursive: true });
  if (existsSync(targetFile)) {
    log.info(`Removing existing config.ini at ${targetFile}`);
    unlinkSync(targetFile);
  }
  cpSync(sourcePath, targetFile, { preserveTimestamps: true });
  log.success(`Copied ComfyUI-Manager config.ini to ${targetFile}`);
  return targetFile;
}

/**
 * Snapshot files (*.json) in a directory, sorted by name.
 */
export function getAvailableSnapshots(dir: string): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => !entry.isDirectory() && entry.name.endsWith(".json"))
    .map((entry) => entry.name)
    .sort();
}

export interface RestoreSnapshotOptions extends ManagerStepOptions {
  cli: ComfyCli;
}

async function chooseSnapshot(
  workspace: string,
  snapshotPath: string | undefined,
  prompter: Prompter
): Promise<string | null> {
  const dir = snapshotsDir(workspace);
  const available = getAvailableSnapshots(dir);
  const defaultPath = snapshotPath ? expandHome(snapshotPath) : undefined;

  if (available.length > 0) {
    const response = await getUserSelection(prompter, "Select snapshot to restore", {
      defaultValue: defaultPath ? basename(defaultPath) : undefined,
      options: available
    });
    if (!response) return null;
    // Picked from the list -> lives in the snapshots dir; typed -> a path
    return available.includes(response) ? join(dir, response) : expandHome(response);
  }

  const response = await getUserSelection(prompter, "Enter path to snapshot file", {
    defaultValue: defaultPath
  });
  return response ? expandHome(response) : null;
}

/**
 * Restore a snapshot through `comfy node restore-snapshot`. A failed
 * restore is logged and reported as false rather than thrown.
 */
export async function restoreSnapshot(
  comfyPath: string,
  snapshotPath: string | undefined,
  { skipPrompt = false, prompter, log, cli }: RestoreSnapshotOptions
): Promise<boolean> {
  const workspace = resolve(expandHome(comfyPath));
  let sourcePath: string | null;

  if (skipPrompt) {
    if (!snapshotPath) {
      log.info("No snapshot specified, skipping restore");
      return false;
    }
    sourcePath = expandHome(snapshotPath);
    if (!isFile(sourcePath)) {
      log.info(`Snapshot ${sourcePath} not found, skipping restore`);
      return false;
    }
  } else {
    sourcePath = await chooseSnapshot(workspace, snapshotPath, prompter);
    if (!sourcePath) {
      log.info("Skipping snapshot restore");
      return false;
    }
    if (!isFile(sourcePath)) {
      log.warn(`Snapshot file not found at ${sourcePath}`);
      return false;
    }
  }

  try {
    log.info(`Restoring snapshot from ${sourcePath}`);
    await cli.restoreSnapshot(workspace, sourcePath);
    log.success("Snapshot restored successfully");
    return true;
  } catch (err) {
    log.error(`Failed to restore snapshot: ${errorMessage(err)}`);
    return false;
  }
}
