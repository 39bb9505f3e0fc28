/**
 * comfy-cli and workspace bootstrap.
 *
 * Makes sure comfy-cli is on PATH (installing it with pip when allowed) and
 * that comfy-cli has a default workspace, installing ComfyUI when the
 * workspace directory does not exist yet.
 */

import { existsSync } from "fs";
import { resolve } from "path";
import type { ComfyCli } from "./comfyCli.js";
import type { GpuVendor } from "./config.js";
import { SetupError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { defaultWorkspacePath, expandHome } from "./paths.js";
import { getUserConfirmation, type Prompter } from "./prompts.js";

export interface BootstrapOptions {
  cli: ComfyCli;
  prompter: Prompter;
  log: Logger;
  skipPrompt?: boolean;
}

export async function ensureComfyCli(
  python: string,
  { cli, prompter, log, skipPrompt = false }: BootstrapOptions
): Promise<void> {
  if (await cli.isInstalled()) {
    log.info("comfy-cli is installed");
    return;
  }

  log.info("comfy-cli not found, attempting to install...");
  const accepted = await getUserConfirmation(
    prompter,
    "comfy-cli not found. Would you like to install it?",
    skipPrompt
  );
  if (!accepted) {
    log.info("User declined comfy-cli installation");
    throw new SetupError("Failed to install comfy-cli");
  }
  if (!(await cli.installCli(python))) {
    throw new SetupError("Failed to install comfy-cli");
  }
}

export interface WorkspaceSetupOptions extends BootstrapOptions {
  gpu: GpuVendor;
}

/**
 * Register `workspacePath` as comfy-cli's default workspace, installing
 * ComfyUI there first when the directory is missing. Returns the workspace
 * path, or null when the user declined or a command failed.
 */
export async function setupDefaultWorkspace(
  workspacePath: string,
  { cli, prompter, log, skipPrompt = false, gpu }: WorkspaceSetupOptions
): Promise<string | null> {
  if (existsSync(workspacePath)) {
    log.info(`Found existing ComfyUI installation at ${workspacePath}`);
    const accepted = await getUserConfirmation(
      prompter,
      `Would you like to set ${workspacePath} as the default workspace?`,
      skipPrompt
    );
    if (!accepted) {
      log.info("User declined to set default workspace");
      return null;
    }
    try {
      await cli.setDefault(workspacePath);
      log.info(`Set ${workspacePath} as default workspace`);
      return workspacePath;
    } catch (err) {
      log.error(`Failed to set default workspace: ${errorMessage(err)}`);
      return null;
    }
  }

  log.info(`No ComfyUI installation found at ${workspacePath}`);
  const accepted = await getUserConfirmation(
    prompter,
    `Would you like to install ComfyUI at ${workspacePath}?`,
    skipPrompt
  );
  if (!accepted) {
    log.info("User declined ComfyUI installation");
    return null;
  }

  log.info(`Installing ComfyUI at ${workspacePath} (${gpu})`);
  try {
    await cli.installWorkspace(workspacePath, gpu);
    await cli.setDefault(workspacePath);
  } catch (err) {
    log.error(`Failed to install ComfyUI: ${errorMessage(err)}`);
    return null;
  }

  const workspace = await cli.which();
  if (!workspace) {
    log.error("Failed to verify workspace after installation");
    return null;
  }
  log.success(`Successfully installed and configured ComfyUI at ${workspace}`);
  return workspace;
}

export interface EnsureWorkspaceOptions extends WorkspaceSetupOptions {
  /** Workspace requested by flag, environment or prompt */
  preferredPath?: string;
}

/**
 * Resolve the workspace to operate on. comfy-cli's current default wins
 * unless a different path was requested explicitly.
 */
export async function ensureWorkspace(options: EnsureWorkspaceOptions): Promise<string> {
  const { cli, log, preferredPath } = options;
  const preferred = preferredPath ? resolve(expandHome(preferredPath)) : undefined;

  const current = await cli.which();
  if (current && (!preferred || resolve(expandHome(current)) === preferred)) {
    log.info(`Using ComfyUI workspace: ${current}`);
    return current;
  }

  if (current) {
    log.info(`comfy-cli default workspace is ${current}; switching to ${preferred}`);
  } else {
    log.info("No active workspace found, attempting to setup default workspace...");
  }

  const workspace = await setupDefaultWorkspace(preferred ?? defaultWorkspacePath(), options);
  if (!workspace) {
    throw new SetupError("Failed to setup default workspace");
  }
  log.info(`Using ComfyUI workspace: ${workspace}`);
  return workspace;
}
