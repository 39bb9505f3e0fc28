/**
 * Command actions shared by the CLI. Each takes parsed flags plus a
 * SetupContext so the whole flow can run against fakes.
 */

import { ensureComfyCli, ensureWorkspace } from "./bootstrap.js";
import { ComfyCli } from "./comfyCli.js";
import { requireComfyPath, type SetupConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { restoreSnapshot, setupManagerConfig } from "./manager.js";
import type { Prompter } from "./prompts.js";
import {
  chooseVenv,
  ensureParentDir,
  installRequirements,
  resolveComfyPath,
  systemPython,
  type PythonEnv
} from "./pythonEnv.js";
import type { CommandRunner } from "./runner.js";
import { linkProject, setupSymlinks, type CreatedLink } from "./symlinks.js";

export interface SetupContext {
  config: SetupConfig;
  prompter: Prompter;
  runner: CommandRunner;
  log: Logger;
}

export type FolderPaths = Record<string, string | undefined>;

export function createComfyCli(ctx: SetupContext, pythonEnv?: PythonEnv): ComfyCli {
  return new ComfyCli({
    runner: ctx.runner,
    log: ctx.log,
    bin: ctx.config.comfyBin,
    env: pythonEnv && Object.keys(pythonEnv.env).length > 0 ? pythonEnv.env : undefined
  });
}

/**
 * Flag values override the per-folder defaults from the environment.
 */
export function mergeFolderPaths(defaults: FolderPaths, flags: FolderPaths): FolderPaths {
  const merged: FolderPaths = { ...defaults };
  for (const [folder, value] of Object.entries(flags)) {
    if (value) merged[folder] = value;
  }
  return merged;
}

export interface SymlinksCommandOptions {
  comfyPath?: string;
  skipPrompt?: boolean;
  folders: FolderPaths;
}

export async function runSymlinks(options: SymlinksCommandOptions, ctx: SetupContext): Promise<CreatedLink[]> {
  const comfyPath = requireComfyPath(options.comfyPath, ctx.config);
  const links = await setupSymlinks(comfyPath, mergeFolderPaths(ctx.config.folderDefaults, options.folders), {
    prompter: ctx.prompter,
    log: ctx.log,
    skipPrompt: options.skipPrompt
  });
  ctx.log.success("Symlink setup completed successfully!");
  return links;
}

export interface LinkProjectCommandOptions {
  comfyPath?: string;
  projectRoot: string;
  dirs?: string[];
}

export function runLinkProject(options: LinkProjectCommandOptions, ctx: SetupContext): CreatedLink[] {
  const comfyPath = requireComfyPath(options.comfyPath, ctx.config);
  const links = linkProject(comfyPath, options.projectRoot, { dirs: options.dirs, log: ctx.log });
  ctx.log.success(`Linked ${links.length} item(s) into ${comfyPath}`);
  return links;
}

export interface ManagerCommandOptions {
  comfyPath?: string;
  managerConfig?: string;
  snapshot?: string;
  skipPrompt?: boolean;
}

export interface ManagerResult {
  managerConfig: string | null;
  snapshotRestored: boolean;
}

export async function runManager(
  options: ManagerCommandOptions,
  ctx: SetupContext,
  cli: ComfyCli = createComfyCli(ctx)
): Promise<ManagerResult> {
  const comfyPath = requireComfyPath(options.comfyPath, ctx.config);
  const { log, prompter } = ctx;

  log.debug("Environment variables:");
  log.debug(`MANAGER_CONFIG: ${ctx.config.managerConfig ?? ""}`);
  log.debug(`SNAPSHOT_PATH: ${ctx.config.snapshotPath ?? ""}`);
  log.debug(`COMFY_PATH: ${ctx.config.comfyPath ?? ""}`);

  const skipPrompt = options.skipPrompt ?? false;
  const managerConfig = await setupManagerConfig(comfyPath, options.managerConfig ?? ctx.config.managerConfig, {
    skipPrompt,
    prompter,
    log
  });
  const snapshotRestored = await restoreSnapshot(comfyPath, options.snapshot ?? ctx.config.snapshotPath, {
    skipPrompt,
    prompter,
    log,
    cli
  });
  return { managerConfig, snapshotRestored };
}

export interface InitCommandOptions {
  comfyPath?: string;
  skipPrompt?: boolean;
}

/**
 * Make sure comfy-cli is installed and has a usable default workspace.
 */
export async function runInit(
  options: InitCommandOptions,
  ctx: SetupContext,
  pythonEnv: PythonEnv = systemPython(ctx.config.python)
): Promise<string> {
  const cli = createComfyCli(ctx, pythonEnv);
  const common = { cli, prompter: ctx.prompter, log: ctx.log, skipPrompt: options.skipPrompt };
  await ensureComfyCli(pythonEnv.python, common);
  const workspace = await ensureWorkspace({
    ...common,
    gpu: ctx.config.gpu,
    preferredPath: options.comfyPath ?? ctx.config.comfyPath
  });
  // Later steps and child processes see the workspace actually in use
  process.env.COMFY_PATH = workspace;
  return workspace;
}

export interface SetupCommandOptions extends ManagerCommandOptions {
  venv?: boolean | string;
  requirements?: string;
  folders: FolderPaths;
}

export interface SetupSummary {
  workspace: string;
  pythonEnv: PythonEnv;
  managerConfig: string | null;
  snapshotRestored: boolean;
  links: CreatedLink[];
}

/**
 * The full flow: workspace path, Python environment, requirements,
 * comfy-cli, ComfyUI-Manager and symlinks, in that order.
 */
export async function runSetup(options: SetupCommandOptions, ctx: SetupContext): Promise<SetupSummary> {
  const { config, prompter, runner, log } = ctx;
  const skipPrompt = options.skipPrompt ?? false;

  log.section("ComfyUI Setup");
  const { path: comfyPath, explicit } = await resolveComfyPath({
    flag: options.comfyPath,
    envValue: config.comfyPath,
    skipPrompt,
    prompter,
    log
  });
  log.info(`Using ComfyUI path: ${comfyPath}`);
  ensureParentDir(comfyPath, log);

  log.section("Python Environment Setup");
  const pythonEnv = await chooseVenv({
    venv: options.venv,
    defaultName: config.venvName,
    skipPrompt,
    comfyPath,
    python: config.python,
    prompter,
    runner,
    log
  });

  if (options.requirements) {
    log.section("Installing Requirements");
    await installRequirements(options.requirements, pythonEnv, { runner, log });
  }

  log.section("comfy-cli");
  // Only a requested path may replace comfy-cli's current default workspace
  const workspace = await runInit({ comfyPath: explicit ? comfyPath : undefined, skipPrompt }, ctx, pythonEnv);

  log.section("ComfyUI-Manager");
  const manager = await runManager(
    { comfyPath: workspace, managerConfig: options.managerConfig, snapshot: options.snapshot, skipPrompt },
    ctx,
    createComfyCli(ctx, pythonEnv)
  );

  log.section("Symlinks");
  const links = await setupSymlinks(workspace, mergeFolderPaths(config.folderDefaults, options.folders), {
    prompter,
    log,
    skipPrompt
  });

  log.section("Setup complete");
  log.success(`ComfyUI workspace ready at ${workspace}`);
  return { workspace, pythonEnv, ...manager, links };
}
