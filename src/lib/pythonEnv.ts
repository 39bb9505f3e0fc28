/**
 * Workspace path resolution and the Python environment comfy-cli runs in.
 *
 * A virtual environment cannot be "activated" for a parent process, so the
 * venv is described as an interpreter path plus the variables activation
 * would set; every later subprocess receives them explicitly.
 */

import { existsSync, mkdirSync } from "fs";
import { delimiter, dirname, join, resolve } from "path";
import { CommandFailedError, SetupError } from "./errors.js";
import type { Logger } from "./logger.js";
import { defaultWorkspacePath, expandHome } from "./paths.js";
import type { Prompter } from "./prompts.js";
import { formatCommand, type CommandRunner } from "./runner.js";

export interface PythonEnv {
  python: string;
  /** Variables to pass to subprocesses; empty for the system interpreter */
  env: Record<string, string>;
  venvPath?: string;
}

export function systemPython(python: string): PythonEnv {
  return { python, env: {} };
}

export interface ResolveComfyPathOptions {
  flag?: string;
  envValue?: string;
  skipPrompt?: boolean;
  prompter: Prompter;
  log: Logger;
}

export interface ResolvedComfyPath {
  path: string;
  /** False when the path is only the ~/ComfyUI fallback */
  explicit: boolean;
}

/**
 * Flag beats environment; with neither, ask (or take ~/ComfyUI when prompts
 * are disabled).
 */
export async function resolveComfyPath({
  flag,
  envValue,
  skipPrompt = false,
  prompter,
  log
}: ResolveComfyPathOptions): Promise<ResolvedComfyPath> {
  const given = flag?.trim() || envValue?.trim();
  if (given) {
    return { path: resolve(expandHome(given)), explicit: true };
  }

  const fallback = defaultWorkspacePath();
  if (skipPrompt) {
    log.info("Using default ComfyUI path (--skip-prompt)");
    return { path: fallback, explicit: false };
  }
  const response = (await prompter.input("Enter ComfyUI path", fallback)).trim();
  return response ? { path: resolve(expandHome(response)), explicit: true } : { path: fallback, explicit: false };
}

export function ensureParentDir(comfyPath: string, log: Logger): void {
  const parent = dirname(comfyPath);
  if (!existsSync(parent)) {
    log.info(`Creating parent directory: ${parent}`);
    log.cmd(formatCommand("mkdir", ["-p", parent]));
    mkdirSync(parent, { recursive: true });
  }
}

function venvBinDir(venvPath: string): string {
  return process.platform === "win32" ? join(venvPath, "Scripts") : join(venvPath, "bin");
}

function venvPython(venvPath: string): string {
  return join(venvBinDir(venvPath), process.platform === "win32" ? "python.exe" : "python");
}

export interface SetupVenvOptions {
  comfyPath: string;
  name: string;
  python: string;
  runner: CommandRunner;
  log: Logger;
}

/**
 * Create (or reuse) a venv beside the workspace directory.
 */
export async function setupVenv({ comfyPath, name, python, runner, log }: SetupVenvOptions): Promise<PythonEnv> {
  const venvPath = join(dirname(comfyPath), name);
  const binDir = venvBinDir(venvPath);

  if (existsSync(join(binDir, "activate"))) {
    log.info(`Found existing virtual environment at: ${venvPath}`);
  } else {
    log.info(`Creating new virtual environment at: ${venvPath}`);
    const args = ["-m", "venv", venvPath];
    const line = formatCommand(python, args);
    log.cmd(line);
    const result = await runner.run(python, args, { inherit: true });
    if (result.exitCode !== 0) {
      throw new CommandFailedError(line, result.exitCode, result.stderr);
    }
  }

  log.success(`Using virtual environment: ${venvPath}`);
  return {
    python: venvPython(venvPath),
    venvPath,
    env: {
      VIRTUAL_ENV: venvPath,
      PATH: [binDir, process.env.PATH].filter(Boolean).join(delimiter)
    }
  };
}

export interface ChooseVenvOptions {
  /** `--venv` value: true for the default name, a string for a given name */
  venv?: boolean | string;
  defaultName: string;
  skipPrompt?: boolean;
  comfyPath: string;
  python: string;
  prompter: Prompter;
  runner: CommandRunner;
  log: Logger;
}

export async function chooseVenv(options: ChooseVenvOptions): Promise<PythonEnv> {
  const { venv, defaultName, skipPrompt = false, prompter, log } = options;

  let name: string | null = null;
  if (typeof venv === "string" && venv.trim()) {
    name = venv.trim();
  } else if (venv === true) {
    name = skipPrompt
      ? defaultName
      : (await prompter.input("Enter virtual environment name", defaultName)).trim() || defaultName;
  } else if (skipPrompt) {
    log.info("Proceeding without virtual environment (--skip-prompt)");
  } else if (await prompter.confirm("Use virtual environment?", false)) {
    name = (await prompter.input("Enter virtual environment name", defaultName)).trim() || defaultName;
  } else {
    log.info("Proceeding without virtual environment");
  }

  if (!name) {
    return systemPython(options.python);
  }
  return setupVenv({ comfyPath: options.comfyPath, name, python: options.python, runner: options.runner, log });
}

export interface InstallRequirementsOptions {
  runner: CommandRunner;
  log: Logger;
}

export async function installRequirements(
  file: string,
  pythonEnv: PythonEnv,
  { runner, log }: InstallRequirementsOptions
): Promise<void> {
  const requirements = resolve(expandHome(file));
  if (!existsSync(requirements)) {
    throw new SetupError(`requirements file not found: ${requirements}`);
  }

  log.info("Installing requirements");
  const args = ["-m", "pip", "install", "-r", requirements];
  const line = formatCommand(pythonEnv.python, args);
  log.cmd(line);
  const result = await runner.run(pythonEnv.python, args, { inherit: true, env: pythonEnv.env });
  if (result.exitCode !== 0) {
    throw new CommandFailedError(line, result.exitCode, result.stderr);
  }
}
