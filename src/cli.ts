#!/usr/bin/env node
import { Command } from "commander";
import { SYMLINK_FOLDERS, loadConfig, loadEnvFile } from "./lib/config.js";
import { errorMessage } from "./lib/errors.js";
import { ConsoleLogger } from "./lib/logger.js";
import { InquirerPrompter } from "./lib/prompts.js";
import { ExecaRunner } from "./lib/runner.js";
import {
  runInit,
  runLinkProject,
  runManager,
  runSetup,
  runSymlinks,
  type FolderPaths,
  type SetupContext
} from "./lib/setup.js";

const log = new ConsoleLogger();

function createContext(program: Command): SetupContext {
  const { envFile } = program.opts<{ envFile: string }>();
  const loaded = loadEnvFile(envFile);
  const config = loadConfig();
  log.setLevel(config.logLevel);
  if (loaded) {
    log.debug(`Loaded environment variables from ${loaded}`);
  } else {
    log.debug(`No .env file found at ${envFile}`);
  }
  return { config, prompter: new InquirerPrompter(), runner: new ExecaRunner(), log };
}

interface FolderFlags {
  input?: string;
  output?: string;
  models?: string;
  snapshots?: string;
  workflows?: string;
}

function folderPaths(opts: FolderFlags): FolderPaths {
  return {
    input: opts.input,
    output: opts.output,
    models: opts.models,
    snapshots: opts.snapshots,
    workflows: opts.workflows
  };
}

function withFolderOptions(command: Command): Command {
  for (const folder of SYMLINK_FOLDERS) {
    command.option(`--${folder} <path>`, `Source directory for ${folder}`);
  }
  return command;
}

const program = new Command();

program
  .name("comfy-setup")
  .description("ComfyUI workspace setup: symlinks, ComfyUI-Manager config, snapshots and comfy-cli")
  .version("0.1.0")
  .option("--env-file <path>", "Environment file to load", ".env");

withFolderOptions(
  program
    .command("symlinks")
    .description("Link input/output/models/snapshots/workflows folders into the workspace")
    .option("--comfy-path <path>", "Path to ComfyUI workspace (default: COMFY_PATH)")
    .option("--skip-prompt", "Use flag and environment values without asking")
).action(async (opts: FolderFlags & { comfyPath?: string; skipPrompt?: boolean }) => {
  const ctx = createContext(program);
  await runSymlinks({ comfyPath: opts.comfyPath, skipPrompt: opts.skipPrompt, folders: folderPaths(opts) }, ctx);
});

program
  .command("link-project")
  .description("Link a project checkout's directories and user settings into the workspace")
  .option("--comfy-path <path>", "Path to ComfyUI workspace (default: COMFY_PATH)")
  .option("--project-root <dir>", "Project directory", process.cwd())
  .option("--dirs <list>", "Comma-separated directories to link", (value: string) =>
    value
      .split(",")
      .map((dir) => dir.trim())
      .filter(Boolean)
  )
  .action((opts: { comfyPath?: string; projectRoot: string; dirs?: string[] }) => {
    const ctx = createContext(program);
    runLinkProject(opts, ctx);
  });

program
  .command("manager")
  .description("Copy ComfyUI-Manager config.ini and restore a snapshot")
  .option("--comfy-path <path>", "Path to ComfyUI workspace (default: COMFY_PATH)")
  .option("--manager-config <path>", "Path to ComfyUI-Manager config.ini (default: MANAGER_CONFIG)")
  .option("--snapshot <path>", "Path to snapshot file to restore (default: SNAPSHOT_PATH)")
  .option("--skip-prompt", "Skip interactive prompts")
  .action(async (opts: { comfyPath?: string; managerConfig?: string; snapshot?: string; skipPrompt?: boolean }) => {
    const ctx = createContext(program);
    await runManager(opts, ctx);
  });

program
  .command("init")
  .description("Install comfy-cli if needed and make sure it has a default workspace")
  .option("--comfy-path <path>", "Workspace to register (default: COMFY_PATH, then ~/ComfyUI)")
  .option("--skip-prompt", "Answer yes to every confirmation")
  .action(async (opts: { comfyPath?: string; skipPrompt?: boolean }) => {
    const ctx = createContext(program);
    const workspace = await runInit(opts, ctx);
    log.success(`Using ComfyUI workspace: ${workspace}`);
  });

withFolderOptions(
  program
    .command("setup")
    .description("Full setup: workspace path, Python environment, comfy-cli, ComfyUI-Manager and symlinks")
    .option("--comfy-path <path>", "Path to ComfyUI workspace (default: COMFY_PATH, then prompt)")
    .option("--venv [name]", "Create or reuse a virtual environment beside the workspace")
    .option("--requirements <file>", "pip requirements file to install into the environment")
    .option("--manager-config <path>", "Path to ComfyUI-Manager config.ini")
    .option("--snapshot <path>", "Path to snapshot file to restore")
    .option("--skip-prompt", "Skip interactive prompts")
).action(
  async (
    opts: FolderFlags & {
      comfyPath?: string;
      venv?: boolean | string;
      requirements?: string;
      managerConfig?: string;
      snapshot?: string;
      skipPrompt?: boolean;
    }
  ) => {
    const ctx = createContext(program);
    await runSetup({ ...opts, folders: folderPaths(opts) }, ctx);
  }
);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
