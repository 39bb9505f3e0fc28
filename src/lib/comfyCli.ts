/**
 * Thin wrapper over the comfy-cli executable.
 *
 * Queries (`isInstalled`, `which`) answer with booleans/nulls; mutating
 * commands throw CommandFailedError so callers decide whether a failure
 * skips a step or aborts the run.
 */

import type { GpuVendor } from "./config.js";
import { CommandFailedError } from "./errors.js";
import type { Logger } from "./logger.js";
import { formatCommand, type CommandRunner, type RunOptions } from "./runner.js";

export const COMFY_CLI_PACKAGE = "comfy-cli";

const GPU_FLAGS: Record<GpuVendor, string> = {
  nvidia: "--nvidia",
  amd: "--amd",
  intel: "--intel-arc",
  "m-series": "--m-series",
  cpu: "--cpu"
};

export interface ComfyCliOptions {
  runner: CommandRunner;
  log: Logger;
  bin?: string;
  /** Environment for every comfy invocation (e.g. an activated venv) */
  env?: Record<string, string>;
}

export class ComfyCli {
  private runner: CommandRunner;
  private log: Logger;
  private bin: string;
  private env?: Record<string, string>;

  constructor({ runner, log, bin = "comfy", env }: ComfyCliOptions) {
    this.runner = runner;
    this.log = log;
    this.bin = bin;
    this.env = env;
  }

  async isInstalled(): Promise<boolean> {
    const result = await this.runner.run(this.bin, ["--version"], { env: this.env });
    return result.exitCode === 0 && !result.notFound;
  }

  /**
   * pip-install comfy-cli with the given interpreter.
   */
  async installCli(python: string): Promise<boolean> {
    const args = ["-m", "pip", "install", COMFY_CLI_PACKAGE];
    this.log.info(`Installing ${COMFY_CLI_PACKAGE}...`);
    this.log.cmd(formatCommand(python, args));
    const result = await this.runner.run(python, args, { env: this.env });
    if (result.exitCode === 0) {
      this.log.success(`Successfully installed ${COMFY_CLI_PACKAGE}`);
      return true;
    }
    const reason = result.notFound ? `${python} not found` : result.stderr.trim();
    this.log.error(`Failed to install ${COMFY_CLI_PACKAGE}: ${reason}`);
    return false;
  }

  /**
   * Current default workspace as reported by `comfy which`, or null.
   */
  async which(): Promise<string | null> {
    const result = await this.runner.run(this.bin, ["which"], { env: this.env });
    if (result.exitCode !== 0) {
      return null;
    }
    return parseWhichOutput(result.stdout);
  }

  async setDefault(workspace: string): Promise<void> {
    await this.mutate(["set-default", workspace]);
  }

  async installWorkspace(workspace: string, gpu: GpuVendor): Promise<void> {
    await this.mutate(["--workspace", workspace, "--skip-prompt", "install", GPU_FLAGS[gpu]]);
  }

  async restoreSnapshot(workspace: string, snapshotFile: string): Promise<void> {
    await this.mutate(["--workspace", workspace, "node", "restore-snapshot", snapshotFile]);
  }

  private async mutate(args: string[]): Promise<void> {
    const line = formatCommand(this.bin, args);
    this.log.cmd(line);
    const options: RunOptions = { inherit: true, env: this.env };
    const result = await this.runner.run(this.bin, args, options);
    if (result.exitCode !== 0) {
      throw new CommandFailedError(line, result.exitCode, result.stderr);
    }
  }
}

/**
 * comfy-cli prints either the bare path or a labelled line such as
 * "Target ComfyUI path: /home/me/ComfyUI". Take the last non-empty line and
 * drop any label.
 */
export function parseWhichOutput(stdout: string): string | null {
  const lines = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
  const last = lines.at(-1);
  if (!last) return null;
  const labelled = last.match(/^[^/\\~]*?:\s+(.+)$/);
  return (labelled?.[1] ?? last).trim() || null;
}
