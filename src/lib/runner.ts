import { execa } from "execa";

export interface RunOptions {
  /** Stream output to the terminal instead of capturing it */
  inherit?: boolean;
  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  failed: boolean;
  /** The executable could not be spawned at all */
  notFound: boolean;
}

/**
 * Runs external commands. Implementations report failure through the result
 * and never throw for a non-zero exit or a missing executable.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

export class ExecaRunner implements CommandRunner {
  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const result = await execa(command, args, {
      reject: false,
      stdio: options.inherit ? "inherit" : "pipe",
      env: options.env
    });

    // A spawn error (ENOENT, EACCES) leaves exitCode unset
    const spawned = Number.isInteger(result.exitCode);
    return {
      exitCode: spawned ? result.exitCode : 127,
      stdout: typeof result.stdout === "string" ? result.stdout : "",
      stderr: typeof result.stderr === "string" ? result.stderr : "",
      failed: result.failed,
      notFound: !spawned
    };
  }
}

/**
 * Render a command line for display, quoting arguments that need it.
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(quoteArg).join(" ");
}

function quoteArg(arg: string): string {
  if (arg === "") return '""';
  return /[\s"'$`\\]/.test(arg) ? `"${arg.replace(/(["$`\\])/g, "\\$1")}"` : arg;
}
