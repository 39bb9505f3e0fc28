/**
 * Setup errors
 *
 * Anything thrown from a setup step ends up in the CLI's top-level handler,
 * which prints the message and exits with status 1.
 */

/**
 * Base error for a setup step that cannot continue.
 */
export class SetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SetupError";
  }
}

/**
 * Invalid or missing configuration (flags, environment, .env).
 */
export class ConfigError extends SetupError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * A subprocess exited with a non-zero status or could not be spawned.
 */
export class CommandFailedError extends SetupError {
  public readonly command: string;
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string) {
    const detail = stderr.trim();
    super(`Command failed (exit ${exitCode}): ${command}${detail ? `\n${detail}` : ""}`);
    this.name = "CommandFailedError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
