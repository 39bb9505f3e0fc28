import dotenv from "dotenv";
import { existsSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const GPU_VENDORS = ["nvidia", "amd", "intel", "m-series", "cpu"] as const;
export type GpuVendor = (typeof GPU_VENDORS)[number];

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Folders the symlink command knows about, in prompt order.
 */
export const SYMLINK_FOLDERS = ["input", "output", "models", "snapshots", "workflows"] as const;
export type SymlinkFolder = (typeof SYMLINK_FOLDERS)[number];

// Blank values in .env files mean "unset"
const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

function withDefault<T extends string>(schema: z.ZodType<T>, fallback: T) {
  return optionalString.pipe(schema.optional()).transform((value) => value ?? fallback);
}

const envSchema = z.object({
  COMFY_PATH: optionalString,
  COMFY_GPU: withDefault(z.enum(GPU_VENDORS), "nvidia"),
  COMFY_BIN: withDefault(z.string(), "comfy"),
  PYTHON: withDefault(z.string(), "python3"),
  VENV_NAME: withDefault(z.string(), "venv"),
  MANAGER_CONFIG: optionalString,
  SNAPSHOT_PATH: optionalString,
  INPUT_PATH: optionalString,
  OUTPUT_PATH: optionalString,
  MODELS_PATH: optionalString,
  SNAPSHOTS_PATH: optionalString,
  WORKFLOWS_PATH: optionalString,
  LOG_LEVEL: withDefault(z.enum(LOG_LEVELS), "info")
});

export interface SetupConfig {
  comfyPath?: string;
  gpu: GpuVendor;
  comfyBin: string;
  python: string;
  venvName: string;
  managerConfig?: string;
  snapshotPath?: string;
  /** Default symlink sources keyed by folder name */
  folderDefaults: Partial<Record<SymlinkFolder, string>>;
  logLevel: LogLevel;
}

/**
 * Load a .env file into process.env without overriding variables that are
 * already set. Returns the resolved path when a file was found.
 */
export function loadEnvFile(path = ".env"): string | null {
  const envPath = resolve(path);
  if (!existsSync(envPath)) {
    return null;
  }
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    throw new ConfigError(`Failed to load ${envPath}: ${result.error.message}`);
  }
  return envPath;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SetupConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${issues}`);
  }

  const vars = parsed.data;
  const folderDefaults: Partial<Record<SymlinkFolder, string>> = {};
  const byFolder: Record<SymlinkFolder, string | undefined> = {
    input: vars.INPUT_PATH,
    output: vars.OUTPUT_PATH,
    models: vars.MODELS_PATH,
    snapshots: vars.SNAPSHOTS_PATH,
    workflows: vars.WORKFLOWS_PATH
  };
  for (const folder of SYMLINK_FOLDERS) {
    const value = byFolder[folder];
    if (value) folderDefaults[folder] = value;
  }

  return {
    comfyPath: vars.COMFY_PATH,
    gpu: vars.COMFY_GPU,
    comfyBin: vars.COMFY_BIN,
    python: vars.PYTHON,
    venvName: vars.VENV_NAME,
    managerConfig: vars.MANAGER_CONFIG,
    snapshotPath: vars.SNAPSHOT_PATH,
    folderDefaults,
    logLevel: vars.LOG_LEVEL
  };
}

export function requireComfyPath(flag: string | undefined, config: SetupConfig): string {
  const value = flag?.trim() || config.comfyPath;
  if (!value) {
    throw new ConfigError("ComfyUI workspace path not provided (use --comfy-path or COMFY_PATH)");
  }
  return value;
}
