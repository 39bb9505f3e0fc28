import { lstatSync } from "fs";
import { homedir } from "os";
import { join } from "path";

export const DEFAULT_WORKSPACE_DIRNAME = "ComfyUI";
export const MANAGER_DIRNAME = "ComfyUI-Manager";

export type PathKind = "missing" | "symlink" | "directory" | "file";

/**
 * Replace a leading `~` with the current user's home directory.
 */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/") || path.startsWith("~\\")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

export function defaultWorkspacePath(): string {
  return join(homedir(), DEFAULT_WORKSPACE_DIRNAME);
}

export function userDefaultDir(comfyPath: string): string {
  return join(comfyPath, "user", "default");
}

export function managerDir(comfyPath: string): string {
  return join(userDefaultDir(comfyPath), MANAGER_DIRNAME);
}

export function managerConfigPath(comfyPath: string): string {
  return join(managerDir(comfyPath), "config.ini");
}

export function snapshotsDir(comfyPath: string): string {
  return join(managerDir(comfyPath), "snapshots");
}

/**
 * Where a linked folder lives inside the workspace. Workflows and snapshots
 * sit under the user profile; everything else at the workspace root.
 */
export function symlinkTarget(comfyPath: string, folder: string): string {
  if (folder === "workflows") return join(userDefaultDir(comfyPath), "workflows");
  if (folder === "snapshots") return snapshotsDir(comfyPath);
  return join(comfyPath, folder);
}

/**
 * Classify a path without following symlinks, so a dangling link is still
 * reported as "symlink".
 */
export function pathKind(path: string): PathKind {
  try {
    const stats = lstatSync(path);
    if (stats.isSymbolicLink()) return "symlink";
    if (stats.isDirectory()) return "directory";
    return "file";
  } catch (err) {
    if (isNotFound(err)) return "missing";
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}
