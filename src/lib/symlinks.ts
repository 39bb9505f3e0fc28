/**
 * Symlink setup between source directories and a ComfyUI workspace.
 *
 * Two flavours:
 * - folder linking (`setupSymlinks`): the operator picks a source for each
 *   known folder (input, output, models, snapshots, workflows) and the
 *   workspace copy is replaced with a link, creating the source if needed.
 * - project linking (`linkProject`): a project checkout mirrors the workspace
 *   layout and its directories and settings files are linked in; anything
 *   missing from the project is reported and left alone.
 */

import { existsSync, mkdirSync, realpathSync, rmSync, statSync, symlinkSync, unlinkSync } from "fs";
import { basename, dirname, join, resolve, sep } from "path";
import { SYMLINK_FOLDERS } from "./config.js";
import { ConfigError } from "./errors.js";
import type { Logger } from "./logger.js";
import { expandHome, pathKind, symlinkTarget, userDefaultDir } from "./paths.js";
import { getUserPath, type Prompter } from "./prompts.js";

export const DEFAULT_PROJECT_DIRS = ["custom_nodes", "models", "input", "output"];
export const SETTINGS_FILES = ["comfy.settings.json", "jnodes.settings.json"];

export interface CreatedLink {
  folder: string;
  source: string;
  target: string;
}

/**
 * Remove whatever sits at `target`. Real directories are deleted
 * recursively; files and symlinks (including links to directories) are
 * unlinked so the link's destination is never touched.
 */
export function removeTarget(target: string, log: Logger): boolean {
  const kind = pathKind(target);
  if (kind === "missing") return false;

  log.info(`Removing existing ${target}`);
  if (kind === "directory") {
    rmSync(target, { recursive: true, force: true });
  } else {
    unlinkSync(target);
  }
  return true;
}

export interface ReplaceOptions {
  directory: boolean;
  log: Logger;
}

// Resolve links in the longest existing prefix; the rest is taken as written
function realPath(path: string): string {
  const absolute = resolve(path);
  if (existsSync(absolute)) return realpathSync(absolute);
  const parent = dirname(absolute);
  return parent === absolute ? absolute : join(realPath(parent), basename(absolute));
}

function within(path: string, dir: string): boolean {
  return path === dir || path.startsWith(dir.endsWith(sep) ? dir : dir + sep);
}

/**
 * True when `source` is `target` or lives under it, either as written or
 * once links are followed. The target's own link is not followed.
 */
export function sourceInsideTarget(source: string, target: string): boolean {
  const targetPath = resolve(target);
  if (within(resolve(source), targetPath)) return true;
  return within(realPath(source), join(realPath(dirname(targetPath)), basename(targetPath)));
}

/**
 * Replace `target` with a link to `source`. Returns false, leaving the
 * target alone, when removing it would delete the source.
 */
export function replaceWithSymlink(source: string, target: string, { directory, log }: ReplaceOptions): boolean {
  if (sourceInsideTarget(source, target)) {
    log.warn(`Source ${source} is inside ${target}, skipping`);
    return false;
  }
  mkdirSync(dirname(target), { recursive: true });
  removeTarget(target, log);
  symlinkSync(source, target, directory ? "dir" : "file");
  return true;
}

function orderFolders(folders: string[]): string[] {
  const known: string[] = SYMLINK_FOLDERS.filter((folder) => folders.includes(folder));
  const extra = folders.filter((folder) => !known.includes(folder)).sort();
  return [...known, ...extra];
}

export interface SetupSymlinksOptions {
  prompter: Prompter;
  log: Logger;
  skipPrompt?: boolean;
}

/**
 * Link each folder of the workspace to a source directory.
 *
 * Nothing on disk changes until every folder's path has been collected.
 */
export async function setupSymlinks(
  comfyPath: string,
  paths: Record<string, string | undefined>,
  { prompter, log, skipPrompt = false }: SetupSymlinksOptions
): Promise<CreatedLink[]> {
  if (!comfyPath.trim()) {
    throw new ConfigError("ComfyUI workspace path not provided");
  }
  const workspace = resolve(expandHome(comfyPath));
  log.info(`Setting up symlinks for ComfyUI workspace at: ${workspace}`);

  const folders = skipPrompt
    ? orderFolders(Object.keys(paths).filter((folder) => paths[folder]))
    : orderFolders([...new Set([...SYMLINK_FOLDERS, ...Object.keys(paths)])]);

  const collected: Array<{ folder: string; source: string }> = [];
  for (const folder of folders) {
    const defaultPath = paths[folder];
    const source = skipPrompt
      ? defaultPath
        ? expandHome(defaultPath)
        : null
      : await getUserPath(prompter, folder, defaultPath);
    if (source) {
      collected.push({ folder, source: resolve(source) });
    } else {
      log.debug(`Skipping ${folder}`);
    }
  }

  const created: CreatedLink[] = [];
  for (const { folder, source } of collected) {
    const target = symlinkTarget(workspace, folder);

    if (!replaceWithSymlink(source, target, { directory: true, log })) continue;
    if (pathKind(source) === "missing") {
      log.info(`Creating directory: ${source}`);
      mkdirSync(source, { recursive: true });
    }
    log.info(`Creating symlink: ${target} -> ${source}`);
    created.push({ folder, source, target });
  }
  return created;
}

/**
 * Link `<project>/<dir>` into the workspace root for each dir. A missing
 * source leaves the workspace untouched.
 */
export function setupDirectorySymlinks(
  comfyPath: string,
  projectRoot: string,
  dirs: string[],
  log: Logger
): CreatedLink[] {
  const created: CreatedLink[] = [];
  for (const dir of dirs) {
    const source = join(projectRoot, dir);
    const target = join(comfyPath, dir);

    if (!isDirectory(source)) {
      log.warn(`Source directory ${source} does not exist`);
      continue;
    }
    log.info(`Creating symlink for ${dir}`);
    if (replaceWithSymlink(source, target, { directory: true, log })) {
      created.push({ folder: dir, source, target });
    }
  }
  return created;
}

/**
 * Link the project's user/default/workflows directory and settings files
 * into the workspace user profile.
 */
export function setupSettingsSymlinks(comfyPath: string, projectRoot: string, log: Logger): CreatedLink[] {
  const targetRoot = userDefaultDir(comfyPath);
  const sourceRoot = userDefaultDir(projectRoot);
  mkdirSync(targetRoot, { recursive: true });

  const created: CreatedLink[] = [];
  const workflowsSource = join(sourceRoot, "workflows");
  if (isDirectory(workflowsSource)) {
    log.info("Creating symlink for user/default/workflows");
    const target = join(targetRoot, "workflows");
    if (replaceWithSymlink(workflowsSource, target, { directory: true, log })) {
      created.push({ folder: "workflows", source: workflowsSource, target });
    }
  } else {
    log.warn("Workflows directory does not exist in source");
  }

  for (const file of SETTINGS_FILES) {
    const source = join(sourceRoot, file);
    if (!isFile(source)) {
      log.warn(`Settings file ${file} does not exist in source`);
      continue;
    }
    log.info(`Creating symlink for user/default/${file}`);
    const target = join(targetRoot, file);
    if (replaceWithSymlink(source, target, { directory: false, log })) {
      created.push({ folder: file, source, target });
    }
  }
  return created;
}

export interface LinkProjectOptions {
  dirs?: string[];
  log: Logger;
}

export function linkProject(comfyPath: string, projectRoot: string, { dirs, log }: LinkProjectOptions): CreatedLink[] {
  const workspace = resolve(expandHome(comfyPath));
  const project = resolve(expandHome(projectRoot));
  log.info(`Linking project ${project} into ${workspace}`);
  return [
    ...setupDirectorySymlinks(workspace, project, dirs ?? DEFAULT_PROJECT_DIRS, log),
    ...setupSettingsSymlinks(workspace, project, log)
  ];
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}
