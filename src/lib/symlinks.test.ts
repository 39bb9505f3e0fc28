import { describe, expect, it, beforeEach, afterEach } from "vitest";
import {
  existsSync,
  lstatSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  readlinkSync,
  rmSync,
  symlinkSync,
  writeFileSync
} from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  linkProject,
  removeTarget,
  replaceWithSymlink,
  setupDirectorySymlinks,
  sourceInsideTarget,
  setupSettingsSymlinks,
  setupSymlinks
} from "./symlinks.js";
import { ConfigError } from "./errors.js";
import { RecordingLogger, ScriptedPrompter } from "./testing/fakes.js";

describe("symlinks", () => {
  let root: string;
  let workspace: string;
  let log: RecordingLogger;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "comfy-symlinks-"));
    workspace = join(root, "ComfyUI");
    mkdirSync(workspace);
    log = new RecordingLogger();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe("removeTarget", () => {
    it("does nothing when the target is missing", () => {
      expect(removeTarget(join(root, "missing"), log)).toBe(false);
      expect(log.entries).toEqual([]);
    });

    it("removes a real directory recursively", () => {
      const target = join(root, "models");
      mkdirSync(join(target, "checkpoints"), { recursive: true });
      writeFileSync(join(target, "checkpoints", "a.safetensors"), "x");

      expect(removeTarget(target, log)).toBe(true);
      expect(existsSync(target)).toBe(false);
      expect(log.messages("info")).toEqual([`Removing existing ${target}`]);
    });

    it("unlinks a directory symlink without touching its contents", () => {
      const real = join(root, "real");
      mkdirSync(real);
      writeFileSync(join(real, "keep.txt"), "keep");
      const link = join(root, "link");
      symlinkSync(real, link, "dir");

      removeTarget(link, log);

      expect(existsSync(link)).toBe(false);
      expect(readFileSync(join(real, "keep.txt"), "utf8")).toBe("keep");
    });

    it("removes a dangling symlink", () => {
      const link = join(root, "dangling");
      symlinkSync(join(root, "gone"), link);

      expect(removeTarget(link, log)).toBe(true);
      expect(() => lstatSync(link)).toThrow();
    });
  });

  describe("replaceWithSymlink", () => {
    it("creates parent directories and replaces an existing file", () => {
      const source = join(root, "source.json");
      writeFileSync(source, "{}");
      const target = join(root, "a", "b", "target.json");
      mkdirSync(join(root, "a", "b"), { recursive: true });
      writeFileSync(target, "old");

      replaceWithSymlink(source, target, { directory: false, log });

      expect(lstatSync(target).isSymbolicLink()).toBe(true);
      expect(readlinkSync(target)).toBe(source);
      expect(readFileSync(target, "utf8")).toBe("{}");
    });

    it("refuses to replace a directory that holds the source", () => {
      const target = join(root, "models");
      const source = join(target, "checkpoints");
      mkdirSync(source, { recursive: true });

      expect(replaceWithSymlink(source, target, { directory: true, log })).toBe(false);
      expect(lstatSync(target).isDirectory()).toBe(true);
      expect(existsSync(source)).toBe(true);
      expect(log.messages("warn")).toEqual([`Source ${source} is inside ${target}, skipping`]);
    });
  });

  describe("sourceInsideTarget", () => {
    it("matches the target itself and paths below it", () => {
      expect(sourceInsideTarget(join(root, "models"), join(root, "models"))).toBe(true);
      expect(sourceInsideTarget(join(root, "models", "sd"), join(root, "models"))).toBe(true);
      expect(sourceInsideTarget(join(root, "models-src"), join(root, "models"))).toBe(false);
    });

    it("follows links in the source path", () => {
      const target = join(root, "models");
      mkdirSync(join(target, "sd"), { recursive: true });
      const alias = join(root, "alias");
      symlinkSync(join(target, "sd"), alias, "dir");

      expect(sourceInsideTarget(alias, target)).toBe(true);
    });
  });

  describe("setupSymlinks", () => {
    it("rejects an empty workspace path", async () => {
      const prompter = new ScriptedPrompter();
      await expect(setupSymlinks("  ", {}, { prompter, log })).rejects.toBeInstanceOf(ConfigError);
    });

    it("links provided folders without prompting when skipPrompt is set", async () => {
      const models = join(root, "models-src");
      mkdirSync(models);
      const workflows = join(root, "workflows-src");
      const prompter = new ScriptedPrompter();

      const created = await setupSymlinks(
        workspace,
        { models, workflows, input: undefined },
        { prompter, log, skipPrompt: true }
      );

      expect(prompter.asked).toEqual([]);
      expect(created.map((link) => link.folder)).toEqual(["models", "workflows"]);

      const modelsTarget = join(workspace, "models");
      expect(readlinkSync(modelsTarget)).toBe(models);

      const workflowsTarget = join(workspace, "user", "default", "workflows");
      expect(readlinkSync(workflowsTarget)).toBe(workflows);
      expect(existsSync(workflows)).toBe(true);
      expect(log.messages("info")).toContain(`Creating directory: ${workflows}`);
    });

    it("collects answers for every known folder before linking", async () => {
      const output = join(root, "out-src");
      const snapshots = join(root, "snap-src");
      mkdirSync(join(workspace, "output"), { recursive: true });
      writeFileSync(join(workspace, "output", "old.png"), "x");

      // input: blank, no default -> skip; output: typed; models: blank with default;
      // snapshots: blank with default; workflows: blank, no default -> skip
      const models = join(root, "models-default");
      const prompter = new ScriptedPrompter(["", output, "", "", ""]);

      const created = await setupSymlinks(
        workspace,
        { models, snapshots },
        { prompter, log }
      );

      expect(prompter.asked.map((question) => question.message)).toEqual([
        "Enter path for input (empty to skip)",
        "Enter path for output (empty to skip)",
        "Enter path for models",
        "Enter path for snapshots",
        "Enter path for workflows (empty to skip)"
      ]);
      expect(prompter.asked[2]?.defaultValue).toBe(models);
      expect(created.map((link) => link.folder)).toEqual(["output", "models", "snapshots"]);

      const outputTarget = join(workspace, "output");
      expect(log.messages("info")).toContain(`Removing existing ${outputTarget}`);
      expect(readlinkSync(outputTarget)).toBe(output);
      expect(readlinkSync(join(workspace, "user", "default", "ComfyUI-Manager", "snapshots"))).toBe(snapshots);
      expect(existsSync(join(workspace, "input"))).toBe(false);
    });
  });

  it("keeps a workspace folder that is its own source", async () => {
    const models = join(workspace, "models");
    mkdirSync(models);
    writeFileSync(join(models, "big.safetensors"), "weights");

    const created = await setupSymlinks(workspace, { models }, { prompter: new ScriptedPrompter(), log, skipPrompt: true });

    expect(created).toEqual([]);
    expect(readFileSync(join(models, "big.safetensors"), "utf8")).toBe("weights");
    expect(log.messages("warn")).toEqual([`Source ${models} is inside ${models}, skipping`]);
  });

  describe("project linking", () => {
    let project: string;

    beforeEach(() => {
      project = join(root, "project");
      mkdirSync(project);
    });

    it("links existing directories and leaves targets of missing ones alone", () => {
      mkdirSync(join(project, "custom_nodes"));
      mkdirSync(join(workspace, "models"));
      writeFileSync(join(workspace, "models", "keep.txt"), "keep");

      const created = setupDirectorySymlinks(workspace, project, ["custom_nodes", "models"], log);

      expect(created.map((link) => link.folder)).toEqual(["custom_nodes"]);
      expect(readlinkSync(join(workspace, "custom_nodes"))).toBe(join(project, "custom_nodes"));
      expect(readFileSync(join(workspace, "models", "keep.txt"), "utf8")).toBe("keep");
      expect(log.messages("warn")).toEqual([`Source directory ${join(project, "models")} does not exist`]);
    });

    it("links workflows and settings files present in the project", () => {
      const userDefault = join(project, "user", "default");
      mkdirSync(join(userDefault, "workflows"), { recursive: true });
      writeFileSync(join(userDefault, "comfy.settings.json"), '{"a":1}');

      const created = setupSettingsSymlinks(workspace, project, log);

      expect(created.map((link) => link.folder)).toEqual(["workflows", "comfy.settings.json"]);
      const settingsTarget = join(workspace, "user", "default", "comfy.settings.json");
      expect(lstatSync(settingsTarget).isSymbolicLink()).toBe(true);
      expect(readFileSync(settingsTarget, "utf8")).toBe('{"a":1}');
      expect(log.messages("warn")).toEqual(["Settings file jnodes.settings.json does not exist in source"]);
    });

    it("warns when the project has no workflows directory", () => {
      setupSettingsSymlinks(workspace, project, log);

      expect(existsSync(join(workspace, "user", "default"))).toBe(true);
      expect(log.messages("warn")).toEqual([
        "Workflows directory does not exist in source",
        "Settings file comfy.settings.json does not exist in source",
        "Settings file jnodes.settings.json does not exist in source"
      ]);
    });

    it("runs directory and settings linking together", () => {
      mkdirSync(join(project, "input"));
      mkdirSync(join(project, "user", "default", "workflows"), { recursive: true });

      const created = linkProject(workspace, project, { dirs: ["input"], log });

      expect(created.map((link) => link.folder)).toEqual(["input", "workflows"]);
    });
  });
});
