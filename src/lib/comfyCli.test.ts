import { describe, expect, it, beforeEach } from "vitest";
import { ComfyCli, parseWhichOutput } from "./comfyCli.js";
import { CommandFailedError } from "./errors.js";
import { FakeRunner, RecordingLogger } from "./testing/fakes.js";

describe("ComfyCli", () => {
  let runner: FakeRunner;
  let log: RecordingLogger;
  let cli: ComfyCli;

  beforeEach(() => {
    runner = new FakeRunner();
    log = new RecordingLogger();
    cli = new ComfyCli({ runner, log });
  });

  describe("isInstalled", () => {
    it("is true when --version succeeds", async () => {
      runner.on("comfy --version", { stdout: "1.2.3" });
      await expect(cli.isInstalled()).resolves.toBe(true);
    });

    it("is false when the executable is missing", async () => {
      runner.on("comfy --version", { exitCode: 127, notFound: true });
      await expect(cli.isInstalled()).resolves.toBe(false);
    });
  });

  describe("installCli", () => {
    it("pip-installs comfy-cli with the given interpreter", async () => {
      await expect(cli.installCli("/venv/bin/python")).resolves.toBe(true);
      expect(runner.commandLines()).toEqual(["/venv/bin/python -m pip install comfy-cli"]);
      expect(log.messages("cmd")).toEqual(["/venv/bin/python -m pip install comfy-cli"]);
    });

    it("logs stderr when pip fails", async () => {
      runner.on("python3 -m pip", { exitCode: 1, stderr: "no network\n" });
      await expect(cli.installCli("python3")).resolves.toBe(false);
      expect(log.messages("error")).toEqual(["Failed to install comfy-cli: no network"]);
    });
  });

  describe("which", () => {
    it("returns null on failure", async () => {
      runner.on("comfy which", { exitCode: 1 });
      await expect(cli.which()).resolves.toBeNull();
    });

    it("returns the reported workspace", async () => {
      runner.on("comfy which", { stdout: "Target ComfyUI path: /home/me/ComfyUI\n" });
      await expect(cli.which()).resolves.toBe("/home/me/ComfyUI");
    });
  });

  it("passes the configured environment to every call", async () => {
    const scoped = new ComfyCli({ runner, log, env: { VIRTUAL_ENV: "/venv" } });
    await scoped.isInstalled();
    await scoped.setDefault("/ws");
    expect(runner.calls.map((call) => call.options)).toEqual([
      { env: { VIRTUAL_ENV: "/venv" } },
      { inherit: true, env: { VIRTUAL_ENV: "/venv" } }
    ]);
  });

  it("installs a workspace with the vendor flag", async () => {
    await cli.installWorkspace("/ws", "intel");
    expect(runner.commandLines()).toEqual(["comfy --workspace /ws --skip-prompt install --intel-arc"]);
  });

  it("throws CommandFailedError when set-default fails", async () => {
    runner.on("comfy set-default", { exitCode: 3, stderr: "no such workspace" });
    const error = await cli.setDefault("/ws").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CommandFailedError);
    expect(error).toMatchObject({ command: "comfy set-default /ws", exitCode: 3 });
  });

  it("uses a custom executable", async () => {
    const custom = new ComfyCli({ runner, log, bin: "/opt/comfy" });
    await custom.which();
    expect(runner.calls[0]?.command).toBe("/opt/comfy");
  });
});

describe("parseWhichOutput", () => {
  it("takes a bare path", () => {
    expect(parseWhichOutput("/srv/ComfyUI\n")).toBe("/srv/ComfyUI");
  });

  it("uses the last non-empty line", () => {
    expect(parseWhichOutput("Checking...\n\nTarget ComfyUI path: ~/ComfyUI\n\n")).toBe("~/ComfyUI");
  });

  it("keeps a drive-letter path intact", () => {
    expect(parseWhichOutput("C:\\ComfyUI")).toBe("C:\\ComfyUI");
  });

  it("returns null for empty output", () => {
    expect(parseWhichOutput("  \n")).toBeNull();
  });
});
