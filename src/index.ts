export * from "./lib/bootstrap.js";
export * from "./lib/comfyCli.js";
export * from "./lib/config.js";
export * from "./lib/errors.js";
export * from "./lib/logger.js";
export * from "./lib/manager.js";
export * from "./lib/paths.js";
export * from "./lib/prompts.js";
export * from "./lib/pythonEnv.js";
export * from "./lib/runner.js";
export * from "./lib/setup.js";
export * from "./lib/symlinks.js";
