/**
 * pylocal
 *
 * Python virtual environment setup with editable installs
 * of sibling-directory dependencies
 */

// Types
export type {
  DeclaredDependency,
  SetupCfg,
  LocalPackage,
  LocalGraph,
  VersionWarning,
  PackageResult,
  PackageStatus,
  EditableInstallOptions,
  EditableInstallResult,
  PylocalConfig,
  ResolvedConfig,
  ConfigOverrides,
} from "./types.js";

// Config
export { resolveConfig, loadConfigFile, validateConfig } from "./config.js";

// Core
export { parseSetupCfg, readSetupCfg } from "./core/setupcfg.js";
export { scanLocalGraph, listPackages } from "./core/graph.js";
export { installEditable } from "./core/installer.js";
export { cleanEggInfo } from "./core/clean.js";
export { createVenv, removeVenv, venvPython, isEditableInstalled } from "./core/venv.js";

// Commands
export { installEnvironment } from "./commands/install.js";
export { updatePackages } from "./commands/update.js";
export { runTests } from "./commands/test.js";
export { shellFunctions } from "./commands/shell.js";
export { formatLocalTree } from "./formatters/tree.js";

// Errors
export { CommandError } from "./errors.js";
