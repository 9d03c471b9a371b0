/**
 * Types - Shared type definitions for pylocal
 */

// ============================================================================
// setup.cfg Types
// ============================================================================

/**
 * A dependency declared in setup.cfg as `name>=version`
 */
export interface DeclaredDependency {
  name: string;
  /** Text after the last `>=`, trimmed */
  minVersion: string;
}

/**
 * The parts of a setup.cfg that drive installation
 */
export interface SetupCfg {
  /** `[metadata] name` */
  name?: string;
  /** `[metadata] version` */
  version?: string;
  dependencies: DeclaredDependency[];
  /** True when the file has a line that is exactly `test =` */
  hasTestExtra: boolean;
}

// ============================================================================
// Graph Types
// ============================================================================

/**
 * A package found as a sibling directory of its dependent
 */
export interface LocalPackage {
  /** Directory name */
  name: string;
  /** Absolute path to the package directory */
  path: string;
  version?: string;
  hasTestExtra: boolean;
  dependencies: DeclaredDependency[];
  /** Local dependencies, in declaration order */
  children: LocalPackage[];
  /** Declared dependencies with no sibling directory */
  remote: string[];
}

/**
 * A sibling whose declared version is below what a dependent asks for
 */
export interface VersionWarning {
  dependent: string;
  dependency: string;
  required: string;
  found: string;
}

/**
 * Result of scanning a package and its local dependencies
 */
export interface LocalGraph {
  root: LocalPackage;
  /** Dependencies first, root last; each package once */
  installOrder: LocalPackage[];
  warnings: VersionWarning[];
}

// ============================================================================
// Runner Types
// ============================================================================

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CaptureResult {
  code: number;
  stdout: string;
  stderr: string;
}

// ============================================================================
// Install Types
// ============================================================================

export type PackageStatus = "installed" | "skipped" | "failed";

/**
 * Outcome of one editable install step
 */
export interface PackageResult {
  name: string;
  path: string;
  status: PackageStatus;
  duration: number;
  /** Extras suffix used, e.g. "[test]" */
  extras: string;
  exitCode?: number;
  error?: string;
}

export interface EditableInstallOptions {
  venvDir: string;
  /** Extras suffix for the root package, e.g. "[test]" */
  extras?: string;
  /** Reinstall local dependencies that are already installed */
  force?: boolean;
  pipArgs?: string[];
}

export interface EditableInstallResult {
  packages: PackageResult[];
  totalDuration: number;
  success: boolean;
  exitCode: number;
}

// ============================================================================
// Config Types
// ============================================================================

/**
 * Contents of pylocal.config.mjs
 */
export interface PylocalConfig {
  python?: string;
  venv?: string;
  pipArgs?: string[];
  force?: boolean;
}

/**
 * Configuration after flags, environment, file and defaults are merged
 */
export interface ResolvedConfig {
  /** Interpreter used to create the venv */
  python: string;
  /** Absolute venv directory */
  venvDir: string;
  pipArgs: string[];
  force: boolean;
  /** Config file that was loaded, if any */
  configPath?: string;
}

/**
 * Settings passed on the command line
 */
export interface ConfigOverrides {
  python?: string;
  venv?: string;
  force?: boolean;
  config?: string;
}
