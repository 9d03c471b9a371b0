/**
 * Constants - File names, defaults and environment variables
 */

// Project files
export const SETUP_CFG = "setup.cfg";
export const SOURCE_DIR = "src";
export const TEST_DIR = "test";
export const EGG_INFO_SUFFIX = ".egg-info";
export const EGG_LINK_SUFFIX = ".egg-link";
export const EDITABLE_PTH_PREFIX = "__editable__.";

// Defaults
export const DEFAULT_PYTHON = "python3";
export const DEFAULT_VENV_DIR = "venv";
export const TEST_EXTRA = "test";

// Config file names (in order of priority)
export const DEFAULT_CONFIG_FILES = [
  "pylocal.config.mjs",
  "pylocal.config.js",
  "pylocal.config.cjs",
];

// Environment variables
export const PYTHON_ENV = "PYLOCAL_PYTHON";
export const VENV_ENV = "PYLOCAL_VENV";

/** A declared dependency: a line starting with four spaces, a name, `>=`, a version up to `,` or `;` */
export const DEPENDENCY_LINE = /^ {4}(.*?)>=([^,;]*)/;

/** Comment markers of setup.cfg */
export const COMMENT_PREFIXES = ["#", ";"];

/** The line that declares the test extra */
export const TEST_EXTRA_LINE = /^test =$/;
