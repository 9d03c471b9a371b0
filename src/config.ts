/**
 * Config - Loads pylocal.config.mjs and merges it with flags and environment
 *
 * Priority: 1. CLI flags, 2. PYLOCAL_PYTHON / PYLOCAL_VENV, 3. config file, 4. defaults
 */

import fs from "fs/promises";
import path from "path";
import { pathToFileURL } from "url";
import type { ConfigOverrides, PylocalConfig, ResolvedConfig } from "./types.js";
import {
  DEFAULT_CONFIG_FILES,
  DEFAULT_PYTHON,
  DEFAULT_VENV_DIR,
  PYTHON_ENV,
  VENV_ENV,
} from "./constants.js";

const CONFIG_KEYS = new Set(["python", "venv", "pipArgs", "force"]);

/**
 * Validate the default export of a config file.
 */
export function validateConfig(raw: unknown, source: string): PylocalConfig {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`Configuration in ${source} must export an object`);
  }

  const config: PylocalConfig = {};
  const entries: [string, unknown][] = Object.entries(raw);
  for (const [key, value] of entries) {
    if (!CONFIG_KEYS.has(key)) {
      throw new Error(`Unknown configuration key "${key}" in ${source}`);
    }
    if (value === undefined) continue;

    switch (key) {
      case "python":
      case "venv":
        if (typeof value !== "string" || value.length === 0) {
          throw new Error(`Configuration "${key}" in ${source} must be a non-empty string`);
        }
        if (key === "python") config.python = value;
        else config.venv = value;
        break;
      case "pipArgs":
        if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
          throw new Error(`Configuration "pipArgs" in ${source} must be an array of strings`);
        }
        config.pipArgs = value;
        break;
      case "force":
        if (typeof value !== "boolean") {
          throw new Error(`Configuration "force" in ${source} must be a boolean`);
        }
        config.force = value;
        break;
    }
  }
  return config;
}

/**
 * Find and import the config file.
 *
 * @param cwd - Project directory
 * @param configPath - Explicit path (--config flag); must exist when given
 */
export async function loadConfigFile(
  cwd: string,
  configPath?: string,
): Promise<{ config: PylocalConfig; path?: string }> {
  let found: string | undefined;

  if (configPath) {
    found = path.resolve(cwd, configPath);
    if (!(await fileExists(found))) {
      throw new Error(`Configuration file not found: ${found}`);
    }
  } else {
    for (const filename of DEFAULT_CONFIG_FILES) {
      const candidate = path.join(cwd, filename);
      if (await fileExists(candidate)) {
        found = candidate;
        break;
      }
    }
  }

  if (!found) return { config: {} };

  const mod: unknown = await import(pathToFileURL(found).href);
  const raw = typeof mod === "object" && mod !== null && "default" in mod ? mod.default : mod;
  return { config: validateConfig(raw, found), path: found };
}

/**
 * Merge flags, environment, config file and defaults.
 */
export async function resolveConfig(
  cwd: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<ResolvedConfig> {
  const file = await loadConfigFile(cwd, overrides.config);

  const python = overrides.python || env[PYTHON_ENV] || file.config.python || DEFAULT_PYTHON;
  const venv = overrides.venv || env[VENV_ENV] || file.config.venv || DEFAULT_VENV_DIR;

  return {
    python,
    venvDir: path.resolve(cwd, venv),
    pipArgs: file.config.pipArgs ?? [],
    force: overrides.force || file.config.force || false,
    configPath: file.path,
  };
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
