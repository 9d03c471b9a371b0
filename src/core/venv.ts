/**
 * Venv - Virtual environment paths, creation and editable-install detection
 */

import fs from "fs/promises";
import path from "path";
import { runCommand, captureCommand } from "./runner.js";
import { EGG_LINK_SUFFIX, EDITABLE_PTH_PREFIX } from "../constants.js";

const PURELIB_SCRIPT = 'import sysconfig; print(sysconfig.get_paths()["purelib"])';

/**
 * Directory holding the venv's executables
 */
export function venvBinDir(venvDir: string, platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? path.join(venvDir, "Scripts") : path.join(venvDir, "bin");
}

/**
 * The venv's interpreter
 */
export function venvPython(venvDir: string, platform: NodeJS.Platform = process.platform): string {
  return path.join(venvBinDir(venvDir, platform), platform === "win32" ? "python.exe" : "python");
}

/**
 * The script to source to activate the venv
 */
export function activateScript(venvDir: string, platform: NodeJS.Platform = process.platform): string {
  return path.join(venvBinDir(venvDir, platform), "activate");
}

/**
 * Check if a venv directory exists.
 */
export async function venvExists(venvDir: string): Promise<boolean> {
  try {
    const stats = await fs.stat(venvDir);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Create a venv with `<python> -m venv <dir>`. Resolves the exit code.
 */
export async function createVenv(python: string, venvDir: string): Promise<number> {
  console.log(`\n🐍 Creating virtual environment ${venvDir} (${python})...`);
  return runCommand(python, ["-m", "venv", venvDir], { cwd: path.dirname(venvDir) });
}

/**
 * Delete a venv directory. Missing directories are fine.
 */
export async function removeVenv(venvDir: string): Promise<void> {
  await fs.rm(venvDir, { recursive: true, force: true });
}

/**
 * Ask the venv interpreter for its site-packages (purelib) directory.
 */
export async function getSitePackages(venvDir: string): Promise<string> {
  const python = venvPython(venvDir);
  const result = await captureCommand(python, ["-c", PURELIB_SCRIPT]);
  const sitePackages = result.stdout.trim();
  if (result.code !== 0 || !sitePackages) {
    throw new Error(
      `Could not read site-packages from ${python}: ${result.stderr.trim() || `exit code ${result.code}`}`,
    );
  }
  return sitePackages;
}

/**
 * Normalize a distribution name so "my-lib" and "my_lib" compare equal.
 */
export function normalizeDistName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, "_");
}

/**
 * Check if a package is installed in editable mode in a site-packages directory.
 *
 * Legacy installs leave `<name>.egg-link`; PEP 660 installs leave
 * `__editable__.<name>-<version>.pth`.
 */
export async function isEditableInstalled(sitePackages: string, name: string): Promise<boolean> {
  let entries: string[];
  try {
    entries = await fs.readdir(sitePackages);
  } catch {
    return false;
  }

  const wanted = normalizeDistName(name);
  for (const entry of entries) {
    if (entry.endsWith(EGG_LINK_SUFFIX)) {
      if (normalizeDistName(entry.slice(0, -EGG_LINK_SUFFIX.length)) === wanted) return true;
      continue;
    }
    if (entry.startsWith(EDITABLE_PTH_PREFIX) && entry.endsWith(".pth")) {
      const stem = entry.slice(EDITABLE_PTH_PREFIX.length, -".pth".length);
      const dash = stem.lastIndexOf("-");
      const dist = dash === -1 ? stem : stem.slice(0, dash);
      if (normalizeDistName(dist) === wanted) return true;
    }
  }
  return false;
}
