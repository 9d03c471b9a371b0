/**
 * Editable Installer - Installs a package and its local dependencies bottom-up.
 *
 * Algorithm:
 * 1. Ask the venv for its site-packages directory
 * 2. For each package in install order (dependencies first, root last):
 *    - skip a dependency already installed in editable mode (unless forced)
 *    - otherwise run `pip install -e .` inside the package directory
 * 3. Fail-fast: the first pip failure stops the run
 */

import type {
  EditableInstallOptions,
  EditableInstallResult,
  LocalGraph,
  LocalPackage,
  PackageResult,
} from "../types.js";
import { runCommand, formatCommand } from "./runner.js";
import { venvPython, getSitePackages, isEditableInstalled } from "./venv.js";
import { colors } from "../formatters/colors.js";

// ============================================================================
// Public API
// ============================================================================

/**
 * Install every package of a local graph in editable mode.
 *
 * Extras apply to the root only; local dependencies are installed plain.
 */
export async function installEditable(
  graph: LocalGraph,
  options: EditableInstallOptions,
): Promise<EditableInstallResult> {
  const startTime = Date.now();
  const results: PackageResult[] = [];
  const sitePackages = await getSitePackages(options.venvDir);

  console.log(`\n📥 ${colors.cyan(`Installing ${graph.installOrder.length} package(s) in editable mode...`)}`);

  for (const pkg of graph.installOrder) {
    const isRoot = pkg === graph.root;
    const extras = isRoot ? options.extras ?? "" : "";

    if (!isRoot && !options.force && (await isEditableInstalled(sitePackages, pkg.name))) {
      console.log(`   ↷ ${pkg.name} already installed`);
      results.push({ name: pkg.name, path: pkg.path, status: "skipped", duration: 0, extras });
      continue;
    }

    const result = await installPackage(pkg, extras, options);
    results.push(result);

    if (result.status === "failed") {
      console.log(`   ✗ ${colors.red(pkg.name)}: ${result.error}`);
      return {
        packages: results,
        totalDuration: Date.now() - startTime,
        success: false,
        exitCode: result.exitCode ?? 1,
      };
    }

    console.log(`   ✓ ${colors.green(pkg.name)}${extras} (${(result.duration / 1000).toFixed(1)}s)`);
  }

  return {
    packages: results,
    totalDuration: Date.now() - startTime,
    success: true,
    exitCode: 0,
  };
}

/**
 * Arguments for `python -m pip install -e .<extras>`
 */
export function pipInstallArgs(extras: string, pipArgs: string[] = []): string[] {
  return ["-m", "pip", "install", "-e", `.${extras}`, ...pipArgs];
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Run pip inside one package directory.
 */
async function installPackage(
  pkg: LocalPackage,
  extras: string,
  options: EditableInstallOptions,
): Promise<PackageResult> {
  const startTime = Date.now();
  const python = venvPython(options.venvDir);
  const args = pipInstallArgs(extras, options.pipArgs);

  console.log(`\n── ${pkg.name}: ${formatCommand(python, args)}`);
  const exitCode = await runCommand(python, args, { cwd: pkg.path });

  if (exitCode !== 0) {
    return {
      name: pkg.name,
      path: pkg.path,
      status: "failed",
      duration: Date.now() - startTime,
      extras,
      exitCode,
      error: `pip install exited with code ${exitCode}`,
    };
  }

  return {
    name: pkg.name,
    path: pkg.path,
    status: "installed",
    duration: Date.now() - startTime,
    extras,
    exitCode,
  };
}
