/**
 * Update Command - Reinstall a package and its local dependencies into the venv
 *
 * Steps:
 * - Scan the package's setup.cfg and its sibling-directory dependencies
 * - pip install -e each package, dependencies first ([test] for the root if declared)
 * - Remove the src/*.egg-info directories the installs leave behind
 */

import type { EditableInstallResult, LocalGraph, ResolvedConfig } from "../types.js";
import { scanLocalGraph } from "../core/graph.js";
import { installEditable } from "../core/installer.js";
import { cleanEggInfo } from "../core/clean.js";
import { venvExists } from "../core/venv.js";
import { resolveConfig } from "../config.js";
import { formatWarning } from "../formatters/tree.js";
import { colors } from "../formatters/colors.js";
import { CommandError, getErrorMessage, getExitCode } from "../errors.js";
import { TEST_EXTRA } from "../constants.js";

export interface UpdateOptions {
  cwd: string;
  config: ResolvedConfig;
}

export interface UpdateResult {
  graph: LocalGraph;
  install: EditableInstallResult;
  /** Removed egg-info directories */
  cleaned: string[];
}

/**
 * Extras suffix for the root package
 */
export function rootExtras(graph: LocalGraph): string {
  return graph.root.hasTestExtra ? `[${TEST_EXTRA}]` : "";
}

/**
 * Install the package in `cwd` and its local dependencies into an existing venv.
 *
 * Egg-info cleanup runs even when an install fails; the result carries
 * pip's exit code.
 */
export async function updatePackages(options: UpdateOptions): Promise<UpdateResult> {
  const { cwd, config } = options;

  if (!(await venvExists(config.venvDir))) {
    throw new CommandError(
      `No virtual environment at ${config.venvDir}. Run 'pylocal install' first.`,
    );
  }

  const graph = await scanLocalGraph(cwd);

  for (const warning of graph.warnings) {
    console.warn(`⚠️  ${colors.yellow(formatWarning(warning))}`);
  }

  const install = await installEditable(graph, {
    venvDir: config.venvDir,
    extras: rootExtras(graph),
    force: config.force,
    pipArgs: config.pipArgs,
  });

  const cleaned = await cleanEggInfo(graph);
  if (cleaned.length > 0) {
    console.log(`\n🧹 Removed ${cleaned.length} egg-info director${cleaned.length === 1 ? "y" : "ies"}`);
  }

  return { graph, install, cleaned };
}

/**
 * CLI handler for update command
 */
export async function handleUpdate(args: {
  python?: string;
  venv?: string;
  force?: boolean;
  config?: string;
}): Promise<void> {
  try {
    const cwd = process.cwd();
    const config = await resolveConfig(cwd, args);
    const result = await updatePackages({ cwd, config });

    if (!result.install.success) {
      console.error(`\n✗ Update failed with exit code ${result.install.exitCode}`);
      process.exit(result.install.exitCode);
    }
    console.log(`\n✅ ${colors.green("Update complete")} (${(result.install.totalDuration / 1000).toFixed(1)}s)`);
  } catch (error: unknown) {
    console.error(`✗ Update failed: ${getErrorMessage(error)}`);
    process.exit(getExitCode(error));
  }
}
