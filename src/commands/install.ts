/**
 * Install Command - Create a fresh venv and install the project into it
 *
 * The existing venv is deleted first. If creating the venv or installing
 * fails, the partial venv is deleted as well.
 */

import type { ResolvedConfig } from "../types.js";
import { createVenv, removeVenv } from "../core/venv.js";
import { updatePackages } from "./update.js";
import type { UpdateResult } from "./update.js";
import { resolveConfig } from "../config.js";
import { colors } from "../formatters/colors.js";
import { CommandError, getErrorMessage, getExitCode } from "../errors.js";

export interface InstallOptions {
  cwd: string;
  config: ResolvedConfig;
}

/**
 * Recreate the venv and run the update steps.
 */
export async function installEnvironment(options: InstallOptions): Promise<UpdateResult> {
  const { config } = options;

  await removeVenv(config.venvDir);

  const venvCode = await createVenv(config.python, config.venvDir);
  if (venvCode !== 0) {
    await removeVenv(config.venvDir);
    throw new CommandError(`${config.python} -m venv exited with code ${venvCode}`);
  }

  let result: UpdateResult;
  try {
    result = await updatePackages(options);
  } catch (error: unknown) {
    await removeVenv(config.venvDir);
    throw new CommandError(getErrorMessage(error));
  }

  if (!result.install.success) {
    await removeVenv(config.venvDir);
    throw new CommandError(`pip install exited with code ${result.install.exitCode}`);
  }

  return result;
}

/**
 * CLI handler for install command
 */
export async function handleInstall(args: {
  python?: string;
  venv?: string;
  force?: boolean;
  config?: string;
}): Promise<void> {
  try {
    const cwd = process.cwd();
    const config = await resolveConfig(cwd, args);
    const result = await installEnvironment({ cwd, config });
    console.log(`\n✅ ${colors.green(`Installed ${result.graph.root.name}`)} into ${config.venvDir}`);
  } catch (error: unknown) {
    console.error(`✗ Install failed: ${getErrorMessage(error)}`);
    process.exit(getExitCode(error));
  }
}
