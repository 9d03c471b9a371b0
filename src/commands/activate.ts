/**
 * Activate Command - Print the line that activates the venv
 *
 * A child process cannot change its parent shell, so this prints
 * `source <venv>/bin/activate` for `eval "$(pylocal activate)"`.
 * Use "deactivate" (part of venv) to undo it.
 */

import { activateScript, venvExists } from "../core/venv.js";
import { resolveConfig } from "../config.js";
import { CommandError, getErrorMessage, getExitCode } from "../errors.js";

const SAFE_SHELL_WORD = /^[A-Za-z0-9_\/.,:@%+=-]+$/;

/**
 * Quote a word for POSIX shells
 */
export function shellQuote(word: string): string {
  if (SAFE_SHELL_WORD.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

/**
 * The shell line that activates a venv.
 */
export function activationCommand(venvDir: string): string {
  return `source ${shellQuote(activateScript(venvDir))}`;
}

/**
 * CLI handler for activate command
 */
export async function handleActivate(args: { venv?: string; config?: string }): Promise<void> {
  try {
    const config = await resolveConfig(process.cwd(), args);
    if (!(await venvExists(config.venvDir))) {
      throw new CommandError(`No virtual environment at ${config.venvDir}. Run 'pylocal install' first.`);
    }
    console.log(activationCommand(config.venvDir));
  } catch (error: unknown) {
    console.error(`✗ ${getErrorMessage(error)}`);
    process.exit(getExitCode(error));
  }
}
