/**
 * Shell Command - Print interactive shell functions wrapping the CLI
 *
 * Usage: eval "$(pylocal shell)"
 */

import { shellQuote } from "./activate.js";

/** Functions defined by the snippet, in definition order */
export const SHELL_FUNCTIONS = ["activate", "py_inst", "py_test", "py_update", "unsource"];

/**
 * Build the shell snippet.
 *
 * @param bin - How the snippet should invoke the CLI
 */
export function shellFunctions(bin: string = "pylocal"): string {
  const cli = shellQuote(bin);
  return `activate() {
  # Enter the venv; "deactivate" leaves it.
  eval "$(${cli} activate)"
}

py_inst() {
  # Fresh venv plus editable installs of this project and its siblings.
  ${cli} install "$@"
}

py_test() {
  # pytest on ./test, arguments passed through.
  ${cli} test -- "$@"
}

py_update() {
  # Reinstall into the existing venv.
  ${cli} update "$@"
}

unsource() {
  # Remove these functions from the shell.
  unset -f ${SHELL_FUNCTIONS.join(" ")}
}
`;
}

/**
 * CLI handler for shell command
 */
export function handleShell(args: { bin?: string }): void {
  process.stdout.write(shellFunctions(args.bin));
}
