/**
 * Test Command - Run pytest on the test/ directory inside the venv
 */

import type { ResolvedConfig } from "../types.js";
import { runCommand, formatCommand } from "../core/runner.js";
import { venvExists, venvPython } from "../core/venv.js";
import { installEnvironment } from "./install.js";
import { resolveConfig } from "../config.js";
import { getErrorMessage, getExitCode } from "../errors.js";
import { TEST_DIR } from "../constants.js";

export interface TestOptions {
  cwd: string;
  config: ResolvedConfig;
  /** Extra pytest arguments */
  args?: string[];
}

/**
 * Arguments for `python -m pytest test/ [args...]`
 */
export function pytestArgs(args: string[] = []): string[] {
  return ["-m", "pytest", `${TEST_DIR}/`, ...args];
}

/**
 * Run the tests, creating the venv first when there is none.
 *
 * @returns pytest's exit code
 */
export async function runTests(options: TestOptions): Promise<number> {
  const { cwd, config } = options;

  if (!(await venvExists(config.venvDir))) {
    console.log(`No virtual environment at ${config.venvDir}, installing first...`);
    await installEnvironment({ cwd, config });
  }

  const python = venvPython(config.venvDir);
  const args = pytestArgs(options.args);
  console.log(`\n🧪 ${formatCommand(python, args)}`);
  return runCommand(python, args, { cwd });
}

/**
 * CLI handler for test command
 */
export async function handleTest(args: {
  python?: string;
  venv?: string;
  config?: string;
  pytestArgs: string[];
}): Promise<void> {
  try {
    const cwd = process.cwd();
    const config = await resolveConfig(cwd, args);
    const code = await runTests({ cwd, config, args: args.pytestArgs });
    if (code !== 0) {
      process.exit(code);
    }
  } catch (error: unknown) {
    console.error(`✗ Test failed: ${getErrorMessage(error)}`);
    process.exit(getExitCode(error));
  }
}
