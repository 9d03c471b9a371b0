#!/usr/bin/env node
/**
 * pylocal CLI - Python venv setup with editable installs of sibling packages
 */

import {
  handleInstall,
  handleUpdate,
  handleTest,
  handleActivate,
  handleShell,
  handleTree,
  handleClean,
} from "./commands/index.js";
import { DEFAULT_PYTHON, DEFAULT_VENV_DIR, PYTHON_ENV, VENV_ENV } from "./constants.js";
import { getErrorMessage } from "./errors.js";
import { parseArgs, getString, getBool } from "./args.js";

const VERSION = "1.0.0";

// ============================================================================
// Help System
// ============================================================================

function printVersion(): void {
  console.log(`pylocal v${VERSION}`);
}

function printMainHelp(): void {
  console.log(`
pylocal v${VERSION} - Python venv setup with editable sibling packages

USAGE
  pylocal <command> [options]

COMMANDS
  install     Recreate the venv and install the project into it
  update      Reinstall the project and its local dependencies
  test        Run pytest on test/ inside the venv
  activate    Print the line that activates the venv
  shell       Print shell functions wrapping these commands
  tree        Show the local dependency graph
  clean       Remove src/*.egg-info from the project and its siblings

GLOBAL OPTIONS
  --python <cmd>   Interpreter used to create the venv (default: ${DEFAULT_PYTHON})
  --venv <dir>     Venv directory (default: ${DEFAULT_VENV_DIR})
  -c, --config <path>  Path to config file
  -h, --help       Show help (use with command for detailed help)
  -v, --version    Show version

ENVIRONMENT
  ${PYTHON_ENV}   Alternative to --python
  ${VENV_ENV}     Alternative to --venv

Run 'pylocal <command> --help' for detailed help on a specific command.
`);
}

function printInstallHelp(): void {
  console.log(`
pylocal install - Recreate the venv and install the project

USAGE
  pylocal install [options]

DESCRIPTION
  Deletes the venv directory, creates a new one with '<python> -m venv',
  then runs the update steps. If any step fails the partial venv is
  deleted and the command exits with 1.

OPTIONS
  --force           Reinstall local dependencies already installed
  --python <cmd>    Interpreter used to create the venv
  --venv <dir>      Venv directory
`);
}

function printUpdateHelp(): void {
  console.log(`
pylocal update - Reinstall the project and its local dependencies

USAGE
  pylocal update [options]

DESCRIPTION
  Reads setup.cfg in the current directory. Every dependency declared as
  'name>=version' that exists as a sibling directory is installed with
  'pip install -e .', dependencies first. The project itself is installed
  last, with [test] when setup.cfg declares a 'test =' extra. Finally the
  src/*.egg-info directories are removed.

OPTIONS
  --force           Reinstall local dependencies already installed
  --venv <dir>      Venv directory
`);
}

function printTestHelp(): void {
  console.log(`
pylocal test - Run pytest inside the venv

USAGE
  pylocal [--python <cmd>] [--venv <dir>] [-c <file>] test [pytest-args...]

DESCRIPTION
  Runs '<venv>/bin/python -m pytest test/' in the current directory,
  installing first when the venv does not exist. Exits with pytest's code.
  Every argument after 'test' goes to pytest; pylocal options go before it.

EXAMPLES
  pylocal test
  pylocal test test/test_core.py
  pylocal test -v -k parser -x
  pylocal --venv .venv test -x
`);
}

function printActivateHelp(): void {
  console.log(`
pylocal activate - Print the venv activation line

USAGE
  eval "$(pylocal activate)"

DESCRIPTION
  Prints 'source <venv>/bin/activate'. Use 'deactivate' to leave the venv.
`);
}

function printShellHelp(): void {
  console.log(`
pylocal shell - Print shell functions

USAGE
  eval "$(pylocal shell)"

DESCRIPTION
  Defines activate, py_inst, py_test, py_update and unsource in the
  current shell. 'unsource' removes them again.

OPTIONS
  --bin <cmd>       Command the functions call (default: pylocal)
`);
}

function printTreeHelp(): void {
  console.log(`
pylocal tree - Show the local dependency graph

USAGE
  pylocal tree [--json]

OUTPUT
  📦 app 1.2.0 [test]
  ├── core-lib 1.0.0
  │   └── utils 0.3.0
  └── utils 0.3.0 (see above)
`);
}

function printCleanHelp(): void {
  console.log(`
pylocal clean - Remove egg-info directories

USAGE
  pylocal clean

DESCRIPTION
  Removes src/*.egg-info from the project and every local dependency.
`);
}

function printCommandHelp(command: string): void {
  switch (command) {
    case "install":
      printInstallHelp();
      break;
    case "update":
      printUpdateHelp();
      break;
    case "test":
      printTestHelp();
      break;
    case "activate":
      printActivateHelp();
      break;
    case "shell":
      printShellHelp();
      break;
    case "tree":
      printTreeHelp();
      break;
    case "clean":
      printCleanHelp();
      break;
    default:
      printMainHelp();
  }
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (getBool(args.flags, "v", "version")) {
    printVersion();
    return;
  }

  if (getBool(args.flags, "h", "help")) {
    printCommandHelp(args.command);
    return;
  }

  if (args.command === "help") {
    printCommandHelp(args.positional[0] ?? "");
    return;
  }

  const common = {
    python: getString(args.flags, "python"),
    venv: getString(args.flags, "venv"),
    config: getString(args.flags, "c", "config"),
  };

  switch (args.command) {
    case "install":
      await handleInstall({ ...common, force: getBool(args.flags, "force") });
      break;

    case "update":
      await handleUpdate({ ...common, force: getBool(args.flags, "force") });
      break;

    case "test":
      await handleTest({ ...common, pytestArgs: [...args.positional, ...args.passthrough] });
      break;

    case "activate":
      await handleActivate({ venv: common.venv, config: common.config });
      break;

    case "shell":
      handleShell({ bin: getString(args.flags, "bin") });
      break;

    case "tree":
      await handleTree({ json: getBool(args.flags, "json") });
      break;

    case "clean":
      await handleClean();
      break;

    default:
      console.error(`Unknown command: ${args.command}`);
      console.error("Run 'pylocal --help' for available commands");
      process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error("Error:", getErrorMessage(error));
  process.exit(1);
});
