/**
 * Args - Command line parsing
 */

export type FlagValue = string | boolean | string[];

export interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, FlagValue>;
  /** Everything after a bare `--` */
  passthrough: string[];
}

/** Flags that never take a value */
const BOOLEAN_FLAGS = new Set(["force", "json", "h", "help", "v", "version"]);

/** Commands whose arguments all belong to the tool they run */
const PASSTHROUGH_COMMANDS = new Set(["test"]);

function flagValue(value: string): FlagValue {
  return value.includes(",") ? value.split(",").map((s) => s.trim()) : value;
}

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: "",
    positional: [],
    flags: {},
    passthrough: [],
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--") {
      result.passthrough = args.slice(i + 1);
      break;
    }

    let key: string | undefined;
    if (arg.startsWith("--")) {
      key = arg.slice(2);
    } else if (arg.startsWith("-") && arg.length === 2) {
      key = arg.slice(1);
    }

    if (key === undefined) {
      // First non-flag argument is the command
      if (!result.command) {
        result.command = arg;
        if (PASSTHROUGH_COMMANDS.has(arg)) {
          const rest = args.slice(i + 1);
          result.passthrough = rest[0] === "--" ? rest.slice(1) : rest;
          break;
        }
      } else {
        result.positional.push(arg);
      }
      i++;
      continue;
    }

    const eq = key.indexOf("=");
    if (eq !== -1) {
      result.flags[key.slice(0, eq)] = flagValue(key.slice(eq + 1));
      i++;
      continue;
    }

    const nextArg = args[i + 1];
    if (BOOLEAN_FLAGS.has(key) || nextArg === undefined || nextArg.startsWith("-")) {
      result.flags[key] = true;
      i++;
    } else {
      result.flags[key] = flagValue(nextArg);
      i += 2;
    }
  }

  // If no command found, default to help
  if (!result.command) {
    result.command = "help";
  }

  return result;
}

export function getString(flags: Record<string, FlagValue>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = flags[key];
    if (typeof value === "string") return value;
    if (Array.isArray(value)) return value.join(",");
  }
  return undefined;
}

export function getBool(flags: Record<string, FlagValue>, ...keys: string[]): boolean {
  for (const key of keys) {
    if (flags[key] === true) return true;
  }
  return false;
}
