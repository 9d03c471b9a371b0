/**
 * Runner - Spawns external tools (python, pip, pytest)
 *
 * Every call names its working directory; the tool never changes its own cwd.
 */

import { spawn } from "child_process";
import type { CaptureResult, RunOptions } from "../types.js";

/**
 * Run a command with inherited stdio and resolve its exit code.
 * A command that cannot be spawned or dies from a signal resolves 1.
 */
export function runCommand(
  command: string,
  args: string[],
  options: RunOptions = {},
): Promise<number> {
  return new Promise((resolve) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: "inherit",
    });

    child.on("close", (code) => {
      resolve(code ?? 1);
    });

    child.on("error", (error) => {
      console.error(`✗ Could not run ${command}: ${error.message}`);
      resolve(1);
    });
  });
}

/**
 * Run a command and collect its output.
 */
export function captureCommand(
  command: string,
  args: string[],
  options: RunOptions = {},
): Promise<CaptureResult> {
  return new Promise((resolve) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("close", (code) => {
      resolve({ code: code ?? 1, stdout, stderr });
    });

    child.on("error", (error) => {
      resolve({ code: 1, stdout, stderr: stderr || error.message });
    });
  });
}

/**
 * Render a command line for logs
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/[\s"'$]/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}
