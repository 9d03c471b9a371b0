/**
 * setup.cfg Reader - Extracts declared dependencies, metadata and the test extra.
 *
 * The match is textual: any line starting with four spaces followed by
 * `name>=version` counts as a dependency, whatever section it sits in. This picks up
 * `install_requires` and `extras_require` entries alike.
 */

import fs from "fs/promises";
import path from "path";
import type { DeclaredDependency, SetupCfg } from "../types.js";
import { SETUP_CFG, DEPENDENCY_LINE, TEST_EXTRA_LINE, COMMENT_PREFIXES } from "../constants.js";

const SECTION_LINE = /^\[([^\]]+)\]\s*$/;
const KEY_VALUE_LINE = /^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/;

/**
 * Parse the contents of a setup.cfg.
 */
export function parseSetupCfg(content: string): SetupCfg {
  const result: SetupCfg = {
    dependencies: [],
    hasTestExtra: false,
  };
  const seen = new Set<string>();
  let section = "";

  for (const line of content.split(/\r?\n/)) {
    if (TEST_EXTRA_LINE.test(line)) {
      result.hasTestExtra = true;
    }

    const sectionMatch = line.match(SECTION_LINE);
    if (sectionMatch) {
      section = sectionMatch[1].trim();
      continue;
    }

    const dependency = parseDependencyLine(line);
    if (dependency) {
      if (!seen.has(dependency.name)) {
        seen.add(dependency.name);
        result.dependencies.push(dependency);
      }
      continue;
    }

    if (section === "metadata") {
      const kv = line.match(KEY_VALUE_LINE);
      if (!kv) continue;
      const value = kv[2].trim();
      if (kv[1] === "name" && value) result.name = value;
      if (kv[1] === "version" && value) result.version = value;
    }
  }

  return result;
}

/**
 * Parse a single `    name>=version` line.
 * Returns null when the line does not declare a dependency.
 */
export function parseDependencyLine(line: string): DeclaredDependency | null {
  const match = line.match(DEPENDENCY_LINE);
  if (!match) return null;

  // Drop extras: "pkg[extra]>=1.0" installs from directory "pkg"
  const name = match[1].trim().replace(/\[.*\]$/, "").trim();
  if (!name || COMMENT_PREFIXES.some((prefix) => name.startsWith(prefix))) return null;

  return { name, minVersion: match[2].trim() };
}

/**
 * Read and parse the setup.cfg in a package directory.
 * Returns null if the file doesn't exist.
 */
export async function readSetupCfg(dir: string): Promise<SetupCfg | null> {
  const filePath = path.join(dir, SETUP_CFG);
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error: unknown) {
    if (isNotFound(error)) return null;
    throw error;
  }
  return parseSetupCfg(content);
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}
