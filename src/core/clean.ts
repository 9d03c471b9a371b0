/**
 * Clean - Removes the *.egg-info directories editable installs leave under src/
 */

import fs from "fs/promises";
import path from "path";
import type { LocalGraph } from "../types.js";
import { listPackages } from "./graph.js";
import { SOURCE_DIR, EGG_INFO_SUFFIX } from "../constants.js";

/**
 * Remove `src/*.egg-info` from every package in the graph, root first.
 *
 * @returns Absolute paths of the removed directories
 */
export async function cleanEggInfo(graph: LocalGraph): Promise<string[]> {
  const removed: string[] = [];
  for (const pkg of listPackages(graph)) {
    removed.push(...(await cleanPackageEggInfo(pkg.path)));
  }
  return removed;
}

/**
 * Remove `src/*.egg-info` from one package directory.
 * A package without a src/ directory has nothing to clean.
 */
export async function cleanPackageEggInfo(packageDir: string): Promise<string[]> {
  const srcDir = path.join(packageDir, SOURCE_DIR);

  let entries: string[];
  try {
    entries = await fs.readdir(srcDir);
  } catch {
    return [];
  }

  const removed: string[] = [];
  for (const entry of entries.sort()) {
    if (!entry.endsWith(EGG_INFO_SUFFIX)) continue;
    const target = path.join(srcDir, entry);
    await fs.rm(target, { recursive: true, force: true });
    removed.push(target);
  }
  return removed;
}
