/**
 * Clean Command - Remove src/*.egg-info from the package and its local dependencies
 */

import path from "path";
import { scanLocalGraph } from "../core/graph.js";
import { cleanEggInfo } from "../core/clean.js";
import { getErrorMessage } from "../errors.js";

/**
 * CLI handler for clean command
 */
export async function handleClean(): Promise<void> {
  try {
    const cwd = process.cwd();
    const graph = await scanLocalGraph(cwd);
    const removed = await cleanEggInfo(graph);

    if (removed.length === 0) {
      console.log("Nothing to clean");
      return;
    }

    console.log(`🧹 Removed ${removed.length} egg-info director${removed.length === 1 ? "y" : "ies"}:`);
    for (const dir of removed) {
      console.log(`  - ${path.relative(path.dirname(cwd), dir)}`);
    }
  } catch (error: unknown) {
    console.error(`✗ Clean failed: ${getErrorMessage(error)}`);
    process.exit(1);
  }
}
