/**
 * Tree Command - Show the local dependency graph
 *
 * Human-readable output by default, JSON for tool consumption.
 */

import { scanLocalGraph } from "../core/graph.js";
import { formatLocalTree } from "../formatters/tree.js";
import type { LocalGraph } from "../types.js";
import { getErrorMessage } from "../errors.js";

/**
 * Options for the tree command
 */
export interface TreeCommandOptions {
  /** JSON output for tool consumption */
  json?: boolean;
}

/**
 * JSON shape of a graph: children are referenced by name so shared
 * dependencies are not repeated.
 */
export function graphToJson(graph: LocalGraph): object {
  return {
    root: graph.root.name,
    packages: graph.installOrder.map((pkg) => ({
      name: pkg.name,
      path: pkg.path,
      version: pkg.version ?? null,
      hasTestExtra: pkg.hasTestExtra,
      local: pkg.children.map((child) => child.name),
      remote: pkg.remote,
    })),
    installOrder: graph.installOrder.map((pkg) => pkg.name),
    warnings: graph.warnings,
  };
}

/**
 * CLI handler for the `pylocal tree` command.
 */
export async function handleTree(options: TreeCommandOptions): Promise<void> {
  try {
    const graph = await scanLocalGraph(process.cwd());

    if (options.json) {
      console.log(JSON.stringify(graphToJson(graph), null, 2));
    } else {
      console.log(formatLocalTree(graph));
    }
  } catch (error: unknown) {
    if (options.json) {
      console.error(JSON.stringify({ error: getErrorMessage(error) }));
    } else {
      console.error(`✗ ${getErrorMessage(error)}`);
    }
    process.exit(1);
  }
}
