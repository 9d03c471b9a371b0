/**
 * Tree Formatter - Renders a local dependency graph for the terminal
 */

import type { LocalGraph, LocalPackage, VersionWarning } from "../types.js";

function label(pkg: LocalPackage): string {
  return pkg.version ? `${pkg.name} ${pkg.version}` : pkg.name;
}

/**
 * Format the dependency tree, remote dependencies, install order and warnings.
 *
 * A package reached a second time is shown once more with "(see above)"
 * instead of repeating its subtree.
 */
export function formatLocalTree(graph: LocalGraph): string {
  const root = graph.root;
  const lines: string[] = [`📦 ${label(root)}${root.hasTestExtra ? " [test]" : ""}`];
  const seen = new Set<string>([root.path]);

  function addChildren(pkg: LocalPackage, prefix: string): void {
    const total = pkg.children.length;
    for (let i = 0; i < total; i++) {
      const child = pkg.children[i];
      const isLast = i === total - 1;
      const connector = isLast ? "└── " : "├── ";

      if (seen.has(child.path)) {
        lines.push(`${prefix}${connector}${label(child)} (see above)`);
        continue;
      }

      seen.add(child.path);
      lines.push(`${prefix}${connector}${label(child)}`);
      addChildren(child, prefix + (isLast ? "    " : "│   "));
    }
  }

  addChildren(root, "");

  lines.push("");
  const remote = collectRemote(graph);
  lines.push(`Remote dependencies: ${remote.length > 0 ? remote.join(", ") : "none"}`);

  lines.push("");
  lines.push("Install order:");
  graph.installOrder.forEach((pkg, index) => {
    lines.push(`  ${index + 1}. ${pkg.name}`);
  });

  if (graph.warnings.length > 0) {
    lines.push("");
    lines.push("Warnings:");
    for (const warning of graph.warnings) {
      lines.push(`  ⚠ ${formatWarning(warning)}`);
    }
  }

  return lines.join("\n");
}

/**
 * One-line description of a version warning
 */
export function formatWarning(warning: VersionWarning): string {
  return `${warning.dependent} requires ${warning.dependency}>=${warning.required}, found ${warning.found}`;
}

/**
 * Remote dependency names across the graph, in install order, each once.
 */
function collectRemote(graph: LocalGraph): string[] {
  const names: string[] = [];
  for (const pkg of graph.installOrder) {
    for (const name of pkg.remote) {
      if (!names.includes(name)) names.push(name);
    }
  }
  return names;
}
