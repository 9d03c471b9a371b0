/**
 * Local Graph - Discovers the sibling-directory dependencies of a Python package.
 *
 * A declared dependency is local iff a directory with the same name sits next
 * to the package. Local dependencies are walked depth-first; everything else is
 * left for pip to resolve from the index.
 */

import fs from "fs/promises";
import path from "path";
import semver from "semver";
import type {
  DeclaredDependency,
  LocalGraph,
  LocalPackage,
  VersionWarning,
} from "../types.js";
import { readSetupCfg } from "./setupcfg.js";
import { SETUP_CFG } from "../constants.js";

// ============================================================================
// Public API
// ============================================================================

/**
 * Scan a package directory and its local dependencies.
 *
 * @param rootDir - Directory of the package to install
 * @returns The dependency tree, the bottom-up install order and version warnings
 */
export async function scanLocalGraph(rootDir: string): Promise<LocalGraph> {
  const resolvedRoot = path.resolve(rootDir);

  const rootCfg = await readSetupCfg(resolvedRoot);
  if (!rootCfg) {
    throw new Error(`No ${SETUP_CFG} found in ${resolvedRoot}`);
  }

  const visited = new Map<string, LocalPackage>();
  const installOrder: LocalPackage[] = [];
  const warnings: VersionWarning[] = [];

  async function visit(dir: string, stack: string[]): Promise<LocalPackage> {
    const cfg = await readSetupCfg(dir);
    const pkg: LocalPackage = {
      name: path.basename(dir),
      path: dir,
      version: cfg?.version,
      hasTestExtra: cfg?.hasTestExtra ?? false,
      dependencies: cfg?.dependencies ?? [],
      children: [],
      remote: [],
    };
    visited.set(dir, pkg);
    const nextStack = [...stack, dir];

    for (const dep of pkg.dependencies) {
      const siblingPath = path.join(path.dirname(dir), dep.name);
      if (!(await isDirectory(siblingPath))) {
        pkg.remote.push(dep.name);
        continue;
      }

      if (nextStack.includes(siblingPath)) {
        const cycle = [...nextStack.slice(nextStack.indexOf(siblingPath)), siblingPath]
          .map((p) => path.basename(p));
        throw new Error(`Dependency cycle between local packages: ${cycle.join(" -> ")}`);
      }

      const child = visited.get(siblingPath) ?? (await visit(siblingPath, nextStack));
      pkg.children.push(child);

      const warning = checkVersion(pkg.name, dep, child);
      if (warning) warnings.push(warning);
    }

    installOrder.push(pkg);
    return pkg;
  }

  const root = await visit(resolvedRoot, []);
  return { root, installOrder, warnings };
}

/**
 * Compare a sibling's declared version with the minimum its dependent asks for.
 * Returns null when either side is missing, unparseable, or satisfied.
 */
export function checkVersion(
  dependent: string,
  dep: DeclaredDependency,
  sibling: LocalPackage,
): VersionWarning | null {
  if (!sibling.version || !dep.minVersion) return null;

  const found = semver.coerce(sibling.version);
  const required = semver.coerce(dep.minVersion);
  if (!found || !required) return null;

  if (semver.gte(found, required)) return null;

  return {
    dependent,
    dependency: dep.name,
    required: dep.minVersion,
    found: sibling.version,
  };
}

/**
 * Every package in the graph, root first, each once.
 */
export function listPackages(graph: LocalGraph): LocalPackage[] {
  return [...graph.installOrder].reverse();
}

// ============================================================================
// Helpers
// ============================================================================

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
