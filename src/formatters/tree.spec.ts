/**
 * Tree Formatter - Unit tests
 */

import { describe, it, expect } from "vitest";
import path from "path";
import { fileURLToPath } from "url";
import { formatLocalTree, formatWarning } from "./tree.js";
import { scanLocalGraph } from "../core/graph.js";
import type { LocalGraph, LocalPackage } from "../types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const WORKSPACE = path.resolve(__dirname, "../../fixtures/workspace");

function pkg(name: string, overrides: Partial<LocalPackage> = {}): LocalPackage {
  return {
    name,
    path: `/ws/${name}`,
    hasTestExtra: false,
    dependencies: [],
    children: [],
    remote: [],
    ...overrides,
  };
}

describe("Tree Formatter", () => {
  it("formats the fixture workspace", async () => {
    const graph = await scanLocalGraph(path.join(WORKSPACE, "app"));

    expect(formatLocalTree(graph)).toBe(
      [
        "📦 app 1.2.0 [test]",
        "├── core-lib 1.0.0",
        "│   └── utils 0.3.0",
        "└── utils 0.3.0 (see above)",
        "",
        "Remote dependencies: attrs, requests, pytest",
        "",
        "Install order:",
        "  1. utils",
        "  2. core-lib",
        "  3. app",
      ].join("\n"),
    );
  });

  it("formats a package without local dependencies", () => {
    const root = pkg("solo");
    const graph: LocalGraph = { root, installOrder: [root], warnings: [] };

    expect(formatLocalTree(graph)).toBe(
      ["📦 solo", "", "Remote dependencies: none", "", "Install order:", "  1. solo"].join("\n"),
    );
  });

  it("appends warnings", () => {
    const lib = pkg("lib", { version: "0.1.0" });
    const root = pkg("app", { children: [lib] });
    const graph: LocalGraph = {
      root,
      installOrder: [lib, root],
      warnings: [{ dependent: "app", dependency: "lib", required: "0.2", found: "0.1.0" }],
    };

    const lines = formatLocalTree(graph).split("\n");

    expect(lines.slice(-2)).toEqual(["Warnings:", "  ⚠ app requires lib>=0.2, found 0.1.0"]);
  });

  it("formats a single warning", () => {
    expect(formatWarning({ dependent: "a", dependency: "b", required: "2", found: "1.0" })).toBe(
      "a requires b>=2, found 1.0",
    );
  });
});
