/**
 * Unit Tests - Local Graph
 *
 * Uses the fixture workspace (app -> core-lib -> utils, app -> utils)
 * and tmpdir layouts for the edge cases.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import os from "os";
import { fileURLToPath } from "url";
import { scanLocalGraph, checkVersion, listPackages } from "./graph.js";
import type { LocalPackage } from "../types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const WORKSPACE = path.resolve(__dirname, "../../fixtures/workspace");

describe("Local Graph", () => {
  // =========================================================================
  // Fixture workspace
  // =========================================================================
  describe("scanLocalGraph on the fixture workspace", () => {
    it("orders dependencies before dependents", async () => {
      const graph = await scanLocalGraph(path.join(WORKSPACE, "app"));
      expect(graph.installOrder.map((p) => p.name)).toEqual(["utils", "core-lib", "app"]);
    });

    it("builds the tree of local children", async () => {
      const graph = await scanLocalGraph(path.join(WORKSPACE, "app"));
      expect(graph.root.name).toBe("app");
      expect(graph.root.path).toBe(path.join(WORKSPACE, "app"));
      expect(graph.root.children.map((c) => c.name)).toEqual(["core-lib", "utils"]);
      expect(graph.root.children[0].children.map((c) => c.name)).toEqual(["utils"]);
    });

    it("shares one node per package", async () => {
      const graph = await scanLocalGraph(path.join(WORKSPACE, "app"));
      const viaCore = graph.root.children[0].children[0];
      const direct = graph.root.children[1];
      expect(viaCore).toBe(direct);
    });

    it("separates remote dependencies", async () => {
      const graph = await scanLocalGraph(path.join(WORKSPACE, "app"));
      expect(graph.root.remote).toEqual(["requests", "pytest"]);
      expect(graph.installOrder[0].remote).toEqual(["attrs"]);
    });

    it("reads versions and the test extra", async () => {
      const graph = await scanLocalGraph(path.join(WORKSPACE, "app"));
      expect(graph.root.version).toBe("1.2.0");
      expect(graph.root.hasTestExtra).toBe(true);
      expect(graph.installOrder[1].hasTestExtra).toBe(false);
    });

    it("has no warnings when sibling versions satisfy minimums", async () => {
      const graph = await scanLocalGraph(path.join(WORKSPACE, "app"));
      expect(graph.warnings).toEqual([]);
    });

    it("scans a leaf package on its own", async () => {
      const graph = await scanLocalGraph(path.join(WORKSPACE, "utils"));
      expect(graph.installOrder.map((p) => p.name)).toEqual(["utils"]);
      expect(graph.root.children).toEqual([]);
    });
  });

  // =========================================================================
  // Tmpdir layouts
  // =========================================================================
  describe("scanLocalGraph edge cases", () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "pylocal-graph-test-"));
    });

    afterEach(async () => {
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    async function createPackage(name: string, deps: string[], version?: string): Promise<string> {
      const dir = path.join(tmpDir, name);
      await fs.mkdir(dir, { recursive: true });
      const lines = ["[metadata]", `name = ${name}`];
      if (version) lines.push(`version = ${version}`);
      lines.push("", "[options]", "install_requires =");
      for (const dep of deps) lines.push(`    ${dep}`);
      await fs.writeFile(path.join(dir, "setup.cfg"), lines.join("\n") + "\n");
      return dir;
    }

    it("throws when the root has no setup.cfg", async () => {
      await expect(scanLocalGraph(tmpDir)).rejects.toThrow(`No setup.cfg found in ${tmpDir}`);
    });

    it("throws on a dependency cycle", async () => {
      const a = await createPackage("pkg-a", ["pkg-b>=1.0"]);
      await createPackage("pkg-b", ["pkg-a>=1.0"]);
      await expect(scanLocalGraph(a)).rejects.toThrow(
        "Dependency cycle between local packages: pkg-a -> pkg-b -> pkg-a",
      );
    });

    it("throws when a package depends on itself", async () => {
      const a = await createPackage("pkg-a", ["pkg-a>=1.0"]);
      await expect(scanLocalGraph(a)).rejects.toThrow(
        "Dependency cycle between local packages: pkg-a -> pkg-a",
      );
    });

    it("treats a sibling without setup.cfg as a local leaf", async () => {
      const app = await createPackage("app", ["plain>=1.0"]);
      await fs.mkdir(path.join(tmpDir, "plain"));
      const graph = await scanLocalGraph(app);
      expect(graph.installOrder.map((p) => p.name)).toEqual(["plain", "app"]);
      expect(graph.installOrder[0].dependencies).toEqual([]);
    });

    it("does not treat a sibling file as a local package", async () => {
      const app = await createPackage("app", ["notes>=1.0"]);
      await fs.writeFile(path.join(tmpDir, "notes"), "not a package");
      const graph = await scanLocalGraph(app);
      expect(graph.root.remote).toEqual(["notes"]);
      expect(graph.installOrder).toHaveLength(1);
    });

    it("ignores commented-out dependencies", async () => {
      const app = path.join(tmpDir, "app");
      await fs.mkdir(app);
      await fs.mkdir(path.join(tmpDir, "utils"));
      await fs.mkdir(path.join(tmpDir, "core-lib"));
      await fs.writeFile(
        path.join(app, "setup.cfg"),
        ["[options]", "install_requires =", "#    utils>=0.1", "    # core-lib>=1.0", ""].join("\n"),
      );

      const graph = await scanLocalGraph(app);

      expect(graph.installOrder.map((p) => p.name)).toEqual(["app"]);
      expect(graph.root.children).toEqual([]);
      expect(graph.root.remote).toEqual([]);
    });

    it("records a warning when a sibling is older than required", async () => {
      const app = await createPackage("app", ["lib>=2.0"]);
      await createPackage("lib", [], "1.4.0");
      const graph = await scanLocalGraph(app);
      expect(graph.warnings).toEqual([
        { dependent: "app", dependency: "lib", required: "2.0", found: "1.4.0" },
      ]);
    });
  });

  // =========================================================================
  // checkVersion
  // =========================================================================
  describe("checkVersion", () => {
    function sibling(version?: string): LocalPackage {
      return {
        name: "lib",
        path: "/ws/lib",
        version,
        hasTestExtra: false,
        dependencies: [],
        children: [],
        remote: [],
      };
    }

    it("accepts an equal version after coercion", () => {
      expect(checkVersion("app", { name: "lib", minVersion: "1.0" }, sibling("1.0.0"))).toBeNull();
    });

    it("accepts a newer version", () => {
      expect(checkVersion("app", { name: "lib", minVersion: "1.0" }, sibling("1.10.2"))).toBeNull();
    });

    it("ignores a sibling without a version", () => {
      expect(checkVersion("app", { name: "lib", minVersion: "9.0" }, sibling())).toBeNull();
    });

    it("ignores an unparseable minimum", () => {
      expect(checkVersion("app", { name: "lib", minVersion: "latest" }, sibling("0.1.0"))).toBeNull();
    });

    it("reports an older version", () => {
      expect(checkVersion("app", { name: "lib", minVersion: "0.5" }, sibling("0.4.9"))).toEqual({
        dependent: "app",
        dependency: "lib",
        required: "0.5",
        found: "0.4.9",
      });
    });
  });

  // =========================================================================
  // listPackages
  // =========================================================================
  describe("listPackages", () => {
    it("lists the root first", async () => {
      const graph = await scanLocalGraph(path.join(WORKSPACE, "app"));
      expect(listPackages(graph).map((p) => p.name)).toEqual(["app", "core-lib", "utils"]);
    });
  });
});
