/**
 * Unit Tests - Egg-info cleaner
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import os from "os";
import { cleanEggInfo, cleanPackageEggInfo } from "./clean.js";
import type { LocalGraph, LocalPackage } from "../types.js";

describe("Clean", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "pylocal-clean-test-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function makePackage(name: string, children: LocalPackage[] = []): LocalPackage {
    return {
      name,
      path: path.join(tmpDir, name),
      hasTestExtra: false,
      dependencies: [],
      children,
      remote: [],
    };
  }

  async function exists(p: string): Promise<boolean> {
    try {
      await fs.access(p);
      return true;
    } catch {
      return false;
    }
  }

  it("removes egg-info directories under src/", async () => {
    const src = path.join(tmpDir, "app", "src");
    await fs.mkdir(path.join(src, "app.egg-info"), { recursive: true });
    await fs.writeFile(path.join(src, "app.egg-info", "PKG-INFO"), "Name: app\n");
    await fs.mkdir(path.join(src, "app"), { recursive: true });

    const removed = await cleanPackageEggInfo(path.join(tmpDir, "app"));

    expect(removed).toEqual([path.join(src, "app.egg-info")]);
    expect(await exists(path.join(src, "app.egg-info"))).toBe(false);
    expect(await exists(path.join(src, "app"))).toBe(true);
  });

  it("leaves egg-info outside src/ alone", async () => {
    const top = path.join(tmpDir, "app", "app.egg-info");
    await fs.mkdir(top, { recursive: true });

    const removed = await cleanPackageEggInfo(path.join(tmpDir, "app"));

    expect(removed).toEqual([]);
    expect(await exists(top)).toBe(true);
  });

  it("returns nothing for a package without src/", async () => {
    await fs.mkdir(path.join(tmpDir, "app"));
    expect(await cleanPackageEggInfo(path.join(tmpDir, "app"))).toEqual([]);
  });

  it("cleans every package of a graph, root first", async () => {
    const utils = makePackage("utils");
    const app = makePackage("app", [utils]);
    const graph: LocalGraph = { root: app, installOrder: [utils, app], warnings: [] };

    await fs.mkdir(path.join(tmpDir, "app", "src", "app.egg-info"), { recursive: true });
    await fs.mkdir(path.join(tmpDir, "utils", "src", "utils.egg-info"), { recursive: true });
    await fs.mkdir(path.join(tmpDir, "utils", "src", "utils_extra.egg-info"), { recursive: true });

    const removed = await cleanEggInfo(graph);

    expect(removed).toEqual([
      path.join(tmpDir, "app", "src", "app.egg-info"),
      path.join(tmpDir, "utils", "src", "utils.egg-info"),
      path.join(tmpDir, "utils", "src", "utils_extra.egg-info"),
    ]);
  });
});
