import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import { DEFAULT_CONFIG, deepMerge, loadConfig } from "../../../src/config/loader.js";

describe("loadConfig", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "liberate-config-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("writes defaults on first run", async () => {
    const file = path.join(tmpDir, "etc", "config.yaml");
    const result = loadConfig(file);
    expect(result.firstRun).toBe(true);
    expect(result.config).toEqual(DEFAULT_CONFIG);
    const written = await fs.readFile(file, "utf-8");
    expect(written).toContain("retention: 5");
  });

  it("merges a partial file over the defaults", async () => {
    const file = path.join(tmpDir, "config.yaml");
    await fs.writeFile(file, "backup:\n  retention: 3\npackage_manager:\n  tool: yum\n", "utf-8");
    const { config, firstRun } = loadConfig(file);
    expect(firstRun).toBe(false);
    expect(config.backup).toEqual({ directory: "/var/lib/liberate/backups", retention: 3, archive_prefix: "liberate-backup" });
    expect(config.package_manager.tool).toBe("yum");
    expect(config.system.root).toBe("/");
  });

  it("falls back to defaults when validation fails", async () => {
    const file = path.join(tmpDir, "config.yaml");
    await fs.writeFile(file, "backup:\n  retention: 0\n", "utf-8");
    const { config, firstRun } = loadConfig(file);
    expect(firstRun).toBe(false);
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it("rejects relative store directories", async () => {
    const file = path.join(tmpDir, "config.yaml");
    await fs.writeFile(file, "backup:\n  directory: backups\n", "utf-8");
    expect(loadConfig(file).config.backup.directory).toBe("/var/lib/liberate/backups");
  });
});

describe("deepMerge", () => {
  it("merges nested records and lets b override scalars", () => {
    expect(deepMerge({ a: { x: 1, y: 2 }, b: 1 }, { a: { y: 3 }, c: 4 })).toEqual({ a: { x: 1, y: 3 }, b: 1, c: 4 });
  });
});
