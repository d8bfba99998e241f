import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import { copyPreserving, listDir, readLines, walkFiles, writeLines } from "../../../src/system/fs.js";

describe("filesystem helpers", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "liberate-fs-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("copies a link as a link, replacing an existing file", async () => {
    await fs.symlink("../usr/lib/os-release", path.join(tmpDir, "link"));
    const dest = path.join(tmpDir, "etc", "os-release");
    await fs.mkdir(path.dirname(dest));
    await fs.writeFile(dest, "ID=sll\n", "utf-8");

    await copyPreserving(path.join(tmpDir, "link"), dest);

    expect(await fs.readlink(dest)).toBe("../usr/lib/os-release");
  });

  it("copies directory trees and creates missing parents", async () => {
    await fs.mkdir(path.join(tmpDir, "src", "nested"), { recursive: true });
    await fs.writeFile(path.join(tmpDir, "src", "nested", "a.conf"), "a\n", "utf-8");
    await copyPreserving(path.join(tmpDir, "src"), path.join(tmpDir, "deep", "dest"));
    expect(await fs.readFile(path.join(tmpDir, "deep", "dest", "nested", "a.conf"), "utf-8")).toBe("a\n");
  });

  it("walks files and links below a directory in sorted order", async () => {
    await fs.mkdir(path.join(tmpDir, "b"));
    await fs.writeFile(path.join(tmpDir, "b", "z.txt"), "", "utf-8");
    await fs.writeFile(path.join(tmpDir, "a.txt"), "", "utf-8");
    await fs.symlink("a.txt", path.join(tmpDir, "c"));
    expect(await walkFiles(tmpDir)).toEqual(["a.txt", path.join("b", "z.txt"), "c"]);
  });

  it("treats missing directories and files as empty", async () => {
    expect(await listDir(path.join(tmpDir, "none"))).toEqual([]);
    expect(await walkFiles(path.join(tmpDir, "none"))).toEqual([]);
    expect(await readLines(path.join(tmpDir, "none.list"))).toEqual([]);
  });

  it("writes lines with a trailing newline and reads them back without blanks", async () => {
    const file = path.join(tmpDir, "out", "names.list");
    await writeLines(file, ["one", "two"]);
    expect(await fs.readFile(file, "utf-8")).toBe("one\ntwo\n");
    await fs.appendFile(file, "\n  three  \n", "utf-8");
    expect(await readLines(file)).toEqual(["one", "two", "three"]);
  });
});
