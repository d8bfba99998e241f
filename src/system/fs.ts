// Filesystem capability: attribute-preserving copies and directory trees.
// Copies keep symlinks as links (cp -a semantics) rather than following them.
import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/** Copy a file, link or directory tree, creating the destination's parent first. */
export async function copyPreserving(src: string, dest: string): Promise<void> {
  await ensureDir(path.dirname(dest));
  if ((await fs.lstat(src)).isSymbolicLink()) {
    // fs.cp refuses to replace an existing file with a link
    const target = await fs.readlink(src);
    await fs.rm(dest, { force: true });
    await fs.symlink(target, dest);
    return;
  }
  await fs.cp(src, dest, {
    recursive: true,
    force: true,
    preserveTimestamps: true,
    verbatimSymlinks: true,
  });
}

/** Entries of a directory, or [] when it does not exist. */
export async function listDir(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw err;
  }
}

/** Files and symlinks below a directory, as sorted paths relative to it. */
export async function walkFiles(dir: string): Promise<string[]> {
  const found: string[] = [];
  const visit = async (rel: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(path.join(dir, rel), { withFileTypes: true });
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return;
      throw err;
    }
    for (const entry of entries) {
      const child = rel ? path.join(rel, entry.name) : entry.name;
      if (entry.isDirectory()) await visit(child);
      else found.push(child);
    }
  };
  await visit("");
  return found.sort();
}

/** Non-empty lines of a text file, or [] when it does not exist. */
export async function readLines(file: string): Promise<string[]> {
  try {
    const raw = await fs.readFile(file, "utf-8");
    return raw.split("\n").map((l) => l.trim()).filter(Boolean);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw err;
  }
}

export async function writeLines(file: string, lines: readonly string[]): Promise<void> {
  await ensureDir(path.dirname(file));
  await fs.writeFile(file, lines.length > 0 ? `${lines.join("\n")}\n` : "", "utf-8");
}
