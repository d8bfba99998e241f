import path from "node:path";
import fs from "node:fs/promises";
import type { RunContext } from "../../context.js";
import type { CaptureResult, ReplayResult } from "../../types/snapshot.js";
import type { ElementBackend } from "./types.js";
import { LAYOUT } from "../layout.js";
import { copyPreserving, ensureDir, isDirectory, listDir } from "../../system/fs.js";
import { describeError } from "../../shared/errors.js";

/** Repository definitions under /etc/yum.repos.d. */
export class ReposBackend implements ElementBackend {
  readonly kind = "repos";
  readonly label = "repository configuration";

  constructor(private readonly ctx: RunContext) {}

  async capture(snapshotDir: string): Promise<CaptureResult> {
    this.ctx.reporter.info("Backing up repository configuration...");
    const dest = path.join(snapshotDir, LAYOUT.repos);
    await ensureDir(dest);
    const source = this.ctx.paths.resolve(this.ctx.paths.reposDir);
    if (!(await isDirectory(source))) {
      return { count: 0, warnings: [`${this.ctx.paths.reposDir} does not exist; no repository files captured`] };
    }
    const warnings: string[] = [];
    let count = 0;
    for (const name of await listDir(source)) {
      try {
        await copyPreserving(path.join(source, name), path.join(dest, name));
        count++;
      } catch (err) {
        warnings.push(`Could not copy repository file ${name}: ${describeError(err)}`);
      }
    }
    return { count, warnings };
  }

  /**
   * Vendor repo files go first: left in place, they make the original release package
   * install report obsoletes conflicts against the vendor's own.
   */
  async replay(snapshotDir: string): Promise<ReplayResult> {
    const warnings: string[] = [];
    const notes: string[] = [];
    const target = this.ctx.paths.resolve(this.ctx.paths.reposDir);

    for (const name of await listDir(target)) {
      if (!this.ctx.vendor.repoFilePatterns.some((p) => p.test(name))) continue;
      try {
        await fs.rm(path.join(target, name), { force: true });
        notes.push(`Removed ${this.ctx.vendor.name} repository file ${name}`);
      } catch (err) {
        warnings.push(`Could not remove ${name}: ${describeError(err)}`);
      }
    }

    const source = path.join(snapshotDir, LAYOUT.repos);
    const captured = await listDir(source);
    if (captured.length === 0) {
      warnings.push("No repository files in snapshot");
      return { count: 0, warnings, notes };
    }

    await ensureDir(target);
    let count = 0;
    for (const name of captured) {
      try {
        await copyPreserving(path.join(source, name), path.join(target, name));
        count++;
      } catch (err) {
        warnings.push(`Failed to restore repository file ${name}: ${describeError(err)}`);
      }
    }
    return { count, warnings, notes };
  }

  async inspect(snapshotDir: string): Promise<number> {
    return (await listDir(path.join(snapshotDir, LAYOUT.repos))).length;
  }
}
