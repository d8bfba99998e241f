import path from "node:path";
import type { RunContext } from "../../context.js";
import type { CaptureResult, ReplayResult } from "../../types/snapshot.js";
import type { ElementBackend } from "./types.js";
import { LAYOUT } from "../layout.js";
import { copyPreserving, ensureDir, pathExists, walkFiles } from "../../system/fs.js";
import { describeError } from "../../shared/errors.js";

/** Package-manager configuration: dnf.conf, yum.conf and the protected-package directory. */
export class ConfigBackend implements ElementBackend {
  readonly kind = "config";
  readonly label = "package manager configuration";

  constructor(private readonly ctx: RunContext) {}

  /** Snapshot entry name → system path. */
  private entries(): Array<[string, string]> {
    const { paths } = this.ctx;
    return [
      ["dnf.conf", paths.dnfConf],
      ["yum.conf", paths.yumConf],
      ["protected.d", paths.protectedDir],
    ];
  }

  async capture(snapshotDir: string): Promise<CaptureResult> {
    this.ctx.reporter.info("Backing up package manager configuration...");
    const dest = path.join(snapshotDir, LAYOUT.config);
    await ensureDir(dest);
    const warnings: string[] = [];
    for (const [entry, systemPath] of this.entries()) {
      const source = this.ctx.paths.resolve(systemPath);
      if (!(await pathExists(source))) continue;
      try {
        await copyPreserving(source, path.join(dest, entry));
      } catch (err) {
        warnings.push(`Could not copy ${systemPath}: ${describeError(err)}`);
      }
    }
    return { count: await this.inspect(snapshotDir), warnings };
  }

  async replay(snapshotDir: string): Promise<ReplayResult> {
    const source = path.join(snapshotDir, LAYOUT.config);
    const warnings: string[] = [];
    const notes: string[] = [];
    let count = 0;

    for (const [entry, systemPath] of this.entries()) {
      const captured = path.join(source, entry);
      if (!(await pathExists(captured))) continue;
      const files = entry === "protected.d" ? await walkFiles(captured) : [""];
      for (const rel of files) {
        const from = rel ? path.join(captured, rel) : captured;
        const to = this.ctx.paths.resolve(rel ? path.posix.join(systemPath, rel) : systemPath);
        try {
          await copyPreserving(from, to);
          count++;
        } catch (err) {
          warnings.push(`Failed to restore ${rel ? path.posix.join(systemPath, rel) : systemPath}: ${describeError(err)}`);
        }
      }
      notes.push(`Restored ${systemPath}`);
    }

    if (count === 0 && warnings.length === 0) warnings.push("No package manager configuration in snapshot");
    return { count, warnings, notes };
  }

  async inspect(snapshotDir: string): Promise<number> {
    return (await walkFiles(path.join(snapshotDir, LAYOUT.config))).length;
  }
}
