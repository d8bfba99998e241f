import path from "node:path";
import type { RunContext } from "../../context.js";
import type { CaptureResult, ReplayResult } from "../../types/snapshot.js";
import type { ElementBackend } from "./types.js";
import { LAYOUT } from "../layout.js";
import { RELEASE_FILES } from "../../distro/release-table.js";
import { copyPreserving, ensureDir, listDir, pathExists } from "../../system/fs.js";
import { describeError } from "../../shared/errors.js";

/**
 * Identity files (/etc/os-release and siblings). Kept for reference only: reinstalling
 * the original release package regenerates them, so replay never writes them back.
 */
export class ReleaseFilesBackend implements ElementBackend {
  readonly kind = "release_files";
  readonly label = "release identity files";

  constructor(private readonly ctx: RunContext) {}

  async capture(snapshotDir: string): Promise<CaptureResult> {
    this.ctx.reporter.info("Backing up release files...");
    const dest = path.join(snapshotDir, LAYOUT.releaseFiles);
    await ensureDir(dest);
    const warnings: string[] = [];
    let count = 0;
    for (const file of RELEASE_FILES) {
      const source = this.ctx.paths.resolve(file);
      if (!(await pathExists(source))) continue;
      try {
        await copyPreserving(source, path.join(dest, path.basename(file)));
        count++;
      } catch (err) {
        warnings.push(`Could not copy ${file}: ${describeError(err)}`);
      }
    }
    return { count, warnings };
  }

  async replay(snapshotDir: string): Promise<ReplayResult> {
    const count = await this.inspect(snapshotDir);
    return {
      count: 0,
      warnings: [],
      notes: count > 0 ? ["Release files are regenerated by reinstalling the original release package"] : [],
    };
  }

  async inspect(snapshotDir: string): Promise<number> {
    return (await listDir(path.join(snapshotDir, LAYOUT.releaseFiles))).length;
  }
}
