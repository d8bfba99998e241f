import path from "node:path";
import type { RunContext } from "../../context.js";
import type { CaptureResult, ReplayResult } from "../../types/snapshot.js";
import type { ElementBackend } from "./types.js";
import { LAYOUT } from "../layout.js";
import { DELETED_FILE_TARGETS } from "../../distro/release-table.js";
import { copyPreserving, ensureDir, isDirectory, pathExists, readLines, walkFiles, writeLines } from "../../system/fs.js";
import { isSafeSystemPath } from "../../system/paths.js";
import { describeError } from "../../shared/errors.js";

/**
 * Files the conversion deletes or overwrites, stored under deleted-files/ at their
 * original absolute path. The manifest lists every captured file and link, and replay
 * restores exactly those paths.
 */
export class DeletedFilesBackend implements ElementBackend {
  readonly kind = "deleted_files";
  readonly label = "files removed by the conversion";

  constructor(private readonly ctx: RunContext) {}

  /** Fixed targets plus the real file behind /etc/os-release when it is a link. */
  async targets(): Promise<string[]> {
    const targets = [...DELETED_FILE_TARGETS];
    const osReleaseTarget = await this.ctx.paths.linkTarget(this.ctx.paths.osRelease);
    if (osReleaseTarget && !targets.includes(osReleaseTarget)) targets.push(osReleaseTarget);
    return targets;
  }

  async capture(snapshotDir: string): Promise<CaptureResult> {
    const { reporter, paths } = this.ctx;
    reporter.info("Backing up files that will be deleted...");
    const payload = path.join(snapshotDir, LAYOUT.deletedFiles);
    await ensureDir(payload);

    const warnings: string[] = [];
    let items = 0;
    for (const target of await this.targets()) {
      const source = paths.resolve(target);
      if (!(await pathExists(source))) continue;
      try {
        await copyPreserving(source, path.join(payload, target));
        items++;
        reporter.info(`Backed up ${(await isDirectory(source)) ? "directory" : "file"}: ${target}`);
      } catch (err) {
        warnings.push(`Could not back up ${target}: ${describeError(err)}`);
      }
    }

    const manifest = (await walkFiles(payload)).map((rel) => `/${rel.split(path.sep).join("/")}`);
    await writeLines(path.join(snapshotDir, LAYOUT.deletedFilesManifest), manifest);
    reporter.success(`Backed up ${items} file(s)/directory(ies) that will be deleted`);
    return { count: manifest.length, warnings };
  }

  async replay(snapshotDir: string): Promise<ReplayResult> {
    const { paths } = this.ctx;
    const payload = path.join(snapshotDir, LAYOUT.deletedFiles);
    const manifestFile = path.join(snapshotDir, LAYOUT.deletedFilesManifest);

    if (!(await isDirectory(payload))) {
      return { count: 0, warnings: ["No deleted-files directory in backup"] };
    }

    if (!(await pathExists(manifestFile))) {
      return this.overlay(payload);
    }

    const warnings: string[] = [];
    const notes: string[] = [];
    let count = 0;
    for (const file of await readLines(manifestFile)) {
      if (!isSafeSystemPath(file)) {
        warnings.push(`Skipped manifest entry outside the restore root: ${file}`);
        continue;
      }
      const captured = path.join(payload, file);
      if (!(await pathExists(captured))) {
        warnings.push(`Listed in manifest but missing from backup: ${file}`);
        continue;
      }
      try {
        await copyPreserving(captured, paths.resolve(file));
        notes.push(`Restored: ${file}`);
        count++;
      } catch (err) {
        warnings.push(`Failed to restore: ${file} (${describeError(err)})`);
      }
    }
    return { count, warnings, notes };
  }

  /** Snapshots without a manifest: every file and link in the payload is laid over the root. */
  private async overlay(payload: string): Promise<ReplayResult> {
    const warnings = ["No deleted-files.manifest in backup; restored the whole payload over the root"];
    const notes: string[] = [];
    let count = 0;
    for (const rel of await walkFiles(payload)) {
      const file = `/${rel.split(path.sep).join("/")}`;
      try {
        await copyPreserving(path.join(payload, rel), this.ctx.paths.resolve(file));
        notes.push(`Restored: ${file}`);
        count++;
      } catch (err) {
        warnings.push(`Failed to restore: ${file} (${describeError(err)})`);
      }
    }
    return { count, warnings, notes };
  }

  async inspect(snapshotDir: string): Promise<number> {
    const manifest = await readLines(path.join(snapshotDir, LAYOUT.deletedFilesManifest));
    if (manifest.length > 0) return manifest.length;
    return (await walkFiles(path.join(snapshotDir, LAYOUT.deletedFiles))).length;
  }
}
