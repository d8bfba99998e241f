// Portability codec: one snapshot directory <-> one gzip-compressed tar archive.
// tar does the work; this module decides names and checks what an archive holds
// before anything is extracted into the store.
import fs from "node:fs/promises";
import path from "node:path";
import type { RunContext } from "../context.js";
import type { Command } from "../types/command.js";
import type { SnapshotRef } from "../types/snapshot.js";
import type { SnapshotStore } from "./store.js";
import { LAYOUT, SNAPSHOT_ID_PATTERN } from "./layout.js";
import { readMetadata } from "./metadata.js";
import { resolveTimeout } from "../execution/executor.js";
import { ensureDir, isDirectory } from "../system/fs.js";
import { LiberateError, LiberateErrorCode, describeError } from "../shared/errors.js";

export const tarCommands = {
  create(archive: string, root: string, id: string): Command {
    return { argv: ["tar", "-czf", archive, "-C", root, id] };
  },
  list(archive: string): Command {
    return { argv: ["tar", "-tzf", archive] };
  },
  extract(archive: string, root: string): Command {
    return { argv: ["tar", "-xzf", archive, "-C", root] };
  },
};

export function defaultArchiveName(prefix: string, id: string): string {
  return `${prefix}-${id}.tar.gz`;
}

/**
 * Snapshot id an archive would extract to. The archive must hold exactly one
 * top-level snapshot directory with a descriptor, and no entry may escape it.
 */
export function archiveSnapshotId(entries: readonly string[]): string {
  const invalid = (message: string): LiberateError => new LiberateError(LiberateErrorCode.ARCHIVE_INVALID, message);
  const tops = new Set<string>();
  let hasDescriptor = false;
  for (const raw of entries) {
    const entry = raw.replace(/^\.\//, "");
    if (!entry) continue;
    if (entry.startsWith("/") || entry.split("/").includes("..")) throw invalid(`Archive entry escapes the backup directory: ${raw}`);
    const [top, ...rest] = entry.split("/");
    tops.add(top);
    if (rest.join("/") === LAYOUT.metadata) hasDescriptor = true;
  }
  if (tops.size !== 1) throw invalid(`Archive must contain exactly one backup directory, found ${tops.size}`);
  const [id] = [...tops];
  if (!SNAPSHOT_ID_PATTERN.test(id)) throw invalid(`Archive directory is not a backup id: ${id}`);
  if (!hasDescriptor) throw invalid(`Archive has no ${LAYOUT.metadata} for ${id}`);
  return id;
}

export class PortabilityCodec {
  constructor(
    private readonly ctx: RunContext,
    private readonly store: SnapshotStore,
  ) {}

  async export(name: string, output?: string): Promise<string> {
    const { reporter } = this.ctx;
    const ref = await this.store.resolve(name);
    const archive = path.resolve(output ?? defaultArchiveName(this.ctx.archivePrefix, ref.id));
    reporter.info(`Exporting backup ${ref.id} to ${archive}...`);

    if (this.ctx.dryRun) {
      reporter.print(`[DRY-RUN] Would create archive ${archive}`);
      return archive;
    }

    await ensureDir(path.dirname(archive));
    await this.tar(tarCommands.create(archive, this.store.root, ref.id), "Failed to create archive");
    const { size } = await fs.stat(archive);
    reporter.success(`Backup exported to: ${archive} (${formatSize(size)})`);
    reporter.print();
    reporter.print("To restore on another system:");
    reporter.print(`  1. Copy ${path.basename(archive)} to the target system`);
    reporter.print(`  2. Import it: liberate import ${path.basename(archive)}`);
    reporter.print("  3. Restore it: liberate restore");
    return archive;
  }

  /** Extract an archive into the store and point latest at it. */
  async import(archivePath: string): Promise<SnapshotRef> {
    const { reporter } = this.ctx;
    const archive = path.resolve(archivePath);
    const stat = await fs.stat(archive).catch((err: unknown) => {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      throw err;
    });
    if (!stat?.isFile()) {
      throw new LiberateError(LiberateErrorCode.ARCHIVE_NOT_FOUND, `Archive file not found: ${archive}`, { archive });
    }

    reporter.info(`Importing backup from ${archive}...`);
    const listing = await this.ctx.executor.execute(tarCommands.list(archive), resolveTimeout("normal", this.ctx.timeoutCeilingSeconds));
    if (listing.exitCode !== 0) {
      throw new LiberateError(LiberateErrorCode.ARCHIVE_INVALID, `Cannot read archive ${archive}: ${listing.stderr.trim()}`, { archive });
    }
    const id = archiveSnapshotId(listing.stdout.split("\n").map((l) => l.trim()).filter(Boolean));
    const ref: SnapshotRef = { id, path: this.store.pathOf(id) };
    if (await isDirectory(ref.path)) {
      throw new LiberateError(LiberateErrorCode.ARCHIVE_INVALID, `Backup ${id} already exists in ${this.store.root}`, { id });
    }

    if (this.ctx.dryRun) {
      reporter.print(`[DRY-RUN] Would import backup ${id} into ${this.store.root}`);
      return ref;
    }

    await ensureDir(this.store.root);
    await this.tar(tarCommands.extract(archive, this.store.root), "Failed to extract archive");
    try {
      await readMetadata(ref.path);
    } catch (err) {
      await fs.rm(ref.path, { recursive: true, force: true });
      throw new LiberateError(LiberateErrorCode.ARCHIVE_INVALID, `Imported backup ${id} is not usable: ${describeError(err)}`, { id });
    }
    await this.store.setLatest(id);
    reporter.success(`Backup imported: ${id}`);
    return ref;
  }

  private async tar(command: Command, failure: string): Promise<void> {
    const r = await this.ctx.executor.execute(command, resolveTimeout("slow", this.ctx.timeoutCeilingSeconds));
    if (r.exitCode !== 0) {
      throw new LiberateError(LiberateErrorCode.COMMAND_FAILED, `${failure}: ${r.stderr.trim()}`, { argv: command.argv, exitCode: r.exitCode });
    }
  }
}

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  const units = ["K", "M", "G"];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)}${units[unit]}`;
}
