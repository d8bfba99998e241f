// Snapshot store: one directory per snapshot under the store root, plus a "latest" link.
// The link is relative (just the snapshot id) so a copied or relocated store keeps working;
// absolute links written by older releases are read by their final path component.
import fs from "node:fs/promises";
import path from "node:path";
import type { Reporter } from "../reporting/reporter.js";
import type { SnapshotRef, SnapshotSummary } from "../types/snapshot.js";
import { LATEST_POINTER, LAYOUT, SNAPSHOT_ID_PATTERN, compareSnapshotIds } from "./layout.js";
import { readMetadata } from "./metadata.js";
import { formatSnapshotStamp } from "../shared/time.js";
import { ensureDir, isDirectory, listDir, pathExists } from "../system/fs.js";
import { LiberateError, LiberateErrorCode, describeError } from "../shared/errors.js";
import { logger } from "../logger.js";

export class SnapshotStore {
  constructor(
    readonly root: string,
    private readonly reporter: Reporter,
  ) {}

  pathOf(id: string): string {
    return path.join(this.root, id);
  }

  /** Snapshot ids present in the store, oldest first. */
  async ids(): Promise<string[]> {
    const ids: string[] = [];
    for (const name of await listDir(this.root)) {
      if (SNAPSHOT_ID_PATTERN.test(name) && (await isDirectory(this.pathOf(name)))) ids.push(name);
    }
    return ids.sort(compareSnapshotIds);
  }

  /** Id the latest link points at, or null when there is no link or its snapshot is gone. */
  async latestId(): Promise<string | null> {
    let target: string;
    try {
      target = await fs.readlink(path.join(this.root, LATEST_POINTER));
    } catch (err) {
      const code = (err as NodeJS.ErrnoException).code;
      if (code === "ENOENT" || code === "EINVAL") return null;
      throw err;
    }
    const id = path.basename(target);
    return (await isDirectory(this.pathOf(id))) ? id : null;
  }

  /**
   * Resolve "latest" or a literal snapshot id. Both failures print the current
   * listing before throwing, and stay distinguishable by error code.
   */
  async resolve(name: string): Promise<SnapshotRef> {
    if (name === LATEST_POINTER) {
      const id = await this.latestId();
      if (id === null) {
        this.reporter.error("No latest backup found");
        await this.printListing();
        throw new LiberateError(LiberateErrorCode.LATEST_UNDEFINED, `No latest backup in ${this.root}`, { root: this.root });
      }
      return { id, path: this.pathOf(id) };
    }

    const safe = name.length > 0 && !name.includes("/") && name !== "." && name !== "..";
    if (!safe || !(await isDirectory(this.pathOf(name)))) {
      this.reporter.error(`Backup not found: ${name}`);
      await this.printListing();
      throw new LiberateError(LiberateErrorCode.SNAPSHOT_NOT_FOUND, `Backup not found: ${name}`, { name, root: this.root });
    }
    return { id: name, path: this.pathOf(name) };
  }

  /** Summaries of every snapshot with a readable descriptor, newest first. */
  async list(): Promise<SnapshotSummary[]> {
    const latest = await this.latestId();
    const summaries: SnapshotSummary[] = [];
    for (const id of (await this.ids()).reverse()) {
      const dir = this.pathOf(id);
      try {
        const { descriptor } = await readMetadata(dir);
        const rpms = (await listDir(path.join(dir, LAYOUT.rpms))).filter((f) => f.endsWith(".rpm"));
        summaries.push({
          id,
          path: dir,
          osName: descriptor.os_name,
          osVersion: descriptor.os_version,
          hasReleaseRpms: rpms.length > 0,
          elements: descriptor.backed_up_elements,
          isLatest: id === latest,
        });
      } catch (err) {
        logger.debug({ id, error: describeError(err) }, "Skipping directory without a valid descriptor");
      }
    }
    return summaries;
  }

  async printListing(): Promise<void> {
    const { reporter } = this;
    reporter.print();
    reporter.print(`Available backups in ${this.root}:`);
    reporter.print();
    const summaries = await this.list();
    if (summaries.length === 0) {
      reporter.print("No backups found.");
      reporter.print();
      return;
    }
    for (const s of summaries) {
      const os = `${s.osName} ${s.osVersion}`;
      reporter.print(`  ${s.id.padEnd(20)} | OS: ${os.padEnd(25)} | RPMs: ${s.hasReleaseRpms ? "Yes" : "No"}`);
    }
    reporter.print();
    reporter.print(`Total: ${summaries.length} backup(s)`);
    const latest = summaries.find((s) => s.isLatest);
    if (latest) reporter.print(`Latest: ${latest.id}`);
    reporter.print();
  }

  /** Point latest at a snapshot. The new link is renamed over the old one, so it never disappears. */
  async setLatest(id: string): Promise<void> {
    const link = path.join(this.root, LATEST_POINTER);
    const staging = path.join(this.root, `.${LATEST_POINTER}.${process.pid}`);
    await fs.rm(staging, { force: true });
    await fs.symlink(id, staging);
    await fs.rename(staging, link);
    logger.debug({ id }, "Latest pointer updated");
  }

  /** Id the next build at this time would receive, without creating anything. */
  async nextId(at: Date): Promise<string> {
    const base = formatSnapshotStamp(at);
    let id = base;
    for (let n = 1; await pathExists(this.pathOf(id)); n++) id = `${base}_${n}`;
    return id;
  }

  /**
   * Create the directory for a new snapshot. A second build in the same second gets
   * a _1, _2, ... suffix. Failing to create the directory is the one fatal build error.
   */
  async allocate(at: Date): Promise<SnapshotRef> {
    const base = formatSnapshotStamp(at);
    try {
      await ensureDir(this.root);
      for (let n = 0; ; n++) {
        const id = n === 0 ? base : `${base}_${n}`;
        try {
          await fs.mkdir(this.pathOf(id));
          return { id, path: this.pathOf(id) };
        } catch (err) {
          if ((err as NodeJS.ErrnoException).code !== "EEXIST") throw err;
        }
      }
    } catch (err) {
      throw new LiberateError(LiberateErrorCode.STORE_UNAVAILABLE, `Cannot create snapshot directory in ${this.root}: ${describeError(err)}`, {
        root: this.root,
      });
    }
  }

  /** Ids prune(keep) would remove: the oldest beyond the retention count. */
  async pruneCandidates(keep: number): Promise<string[]> {
    const ids = await this.ids();
    return ids.length > keep ? ids.slice(0, ids.length - keep) : [];
  }

  /**
   * Keep the newest `keep` snapshots. Latest is only removed when it is itself among
   * the oldest; the link then moves to the newest snapshot that remains.
   */
  async prune(keep: number): Promise<string[]> {
    const doomed = await this.pruneCandidates(keep);
    if (doomed.length === 0) {
      logger.debug({ keep }, "Nothing to prune");
      return [];
    }
    this.reporter.info(`Cleaning up old backups (keeping last ${keep})...`);
    const latest = await this.latestId();
    for (const id of doomed) {
      await fs.rm(this.pathOf(id), { recursive: true, force: true });
      this.reporter.info(`Removed old backup: ${id}`);
    }
    if (latest !== null && doomed.includes(latest)) await this.repointLatest();
    return doomed;
  }

  async delete(id: string): Promise<SnapshotRef> {
    const ref = await this.resolve(id);
    const wasLatest = (await this.latestId()) === ref.id;
    await fs.rm(ref.path, { recursive: true, force: true });
    this.reporter.info(`Deleted backup: ${ref.id}`);
    if (wasLatest) await this.repointLatest();
    return ref;
  }

  private async repointLatest(): Promise<void> {
    const remaining = await this.ids();
    const newest = remaining[remaining.length - 1];
    if (newest === undefined) {
      await fs.rm(path.join(this.root, LATEST_POINTER), { force: true });
      this.reporter.warn("Latest backup was removed and no backups remain");
      return;
    }
    await this.setLatest(newest);
    this.reporter.warn(`Latest backup was removed; latest now points to ${newest}`);
  }
}
