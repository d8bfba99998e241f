// Migration flow: checks, automatic full backup, conversion to the target vendor,
// liberated marker, verification, retention pruning and an optional report.
import fs from "node:fs/promises";
import path from "node:path";
import type { RunContext } from "../context.js";
import { perform, requireIdentity } from "../context.js";
import type { SystemIdentity } from "../types/distro.js";
import type { BuildResult, RunWarning } from "../types/snapshot.js";
import type { SnapshotStore } from "../backup/store.js";
import type { PackageOpResult } from "../distro/package-manager.js";
import { SnapshotBuilder } from "../backup/builder.js";
import { CONVERSION_TARGETS, isMajorVersion, originalReleasePackage } from "../distro/release-table.js";
import type { ConversionTarget } from "../distro/release-table.js";
import { readMarker, writeMarker } from "../system/marker.js";
import { pathExists } from "../system/fs.js";
import { formatDateTime } from "../shared/time.js";
import { LiberateError, LiberateErrorCode } from "../shared/errors.js";
import type { VerifyResult } from "./verify.js";
import { verifyMigration } from "./verify.js";
import { writeReport } from "./report.js";

export interface MigrateOptions {
  /** Re-run on a host that already carries the liberated marker. */
  readonly force?: boolean;
  readonly noBackup?: boolean;
  readonly installLogos?: boolean;
  /** Reinstall every package from the target vendor's repositories afterwards. */
  readonly reinstallPackages?: boolean;
  readonly report?: boolean;
}

export type MigrationStatus = "completed" | "already-liberated" | "cancelled" | "dry-run";

export interface MigrationOutcome {
  readonly status: MigrationStatus;
  readonly backup: BuildResult | null;
  readonly verification: VerifyResult | null;
  readonly pruned: string[];
  readonly reportPath: string | null;
  readonly warnings: RunWarning[];
}

/** Commands the conversion shells out to, besides the dnf/yum front end. */
const REQUIRED_COMMANDS = ["rpm"];

export class Migrator {
  private readonly builder: SnapshotBuilder;

  constructor(
    private readonly ctx: RunContext,
    private readonly store: SnapshotStore,
    builder?: SnapshotBuilder,
  ) {
    this.builder = builder ?? new SnapshotBuilder(ctx, store);
  }

  async run(options: MigrateOptions = {}): Promise<MigrationOutcome> {
    const { ctx } = this;
    const { reporter, confirmer } = ctx;
    const identity = requireIdentity(ctx);
    const warnings: RunWarning[] = [];
    const outcome = (status: MigrationStatus, extra: Partial<MigrationOutcome> = {}): MigrationOutcome => ({
      status,
      backup: null,
      verification: null,
      pruned: [],
      reportPath: null,
      warnings,
      ...extra,
    });

    if (await this.alreadyLiberated(options.force ?? false)) return outcome("already-liberated");
    await this.checkPrerequisites(warnings);

    const target = this.targetFor(identity);
    reporter.print();
    reporter.print(`Detected: ${identity.name} ${identity.version}`);
    reporter.print(`Target: ${target.productName}`);
    reporter.print();
    if (ctx.dryRun) {
      reporter.print("DRY-RUN MODE: No changes will be made");
      reporter.print();
    }

    if (!(await confirmer.confirm("Proceed with migration?"))) {
      reporter.info("Migration cancelled by user");
      return outcome("cancelled");
    }

    let backup: BuildResult | null = null;
    if (options.noBackup) {
      reporter.info("Backup disabled by no-backup option");
    } else {
      backup = await this.builder.build("all");
      warnings.push(...backup.warnings);
    }

    const converted = await this.convert(identity, target, options, warnings);
    if (!converted) return outcome("cancelled", { backup });

    await perform(ctx, `Create liberated marker at ${ctx.paths.markerPath}`, async () => {
      await writeMarker(ctx.paths, {
        from: `${identity.name} ${identity.version}`,
        date: formatDateTime(ctx.now()),
        reinstalled: options.reinstallPackages ?? false,
        engineVersion: ctx.engineVersion,
      });
      reporter.success(`Liberated marker created at ${ctx.paths.markerPath}`);
    });

    if (ctx.dryRun) {
      if (options.report) reporter.print("[DRY-RUN] Would generate migration report");
      return outcome("dry-run", { backup });
    }

    const verification = await verifyMigration(ctx);
    const pruned = await this.store.prune(ctx.retention);
    const reportPath = options.report ? await writeReport(ctx, backup?.written ? backup.path : null, warnings) : null;

    reporter.print();
    reporter.print("Migration Summary");
    reporter.print(`  Original OS: ${identity.name} ${identity.version}`);
    reporter.print(`  Target: ${target.productName}`);
    if (backup?.written) reporter.print(`  Backup: ${backup.path}`);
    if (reportPath) reporter.print(`  Report file: ${reportPath}`);
    if (warnings.length > 0) reporter.print(`  Warnings: ${warnings.length}`);
    reporter.print();
    return outcome("completed", { backup, verification, pruned, reportPath });
  }

  private async alreadyLiberated(force: boolean): Promise<boolean> {
    const { reporter, paths } = this.ctx;
    reporter.info("Checking if system is already liberated...");
    const marker = await readMarker(paths);
    if (!marker?.liberated) return false;
    if (force) {
      reporter.warn("System already liberated, but force specified. Continuing...");
      return false;
    }
    reporter.warn(`System already liberated on ${marker.date ?? "unknown"}`);
    reporter.warn(`Original OS: ${marker.from ?? "unknown"}`);
    reporter.warn("Use force to re-run migration");
    return true;
  }

  /** Free space under the store and the required commands are fatal; repository reachability only warns. */
  async checkPrerequisites(warnings: RunWarning[]): Promise<void> {
    const { reporter, packages, minFreeSpaceMb } = this.ctx;
    reporter.info("Checking prerequisites...");
    const errors: string[] = [];

    const availableMb = await this.availableSpaceMb();
    if (availableMb === null) {
      reporter.warn("Could not determine available disk space");
    } else if (availableMb < minFreeSpaceMb) {
      errors.push(`Insufficient disk space: ${availableMb}MB available, ${minFreeSpaceMb}MB required`);
    } else {
      reporter.info(`Disk space check passed: ${availableMb}MB available`);
    }

    const missing: string[] = [];
    for (const command of REQUIRED_COMMANDS) {
      if (!(await packages.commandAvailable(command))) missing.push(command);
    }
    if (!(await packages.commandAvailable("dnf")) && !(await packages.commandAvailable("yum"))) missing.push("dnf or yum");
    if (missing.length > 0) errors.push(`Missing required commands: ${missing.join(" ")}`);

    if (missing.length === 0) {
      reporter.info("Checking repository connectivity...");
      const repolist = await packages.repolist();
      if (!repolist.ok) {
        const message = `Repository check failed, ensure ${this.ctx.vendor.name} repos are configured: ${repolist.error}`;
        warnings.push({ category: "prerequisite", source: "repositories", message });
        reporter.warn(message);
      }
    }

    if (errors.length > 0) {
      for (const e of errors) reporter.error(e);
      throw new LiberateError(LiberateErrorCode.PREREQUISITES_FAILED, `Prerequisites check failed with ${errors.length} error(s)`, { errors });
    }
    reporter.success("All prerequisites satisfied");
  }

  private async availableSpaceMb(): Promise<number | null> {
    let dir = this.ctx.storeRoot;
    while (!(await pathExists(dir))) {
      const parent = path.dirname(dir);
      if (parent === dir) return null;
      dir = parent;
    }
    try {
      const stats = await fs.statfs(dir);
      return Math.floor((stats.bavail * stats.bsize) / (1024 * 1024));
    } catch {
      return null;
    }
  }

  private targetFor(identity: SystemIdentity): ConversionTarget {
    if (!isMajorVersion(identity.versionMajor)) {
      throw new LiberateError(LiberateErrorCode.UNSUPPORTED_VERSION, `Unsupported version: ${identity.versionMajor}`);
    }
    return CONVERSION_TARGETS[identity.versionMajor];
  }

  /**
   * Swap the original release package for the target vendor's. Failing to remove the
   * original or to install the replacement aborts; the optional extras only warn.
   * Returns false when the user declines.
   */
  private async convert(identity: SystemIdentity, target: ConversionTarget, options: MigrateOptions, warnings: RunWarning[]): Promise<boolean> {
    const { ctx } = this;
    const { reporter, confirmer, packages, paths } = ctx;
    const warn = (message: string): void => {
      warnings.push({ category: "conversion", source: identity.id, message });
      reporter.warn(message);
    };
    reporter.info(`Starting EL${identity.versionMajor} liberation process...`);

    const original = originalReleasePackage(identity.id, identity.versionMajor, identity.name === "CentOS Stream");
    if (original === null) {
      throw new LiberateError(LiberateErrorCode.UNSUPPORTED_DISTRO, `Unknown EL${identity.versionMajor} distribution: ${identity.id}`);
    }

    if (!(await confirmer.confirm(`Remove ${original} and install ${target.productName}?`))) {
      reporter.info("Liberation cancelled by user");
      return false;
    }

    if (await packages.isInstalled(original)) {
      await perform(ctx, `Removing ${original}...`, () => this.must(packages.erase(original, { nodeps: true }), `remove ${original}`));
    } else {
      reporter.warn(`Package ${original} not found, skipping removal`);
    }

    const leftovers = identity.versionMajor === "7" ? [paths.redhatReleaseShare] : [paths.redhatReleaseShare, paths.protectedReleaseConf];
    for (const leftover of leftovers) {
      if (!(await pathExists(paths.resolve(leftover)))) continue;
      await perform(ctx, `Removing ${leftover}...`, () => fs.rm(paths.resolve(leftover), { recursive: true, force: true }));
    }

    await perform(ctx, `Installing ${target.releasePackage}...`, () => this.must(packages.install([target.releasePackage]), `install ${target.releasePackage}`));

    if (options.installLogos) {
      await perform(ctx, `Installing ${target.logosPackage}...`, async () => {
        const r = await packages.install([target.logosPackage]);
        if (!r.ok) warn(`Could not install ${target.logosPackage}: ${r.error}`);
      });
    }

    if (identity.versionMajor === "7") {
      reporter.info("Applying EL7 specific fixes...");
      if (await packages.isInstalled("anaconda-core")) {
        await perform(ctx, "Upgrading anaconda-core...", async () => {
          const r = await packages.upgrade(["anaconda-core"]);
          if (!r.ok) warn(`Could not upgrade anaconda-core: ${r.error}`);
        });
      }
      if (await packages.isInstalled("libreport-plugin-bugzilla")) {
        await perform(ctx, "Reinstalling libreport-plugin-bugzilla...", async () => {
          const r = await packages.reinstall(["libreport-plugin-bugzilla"], { obsoletes: true });
          if (!r.ok) warn(`Could not reinstall libreport-plugin-bugzilla: ${r.error}`);
        });
      }
    }

    if (options.reinstallPackages && (await confirmer.confirm("Proceed with package reinstallation?"))) {
      await perform(ctx, "Reinstalling all packages from target vendor repos (this may take a while)...", async () => {
        const r = await packages.reinstallAll(target.reinstallExcludes);
        if (!r.ok) warn(`Some packages could not be reinstalled: ${r.error}`);
      });
    }

    reporter.success(`EL${identity.versionMajor} liberation completed`);
    return true;
  }

  private async must(result: Promise<PackageOpResult>, action: string): Promise<void> {
    const r = await result;
    if (!r.ok) throw new LiberateError(LiberateErrorCode.COMMAND_FAILED, `Failed to ${action}: ${r.error}`);
  }
}
