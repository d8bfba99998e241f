import path from "node:path";
import fs from "node:fs/promises";
import type { RunContext } from "../../context.js";
import { requireIdentity } from "../../context.js";
import type { SystemIdentity } from "../../types/distro.js";
import type { CaptureResult, ReplayResult } from "../../types/snapshot.js";
import type { ElementBackend } from "./types.js";
import { LAYOUT } from "../layout.js";
import { RELEASE_NAME_PATTERN, PACKAGE_CACHE_DIRS, releasePackageCandidates } from "../../distro/release-table.js";
import { copyPreserving, ensureDir, listDir, readLines, walkFiles, writeLines } from "../../system/fs.js";
import { verifyChecksums, writeChecksums } from "../checksums.js";
import { describeError } from "../../shared/errors.js";

type AcquireMethod = "download" | "cache" | "url";

/**
 * Release package names for this host: the static table for its distribution,
 * filtered to what is installed, plus any other installed foo-release[-variant]
 * package that does not belong to the target vendor.
 */
export async function resolveReleasePackages(ctx: RunContext, identity: SystemIdentity): Promise<string[]> {
  const found: string[] = [];
  for (const name of releasePackageCandidates(identity.id, identity.versionMajor)) {
    if (!found.includes(name) && (await ctx.packages.isInstalled(name))) found.push(name);
  }
  for (const name of await ctx.packages.listInstalledNames()) {
    if (!RELEASE_NAME_PATTERN.test(name)) continue;
    if (ctx.vendor.packageNamePattern.test(name)) continue;
    if (!found.includes(name)) found.push(name);
  }
  return found;
}

async function rpmFiles(dir: string): Promise<string[]> {
  return (await listDir(dir)).filter((f) => f.endsWith(".rpm"));
}

/** Payloads of the original release packages, so the release can be reinstalled offline. */
export class ReleaseRpmsBackend implements ElementBackend {
  readonly kind = "release_rpms";
  readonly label = "release packages (RPM payloads)";

  constructor(private readonly ctx: RunContext) {}

  async capture(snapshotDir: string): Promise<CaptureResult> {
    const { reporter } = this.ctx;
    reporter.info("Backing up release RPM files...");
    const rpmDir = path.join(snapshotDir, LAYOUT.rpms);
    await ensureDir(rpmDir);

    const names = await resolveReleasePackages(this.ctx, requireIdentity(this.ctx));
    if (names.length === 0) {
      return { count: 0, warnings: ["No release packages found to backup"] };
    }
    reporter.info(`Release packages to backup: ${names.join(" ")}`);
    await writeLines(path.join(snapshotDir, LAYOUT.releasePackagesList), names);

    const warnings: string[] = [];
    const methods: Array<[AcquireMethod, () => Promise<void>]> = [
      ["download", () => this.viaDownload(names, rpmDir, warnings)],
      ["cache", () => this.viaCache(names, rpmDir, warnings)],
      ["url", () => this.viaUrl(names, rpmDir, warnings)],
    ];
    let winner: AcquireMethod | null = null;
    for (const [method, acquire] of methods) {
      await acquire();
      if ((await rpmFiles(rpmDir)).length > 0) {
        winner = method;
        break;
      }
    }

    const files = await rpmFiles(rpmDir);
    if (winner) {
      reporter.success(`Backed up ${files.length} RPM file(s) to ${rpmDir} (via ${winner})`);
      await writeChecksums(rpmDir, files, LAYOUT.checksums);
    } else {
      warnings.push("Could not download release RPMs. Backup will contain package list only.");
      warnings.push(`For full restore capability, manually copy RPMs to: ${rpmDir}`);
    }

    await this.writePackageInfo(snapshotDir, names, warnings);
    return { count: files.length, warnings };
  }

  private async viaDownload(names: string[], rpmDir: string, warnings: string[]): Promise<void> {
    this.ctx.reporter.info("Downloading release RPMs with the package manager...");
    const r = await this.ctx.packages.download(names, rpmDir);
    if (!r.ok) warnings.push(`Package manager download failed: ${r.error}`);
  }

  private async viaCache(names: string[], rpmDir: string, warnings: string[]): Promise<void> {
    this.ctx.reporter.info("Direct download failed, searching package manager caches...");
    for (const name of names) {
      const fileName = await this.ctx.packages.packageFileName(name);
      if (!fileName) continue;
      for (const cacheDir of PACKAGE_CACHE_DIRS) {
        const root = this.ctx.paths.resolve(cacheDir);
        const hit = (await walkFiles(root)).find((rel) => path.basename(rel) === fileName);
        if (!hit) continue;
        try {
          await copyPreserving(path.join(root, hit), path.join(rpmDir, fileName));
        } catch (err) {
          warnings.push(`Could not copy cached ${fileName}: ${describeError(err)}`);
        }
        break;
      }
    }
  }

  private async viaUrl(names: string[], rpmDir: string, warnings: string[]): Promise<void> {
    this.ctx.reporter.info("Trying repository URLs...");
    for (const name of names) {
      const url = await this.ctx.packages.locate(name);
      if (!url) continue;
      const r = await this.ctx.packages.fetch(url, path.join(rpmDir, `${name}.rpm`));
      if (!r.ok) warnings.push(`Could not fetch ${url}: ${r.error}`);
    }
  }

  private async writePackageInfo(snapshotDir: string, names: string[], warnings: string[]): Promise<void> {
    const blocks: string[] = [];
    for (const name of names) {
      const r = await this.ctx.packages.packageInfo(name);
      if (r.ok) blocks.push(r.output.trimEnd());
      else warnings.push(`No package info for ${name}: ${r.error}`);
      blocks.push("---");
    }
    await fs.writeFile(path.join(snapshotDir, LAYOUT.releasePackagesInfo), `${blocks.join("\n")}\n`, "utf-8");
  }

  /**
   * Installs captured payloads with --force --nodeps so they can sit next to the vendor
   * release package for the moment; without payloads, installs the same names from
   * whatever repositories are enabled.
   */
  async replay(snapshotDir: string): Promise<ReplayResult> {
    const { packages } = this.ctx;
    const rpmDir = path.join(snapshotDir, LAYOUT.rpms);
    const files = await rpmFiles(rpmDir);
    const names = await this.listedPackages(snapshotDir);
    const warnings: string[] = [];
    const notes: string[] = [];

    if (files.length > 0) {
      const report = await verifyChecksums(rpmDir, LAYOUT.checksums);
      if (report === null) {
        notes.push("No checksum manifest in snapshot; RPMs installed unverified");
      } else if (report.mismatched.length > 0 || report.missing.length > 0) {
        warnings.push(`Checksum verification failed for: ${[...report.mismatched, ...report.missing].join(", ")}`);
      }

      const r = await packages.installFiles(files.map((f) => path.join(rpmDir, f)), { force: true, nodeps: true });
      if (r.ok) {
        notes.push("Release packages installed from backup");
        return { count: files.length, warnings, notes };
      }
      warnings.push(`Some RPMs failed to install: ${r.error}`);
    }

    if (names.length > 0) {
      notes.push("RPMs not installed from backup, installing from repositories");
      const clean = await packages.cleanCache();
      if (!clean.ok) warnings.push(`Could not clean package cache: ${clean.error}`);
      const r = await packages.install(names, { allowErasing: true });
      if (r.ok) {
        notes.push("Release packages installed from repositories");
        return { count: names.length, warnings, notes };
      }
      warnings.push(`Repository install failed: ${r.error}`);
    }

    warnings.push("Could not install release packages automatically");
    if (names.length > 0) notes.push(`Packages to install manually: ${names.join(" ")}`);
    return { count: 0, warnings, notes };
  }

  async inspect(snapshotDir: string): Promise<number> {
    return (await rpmFiles(path.join(snapshotDir, LAYOUT.rpms))).length;
  }

  async listedPackages(snapshotDir: string): Promise<string[]> {
    return readLines(path.join(snapshotDir, LAYOUT.releasePackagesList));
  }
}
