// Plain-text migration report written under /var/log after a conversion.
import fs from "node:fs/promises";
import path from "node:path";
import type { RunContext } from "../context.js";
import { requireIdentity } from "../context.js";
import type { RunWarning } from "../types/snapshot.js";
import { parseOsRelease } from "../distro/detector.js";
import { formatDateTime, formatSnapshotStamp } from "../shared/time.js";
import { ensureDir } from "../system/fs.js";

export interface ReportInput {
  readonly generatedAt: Date;
  readonly engineVersion: string;
  readonly original: { name: string; version: string };
  readonly current: { name: string; id: string; version: string } | null;
  readonly kernel: string;
  readonly vendorPackages: readonly string[];
  readonly marker: string | null;
  readonly backupPath: string | null;
  readonly warnings: readonly RunWarning[];
}

const RULE = "==========================================";

export function renderReport(input: ReportInput): string {
  const lines = [
    RULE,
    "Migration Report",
    RULE,
    "",
    `Report generated: ${formatDateTime(input.generatedAt)}`,
    `Engine version: ${input.engineVersion}`,
    "",
    "-- Original System --",
    `Distribution: ${input.original.name}`,
    `Version: ${input.original.version}`,
    "",
    "-- Current System --",
    ...(input.current
      ? [`Name: ${input.current.name}`, `ID: ${input.current.id}`, `Version: ${input.current.version}`]
      : ["os-release not readable"]),
    "",
    "-- Kernel --",
    input.kernel,
    "",
    "-- Installed Target Vendor Packages --",
    ...(input.vendorPackages.length > 0 ? input.vendorPackages : ["None found"]),
    "",
    "-- Liberated Marker --",
    input.marker?.trimEnd() ?? "Not found",
    "",
    "-- Backup Location --",
    input.backupPath ?? "No backup created",
    "",
    "-- Warnings --",
    ...(input.warnings.length > 0 ? input.warnings.map((w) => `[${w.category}] ${w.source}: ${w.message}`) : ["None"]),
    "",
    RULE,
    "End of Report",
    RULE,
  ];
  return `${lines.join("\n")}\n`;
}

/** Gather the report's facts from the live system and write it; returns the report path. */
export async function writeReport(ctx: RunContext, backupPath: string | null, warnings: readonly RunWarning[]): Promise<string> {
  const { paths, packages, vendor } = ctx;
  const identity = requireIdentity(ctx);
  const now = ctx.now();
  const file = paths.resolve(`/var/log/liberate_report_${formatSnapshotStamp(now)}.txt`);

  const readOptional = async (systemPath: string): Promise<string | null> => {
    try {
      return await fs.readFile(paths.resolve(systemPath), "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      throw err;
    }
  };

  const osRelease = await readOptional(paths.osRelease);
  const fields = osRelease === null ? null : parseOsRelease(osRelease);
  const installed = await packages.listInstalledNames();

  const body = renderReport({
    generatedAt: now,
    engineVersion: ctx.engineVersion,
    original: { name: identity.name, version: identity.version },
    current: fields
      ? { name: fields.PRETTY_NAME ?? "unknown", id: fields.ID ?? "unknown", version: fields.VERSION_ID ?? "unknown" }
      : null,
    kernel: ctx.host.kernel,
    vendorPackages: installed.filter((n) => vendor.packageNamePattern.test(n) || /suse/.test(n)).sort(),
    marker: await readOptional(paths.markerPath),
    backupPath,
    warnings,
  });

  await ensureDir(path.dirname(file));
  await fs.writeFile(file, body, "utf-8");
  ctx.reporter.success(`Report saved to ${file}`);
  return file;
}
