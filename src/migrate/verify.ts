import { readFile } from "node:fs/promises";
import type { RunContext } from "../context.js";
import { parseOsRelease } from "../distro/detector.js";
import { TARGET_RELEASE_PACKAGES } from "../distro/release-table.js";
import { markerPresent } from "../system/marker.js";

const TARGET_OS_IDS = ["sll", "sles", "suse"];

export interface VerifyResult {
  readonly passed: boolean;
  readonly problems: string[];
  /** Target vendor release package found installed, if any. */
  readonly releasePackage: string | null;
}

/** Post-conversion checks: marker written, os-release rebranded, a vendor release package installed. */
export async function verifyMigration(ctx: RunContext): Promise<VerifyResult> {
  const { reporter, paths, packages, vendor } = ctx;
  reporter.info("Verifying migration...");
  const problems: string[] = [];

  if (!(await markerPresent(paths))) problems.push("Liberated marker not found");

  let osId = "unknown";
  try {
    osId = parseOsRelease(await readFile(paths.resolve(paths.osRelease), "utf-8")).ID ?? "unknown";
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
  }
  if (TARGET_OS_IDS.includes(osId)) reporter.info(`${paths.osRelease} shows ${vendor.name} distribution`);
  else problems.push(`${paths.osRelease} does not show ${vendor.name} (ID=${osId})`);

  let releasePackage: string | null = null;
  for (const name of TARGET_RELEASE_PACKAGES) {
    if (await packages.isInstalled(name)) {
      releasePackage = name;
      reporter.info(`${name} package is installed`);
      break;
    }
  }
  if (releasePackage === null) problems.push(`No ${vendor.name} release package found`);

  for (const problem of problems) reporter.warn(problem);
  if (problems.length === 0) reporter.success("Migration verification passed");
  else reporter.warn(`Migration verification completed with ${problems.length} warning(s)`);
  return { passed: problems.length === 0, problems, releasePackage };
}
