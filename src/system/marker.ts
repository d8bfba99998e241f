// Liberated marker: a sysconfig-style file recording that the host completed the conversion.
// Written last by a migration and removed last by a restore that reverses it.
import fs from "node:fs/promises";
import type { SystemPaths } from "./paths.js";
import { ensureDir } from "./fs.js";
import { parseOsRelease } from "../distro/detector.js";
import path from "node:path";

export interface MarkerState {
  readonly liberated: boolean;
  readonly from: string | null;
  readonly date: string | null;
  readonly reinstalled: boolean;
}

export async function readMarker(paths: SystemPaths): Promise<MarkerState | null> {
  let raw: string;
  try {
    raw = await fs.readFile(paths.resolve(paths.markerPath), "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw err;
  }
  const fields = parseOsRelease(raw);
  return {
    liberated: fields.LIBERATED === "true",
    from: fields.LIBERATED_FROM ?? null,
    date: fields.LIBERATED_DATE ?? null,
    reinstalled: fields.LIBERATED_REINSTALLED === "true",
  };
}

export async function markerPresent(paths: SystemPaths): Promise<boolean> {
  return (await readMarker(paths)) !== null;
}

export async function writeMarker(
  paths: SystemPaths,
  params: { from: string; date: string; reinstalled: boolean; engineVersion: string },
): Promise<void> {
  const file = paths.resolve(paths.markerPath);
  await ensureDir(path.dirname(file));
  const body = [
    "# SUSE Liberation marker file",
    `# Created by liberate v${params.engineVersion}`,
    'LIBERATED="true"',
    `LIBERATED_FROM="${params.from}"`,
    `LIBERATED_DATE="${params.date}"`,
    `LIBERATED_REINSTALLED="${params.reinstalled}"`,
    "",
  ].join("\n");
  await fs.writeFile(file, body, "utf-8");
}

/** Remove the marker; false when there was none. */
export async function removeMarker(paths: SystemPaths): Promise<boolean> {
  try {
    await fs.rm(paths.resolve(paths.markerPath));
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}
