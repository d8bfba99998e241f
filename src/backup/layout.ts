// On-disk layout of one snapshot directory. These names are the portable format:
// snapshots written by older releases and archives from other hosts use the same entries.
import path from "node:path";
import type { ElementKind } from "../types/snapshot.js";

export const LAYOUT = {
  repos: "repos",
  releaseFiles: "release-files",
  config: "dnf-yum-config",
  rpms: "rpms",
  deletedFiles: "deleted-files",
  packagesList: "packages.list",
  releasePackagesList: "release-packages.list",
  releasePackagesInfo: "release-packages-info.txt",
  deletedFilesManifest: "deleted-files.manifest",
  checksums: "SHA256SUMS",
  metadata: "metadata.json",
} as const;

export const LATEST_POINTER = "latest";

/** Snapshot ids: YYYYMMDD_HHMMSS, with _N appended when a second build lands in the same second. */
export const SNAPSHOT_ID_PATTERN = /^\d{8}_\d{6}(_\d+)?$/;

/** Entries inside a snapshot that belong to each element kind. */
export const ELEMENT_ENTRIES: Readonly<Record<ElementKind, readonly string[]>> = {
  packages: [LAYOUT.packagesList],
  repos: [LAYOUT.repos],
  release_files: [LAYOUT.releaseFiles],
  config: [LAYOUT.config],
  release_rpms: [LAYOUT.rpms, LAYOUT.releasePackagesList, LAYOUT.releasePackagesInfo],
  deleted_files: [LAYOUT.deletedFiles, LAYOUT.deletedFilesManifest],
};

export function snapshotEntry(snapshotDir: string, entry: string): string {
  return path.join(snapshotDir, entry);
}

/** Order snapshot ids by creation: timestamp first, then the numeric collision suffix. */
export function compareSnapshotIds(a: string, b: string): number {
  const [aStamp, aSuffix] = splitId(a);
  const [bStamp, bSuffix] = splitId(b);
  if (aStamp !== bStamp) return aStamp < bStamp ? -1 : 1;
  return aSuffix - bSuffix;
}

function splitId(id: string): [string, number] {
  const stamp = id.slice(0, 15);
  const suffix = id.length > 16 ? Number(id.slice(16)) : 0;
  return [stamp, suffix];
}
