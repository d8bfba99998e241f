/** Capturable element kinds, in capture order. */
export const ELEMENT_KINDS = [
  "packages",
  "repos",
  "release_files",
  "config",
  "release_rpms",
  "deleted_files",
] as const;

export type ElementKind = (typeof ELEMENT_KINDS)[number];

export function isElementKind(value: string): value is ElementKind {
  return (ELEMENT_KINDS as readonly string[]).includes(value);
}

/** Either every kind, or an explicit yes/no per kind. */
export type InclusionSet = "all" | Readonly<Record<ElementKind, boolean>>;

/** Snapshot descriptor persisted as metadata.json. Field names are part of the on-disk format. */
export interface MetadataDescriptor {
  backup_date: string;
  backup_timestamp: string;
  os_name: string;
  os_id: string;
  os_version: string;
  os_version_major: string;
  hostname: string;
  kernel: string;
  package_count: number;
  release_rpm_count: number;
  script_version: string;
  backed_up_elements: ElementKind[];
}

/** A snapshot directory resolved inside the store. */
export interface SnapshotRef {
  readonly id: string;
  readonly path: string;
}

/** One row of the store listing. */
export interface SnapshotSummary {
  readonly id: string;
  readonly path: string;
  readonly osName: string;
  readonly osVersion: string;
  readonly hasReleaseRpms: boolean;
  readonly elements: readonly ElementKind[];
  readonly isLatest: boolean;
}

export interface CaptureResult {
  readonly count: number;
  readonly warnings: string[];
}

export interface ReplayResult {
  readonly count: number;
  readonly warnings: string[];
  /** Plain lines for the final summary (e.g. packages left for manual install). */
  readonly notes?: string[];
}

/** Capture and replay problems come from snapshots; the other two only from a migration run. */
export type WarningCategory = "degraded-capture" | "degraded-replay" | "prerequisite" | "conversion";

/** A non-fatal failure surfaced in the final summary. */
export interface RunWarning {
  readonly category: WarningCategory;
  readonly source: string;
  readonly message: string;
}

/** Result of a snapshot build. `written` is false for dry runs. */
export interface BuildResult {
  readonly id: string;
  readonly path: string;
  readonly elements: ElementKind[];
  readonly counts: Partial<Record<ElementKind, number>>;
  readonly metadata: MetadataDescriptor | null;
  readonly warnings: RunWarning[];
  readonly written: boolean;
}
