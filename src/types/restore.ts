import type { ElementKind, RunWarning } from "./snapshot.js";

export const RESTORE_POLICIES = [
  "full",
  "minimal",
  "repos-only",
  "release-only",
  "files-only",
  "config-only",
  "interactive-select",
] as const;

export type RestorePolicy = (typeof RESTORE_POLICIES)[number];

/** Restore steps in the only order they may ever run. */
export const RESTORE_STEP_ORDER = [
  "remove-vendor-packages",
  "repos",
  "release-packages",
  "config",
  "deleted-files",
  "remove-marker",
] as const;

export type RestoreStep = (typeof RESTORE_STEP_ORDER)[number];

/** Element kind whose payload a step replays; cross-cutting steps have none. */
export const STEP_ELEMENT: Record<RestoreStep, ElementKind | null> = {
  "remove-vendor-packages": null,
  "repos": "repos",
  "release-packages": "release_rpms",
  "config": "config",
  "deleted-files": "deleted_files",
  "remove-marker": null,
};

export type StepStatus = "done" | "skipped" | "dry-run";

export interface StepOutcome {
  readonly step: RestoreStep;
  readonly status: StepStatus;
  readonly count: number;
  readonly notes: string[];
}

export type RestoreStatus = "completed" | "cancelled" | "dry-run" | "nothing-selected";

export interface RestoreOutcome {
  readonly snapshotId: string;
  readonly policy: RestorePolicy;
  readonly status: RestoreStatus;
  readonly steps: StepOutcome[];
  readonly warnings: RunWarning[];
}

/** Pre-flight view of a snapshot and the live system, used by interactive selection. */
export interface RestoreInspection {
  readonly counts: Record<ElementKind, number>;
  readonly releasePackageNames: string[];
  readonly captured: readonly ElementKind[];
  readonly markerPresent: boolean;
  readonly vendorPackagesInstalled: string[];
}
