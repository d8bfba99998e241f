// Restore orchestrator: replays a snapshot under a restore policy.
// Steps always run in RESTORE_STEP_ORDER so that an interrupted restore leaves the host
// in an explainable state: vendor packages go before the original release is
// reinstalled, and the liberated marker is cleared only after everything else.
import path from "node:path";
import type { RunContext } from "../context.js";
import { perform } from "../context.js";
import type { ElementKind, MetadataDescriptor, RunWarning, SnapshotRef } from "../types/snapshot.js";
import { ELEMENT_KINDS } from "../types/snapshot.js";
import type { RestoreInspection, RestoreOutcome, RestorePolicy, RestoreStep, StepOutcome } from "../types/restore.js";
import { STEP_ELEMENT } from "../types/restore.js";
import type { SnapshotStore } from "../backup/store.js";
import type { ElementBackends } from "../backup/elements/index.js";
import { createElementBackends } from "../backup/elements/index.js";
import { LAYOUT } from "../backup/layout.js";
import { readMetadata } from "../backup/metadata.js";
import { markerPresent, removeMarker } from "../system/marker.js";
import { STEP_DESCRIPTIONS, orderSteps, stepsFor } from "./policy.js";
import { describeError } from "../shared/errors.js";

interface StepRun {
  count: number;
  notes: string[];
  skipped: boolean;
}

export class RestoreOrchestrator {
  private readonly backends: ElementBackends;

  constructor(
    private readonly ctx: RunContext,
    private readonly store: SnapshotStore,
    backends?: ElementBackends,
  ) {
    this.backends = backends ?? createElementBackends(ctx);
  }

  /** What the snapshot can restore, and what the live system currently looks like. */
  async inspect(ref: SnapshotRef, descriptor: MetadataDescriptor): Promise<RestoreInspection> {
    const captured = descriptor.backed_up_elements;
    const counts: Record<ElementKind, number> = {
      packages: 0,
      repos: 0,
      release_files: 0,
      config: 0,
      release_rpms: 0,
      deleted_files: 0,
    };
    for (const kind of ELEMENT_KINDS) {
      if (captured.includes(kind)) counts[kind] = await this.backends[kind].inspect(ref.path);
    }
    const releasePackageNames = captured.includes("release_rpms") ? await this.backends.release_rpms.listedPackages(ref.path) : [];

    const vendorPackagesInstalled: string[] = [];
    for (const name of this.ctx.vendor.releasePackages) {
      if (await this.ctx.packages.isInstalled(name)) vendorPackagesInstalled.push(name);
    }

    return {
      counts,
      releasePackageNames,
      captured,
      markerPresent: await markerPresent(this.ctx.paths),
      vendorPackagesInstalled,
    };
  }

  /**
   * Resolve the snapshot and run the policy's steps. Resolution and descriptor errors
   * are fatal and thrown before any step; step failures become degraded-replay warnings.
   */
  async restore(name: string, policy: RestorePolicy): Promise<RestoreOutcome> {
    const { ctx } = this;
    const { reporter, confirmer } = ctx;
    const ref = await this.store.resolve(name);
    reporter.info(`Restoring from backup: ${ref.path}`);
    const { descriptor, inferred } = await readMetadata(ref.path);
    const original = `${descriptor.os_name} ${descriptor.os_version}`;

    reporter.print();
    reporter.print("Restore Information:");
    reporter.print(`  Backup: ${ref.id}`);
    reporter.print(`  Original OS: ${original}`);
    if (ctx.identity) reporter.print(`  Current OS: ${ctx.identity.name} ${ctx.identity.version}`);
    reporter.print(`  Policy: ${policy}`);
    reporter.print();
    if (inferred) {
      reporter.warn("Backup predates element tracking; captured elements inferred from its contents");
    }

    let steps: RestoreStep[];
    if (policy === "interactive-select") {
      steps = await this.select(ref, descriptor);
      if (steps.length === 0) {
        reporter.info("Nothing selected to restore");
        return { snapshotId: ref.id, policy, status: "nothing-selected", steps: [], warnings: [] };
      }
    } else {
      steps = stepsFor(policy);
    }

    reporter.print("This will:");
    for (const step of steps) reporter.print(`  - ${STEP_DESCRIPTIONS[step]}`);
    reporter.print();

    if (!ctx.dryRun) {
      const question = policy === "full" ? `Restore system to ${original}?` : `Proceed with ${policy} restore?`;
      if (!(await confirmer.confirm(question))) {
        reporter.info("Restore cancelled by user");
        return { snapshotId: ref.id, policy, status: "cancelled", steps: [], warnings: [] };
      }
    }

    const warnings: RunWarning[] = [];
    const outcomes: StepOutcome[] = [];
    const ordered = orderSteps(steps);
    for (const [index, step] of ordered.entries()) {
      const label = `Step ${index + 1}/${ordered.length}: ${STEP_DESCRIPTIONS[step]}`;
      const stepWarnings: string[] = [];
      let run: StepRun | null;
      try {
        run = await perform(ctx, label, () => this.runStep(step, ref, descriptor, stepWarnings));
      } catch (err) {
        stepWarnings.push(`${STEP_DESCRIPTIONS[step]} failed: ${describeError(err)}`);
        run = { count: 0, notes: [], skipped: false };
      }
      for (const message of stepWarnings) {
        warnings.push({ category: "degraded-replay", source: step, message });
        reporter.warn(message);
      }
      outcomes.push(
        run === null
          ? { step, status: "dry-run", count: 0, notes: [] }
          : { step, status: run.skipped ? "skipped" : "done", count: run.count, notes: run.notes },
      );
    }

    if (policy === "full" && !ctx.dryRun) {
      reporter.info("Cleaning package manager cache...");
      const clean = await ctx.packages.cleanCache();
      if (!clean.ok) {
        warnings.push({ category: "degraded-replay", source: "clean-cache", message: `Could not clean package cache: ${clean.error}` });
      }
    }

    const outcome: RestoreOutcome = {
      snapshotId: ref.id,
      policy,
      status: ctx.dryRun ? "dry-run" : "completed",
      steps: outcomes,
      warnings,
    };
    this.printSummary(ref, outcome);
    return outcome;
  }

  /**
   * Pre-flight inspection, then one question per step the snapshot and system can
   * actually satisfy. Kinds with nothing captured are never offered.
   */
  private async select(ref: SnapshotRef, descriptor: MetadataDescriptor): Promise<RestoreStep[]> {
    const { reporter, confirmer, vendor } = this.ctx;
    const inspection = await this.inspect(ref, descriptor);
    reporter.print("Backup contents:");
    for (const kind of ELEMENT_KINDS) {
      const state = inspection.captured.includes(kind) ? String(inspection.counts[kind]) : "not captured";
      reporter.print(`  ${this.backends[kind].label}: ${state}`);
    }
    reporter.print("Current system:");
    reporter.print(`  Liberated marker: ${inspection.markerPresent ? "present" : "absent"}`);
    reporter.print(`  ${vendor.name} packages: ${inspection.vendorPackagesInstalled.join(" ") || "none"}`);
    reporter.print();

    const offers: Array<[RestoreStep, string]> = [];
    if (inspection.vendorPackagesInstalled.length > 0) {
      offers.push(["remove-vendor-packages", `Remove ${vendor.name} packages (${inspection.vendorPackagesInstalled.join(" ")})?`]);
    }
    if (inspection.counts.repos > 0) {
      offers.push(["repos", `Restore ${inspection.counts.repos} repository file(s)?`]);
    }
    if (inspection.counts.release_rpms > 0) {
      offers.push(["release-packages", `Install ${inspection.counts.release_rpms} release package(s) from backup?`]);
    } else if (inspection.releasePackageNames.length > 0) {
      offers.push(["release-packages", `Install release packages from repositories (${inspection.releasePackageNames.join(" ")})?`]);
    }
    if (inspection.counts.config > 0) {
      offers.push(["config", `Restore ${inspection.counts.config} package manager configuration file(s)?`]);
    }
    if (inspection.counts.deleted_files > 0) {
      offers.push(["deleted-files", `Restore ${inspection.counts.deleted_files} deleted file(s)?`]);
    }
    if (inspection.markerPresent) {
      offers.push(["remove-marker", "Remove the liberated marker?"]);
    }

    const chosen: RestoreStep[] = [];
    for (const [step, question] of offers) {
      if (await confirmer.confirm(question)) chosen.push(step);
    }
    return orderSteps(chosen);
  }

  private async runStep(step: RestoreStep, ref: SnapshotRef, descriptor: MetadataDescriptor, warnings: string[]): Promise<StepRun> {
    switch (step) {
      case "remove-vendor-packages":
        return this.removeVendorPackages(warnings);
      case "remove-marker": {
        const removed = await removeMarker(this.ctx.paths);
        return { count: removed ? 1 : 0, notes: removed ? ["Removed liberated marker"] : [], skipped: false };
      }
      default: {
        const kind = STEP_ELEMENT[step];
        if (kind === null) return { count: 0, notes: [], skipped: true };
        return this.replayElement(kind, ref, descriptor, warnings);
      }
    }
  }

  private async removeVendorPackages(warnings: string[]): Promise<StepRun> {
    const { packages, vendor, reporter } = this.ctx;
    const notes: string[] = [];
    for (const name of vendor.releasePackages) {
      if (!(await packages.isInstalled(name))) continue;
      reporter.info(`Removing ${name}...`);
      const r = await packages.erase(name, { nodeps: true });
      if (r.ok) notes.push(`Removed ${name}`);
      else warnings.push(`Could not remove ${name}: ${r.error}`);
    }
    return { count: notes.length, notes, skipped: false };
  }

  private async replayElement(kind: ElementKind, ref: SnapshotRef, descriptor: MetadataDescriptor, warnings: string[]): Promise<StepRun> {
    const backend = this.backends[kind];
    if (!descriptor.backed_up_elements.includes(kind)) {
      warnings.push(`Nothing to restore: ${backend.label} not captured in backup ${ref.id}`);
      return { count: 0, notes: [], skipped: true };
    }
    const result = await backend.replay(ref.path);
    warnings.push(...result.warnings);
    return { count: result.count, notes: result.notes ?? [], skipped: false };
  }

  private printSummary(ref: SnapshotRef, outcome: RestoreOutcome): void {
    const { reporter } = this.ctx;
    reporter.print();
    if (outcome.status === "dry-run") {
      reporter.print(`[DRY-RUN] Would restore from backup ${ref.id}`);
    } else if (outcome.warnings.length === 0) {
      reporter.success("System restore completed!");
    } else {
      reporter.warn(`Restore completed with ${outcome.warnings.length} warning(s)`);
    }
    reporter.print();
    reporter.print("Summary:");
    for (const step of outcome.steps) {
      reporter.print(`  - ${STEP_DESCRIPTIONS[step.step]}: ${step.status}${step.status === "done" ? ` (${step.count})` : ""}`);
      for (const note of step.notes) reporter.print(`      ${note}`);
    }
    reporter.print();

    if (outcome.status === "dry-run") return;
    if (outcome.policy === "repos-only") {
      reporter.print("Repository files restored. To complete rollback:");
      reporter.print("  1. Ensure original distribution repos are configured");
      reporter.print(`  2. Remove ${this.ctx.vendor.name} release packages manually`);
      reporter.print("  3. Install original release packages");
      reporter.print(`  Package list available at: ${path.join(ref.path, LAYOUT.packagesList)}`);
      reporter.print();
    }
    const identityChanged = outcome.steps.some(
      (s) => (s.step === "release-packages" || s.step === "remove-vendor-packages") && s.status === "done",
    );
    if (identityChanged) {
      reporter.print("A system reboot is recommended to complete the restore.");
      reporter.print();
    }
  }
}
