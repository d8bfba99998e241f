import path from "node:path";
import type { RunContext } from "../context.js";
import type { BuildResult, ElementKind, InclusionSet, RunWarning } from "../types/snapshot.js";
import { ELEMENT_KINDS } from "../types/snapshot.js";
import type { SnapshotStore } from "./store.js";
import type { ElementBackends } from "./elements/index.js";
import { createElementBackends } from "./elements/index.js";
import { describe, writeMetadata } from "./metadata.js";
import { LAYOUT } from "./layout.js";
import { ensureDir } from "../system/fs.js";
import { describeError } from "../shared/errors.js";

export function includedKinds(inclusion: InclusionSet): ElementKind[] {
  return inclusion === "all" ? [...ELEMENT_KINDS] : ELEMENT_KINDS.filter((k) => inclusion[k]);
}

/**
 * Produces one snapshot: captures every included element kind, then writes the
 * descriptor and moves the latest link. Only allocating the snapshot directory can
 * fail the build; capture problems become degraded-capture warnings.
 */
export class SnapshotBuilder {
  private readonly backends: ElementBackends;

  constructor(
    private readonly ctx: RunContext,
    private readonly store: SnapshotStore,
    backends?: ElementBackends,
  ) {
    this.backends = backends ?? createElementBackends(ctx);
  }

  /** One yes/no question per element kind, defaulting to yes. */
  async selectInclusion(): Promise<Record<ElementKind, boolean>> {
    const { confirmer, reporter } = this.ctx;
    reporter.print("Select the elements to include in the backup:");
    const inclusion: Record<ElementKind, boolean> = {
      packages: false,
      repos: false,
      release_files: false,
      config: false,
      release_rpms: false,
      deleted_files: false,
    };
    for (const kind of ELEMENT_KINDS) {
      inclusion[kind] = await confirmer.confirm(`Include ${this.backends[kind].label}?`, true);
    }
    return inclusion;
  }

  async build(inclusion: InclusionSet): Promise<BuildResult> {
    const { ctx, store } = this;
    const { reporter } = ctx;
    const kinds = includedKinds(inclusion);
    const createdAt = ctx.now();

    if (ctx.dryRun) {
      const id = await store.nextId(createdAt);
      const dir = store.pathOf(id);
      reporter.print(`[DRY-RUN] Would create backup at ${dir}`);
      for (const kind of kinds) reporter.print(`[DRY-RUN] Would back up ${this.backends[kind].label}`);
      return { id, path: dir, elements: kinds, counts: {}, metadata: null, warnings: [], written: false };
    }

    reporter.info("Creating backup...");
    const ref = await store.allocate(createdAt);
    // rpms/ is always present; empty when release_rpms is excluded or nothing was recovered
    await ensureDir(path.join(ref.path, LAYOUT.rpms));
    const captured: ElementKind[] = [];
    const counts: Partial<Record<ElementKind, number>> = {};
    const warnings: RunWarning[] = [];
    const degrade = (kind: ElementKind, message: string): void => {
      warnings.push({ category: "degraded-capture", source: kind, message });
      reporter.warn(message);
    };

    for (const kind of kinds) {
      try {
        const result = await this.backends[kind].capture(ref.path);
        counts[kind] = result.count;
        captured.push(kind);
        for (const message of result.warnings) degrade(kind, message);
      } catch (err) {
        degrade(kind, `Backup of ${this.backends[kind].label} failed: ${describeError(err)}`);
      }
    }

    reporter.info("Creating backup metadata...");
    const metadata = await describe(ctx, ref.path, captured, createdAt);
    await writeMetadata(ref.path, metadata);
    await store.setLatest(ref.id);
    reporter.success(`Backup created at ${ref.path}`);

    reporter.print();
    reporter.print("Backup summary:");
    reporter.print(`  Location: ${ref.path}`);
    reporter.print(`  Elements: ${captured.length > 0 ? captured.join(", ") : "none (all excluded)"}`);
    reporter.print(`  Release RPMs: ${metadata.release_rpm_count}`);
    if (counts.packages !== undefined) reporter.print(`  Total packages: ${counts.packages}`);
    if (warnings.length > 0) reporter.print(`  Warnings: ${warnings.length}`);
    reporter.print();

    return { id: ref.id, path: ref.path, elements: captured, counts, metadata, warnings, written: true };
  }
}
