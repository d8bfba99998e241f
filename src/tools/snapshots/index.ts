import { z } from "zod";
import type { ToolContext } from "../context.js";
import { registerTool, withRun } from "../helpers.js";
import { ELEMENT_KINDS } from "../../types/snapshot.js";
import type { ElementKind, InclusionSet } from "../../types/snapshot.js";
import { SnapshotStore } from "../../backup/store.js";
import { SnapshotBuilder } from "../../backup/builder.js";
import { PortabilityCodec } from "../../backup/codec.js";

const confirmed = z.boolean().optional().default(false).describe("Pass true to confirm execution after reviewing a confirmation_required response.");
const dryRun = z.boolean().optional().default(false).describe("Preview without executing: reports what would happen without making changes.");
const backupName = z.string().min(1).optional().default("latest").describe("Backup id (YYYYMMDD_HHMMSS) or 'latest'");

function inclusionOf(elements: readonly ElementKind[] | undefined): InclusionSet {
  if (!elements) return "all";
  const inclusion: Record<ElementKind, boolean> = {
    packages: false,
    repos: false,
    release_files: false,
    config: false,
    release_rpms: false,
    deleted_files: false,
  };
  for (const kind of elements) inclusion[kind] = true;
  return inclusion;
}

export function registerSnapshotTools(ctx: ToolContext): void {
  registerTool(ctx, { name: "liberate_backup_list", description: "List backups in the snapshot store with their source OS and whether release RPMs were captured.", module: "snapshots", riskLevel: "read-only", inputSchema: z.object({}), annotations: { readOnlyHint: true } }, async () =>
    withRun(ctx, "liberate_backup_list", false, async ({ run, reporter }) => {
      const store = new SnapshotStore(run.storeRoot, reporter);
      const backups = await store.list();
      await store.printListing();
      return { store: store.root, backups, latest: backups.find((b) => b.isLatest)?.id ?? null };
    }),
  );

  registerTool(ctx, { name: "liberate_backup_create", description: "Capture a new backup of everything the conversion alters. Omit elements to capture all kinds. Moderate risk.", module: "snapshots", riskLevel: "moderate", inputSchema: z.object({ elements: z.array(z.enum(ELEMENT_KINDS)).optional().describe("Element kinds to include (default: all)"), confirmed, dry_run: dryRun }), annotations: { destructiveHint: false } }, async (input) => {
    const gate = ctx.safetyGate.check({ toolName: "liberate_backup_create", toolRiskLevel: "moderate", targetHost: ctx.targetHost, description: `Create a backup of ${input.elements?.join(", ") ?? "all elements"}`, confirmed: input.confirmed, dryRun: input.dry_run });
    if (gate) return gate;
    return withRun(ctx, "liberate_backup_create", input.dry_run, async ({ run, reporter }) => {
      const result = await new SnapshotBuilder(run, new SnapshotStore(run.storeRoot, reporter)).build(inclusionOf(input.elements));
      return { ...result };
    });
  });

  registerTool(ctx, { name: "liberate_backup_export", description: "Export a backup to a portable .tar.gz archive.", module: "snapshots", riskLevel: "low", inputSchema: z.object({ name: backupName, output: z.string().min(1).optional().describe("Archive path (default: <prefix>-<id>.tar.gz in the working directory)"), dry_run: dryRun }), annotations: { destructiveHint: false } }, async (input) =>
    withRun(ctx, "liberate_backup_export", input.dry_run, async ({ run, reporter }) => {
      const archive = await new PortabilityCodec(run, new SnapshotStore(run.storeRoot, reporter)).export(input.name, input.output);
      return { archive };
    }),
  );

  registerTool(ctx, { name: "liberate_backup_import", description: "Import a backup archive into the snapshot store and make it the latest backup. Moderate risk.", module: "snapshots", riskLevel: "moderate", inputSchema: z.object({ archive: z.string().min(1).describe("Path to a .tar.gz produced by liberate_backup_export"), confirmed, dry_run: dryRun }), annotations: { destructiveHint: false } }, async (input) => {
    const gate = ctx.safetyGate.check({ toolName: "liberate_backup_import", toolRiskLevel: "moderate", targetHost: ctx.targetHost, description: `Import backup archive ${input.archive}`, confirmed: input.confirmed, dryRun: input.dry_run });
    if (gate) return gate;
    return withRun(ctx, "liberate_backup_import", input.dry_run, async ({ run, reporter }) => {
      const ref = await new PortabilityCodec(run, new SnapshotStore(run.storeRoot, reporter)).import(input.archive);
      return { id: ref.id, path: ref.path };
    });
  });

  registerTool(ctx, { name: "liberate_backup_prune", description: "Delete the oldest backups, keeping the newest N. High risk.", module: "snapshots", riskLevel: "high", inputSchema: z.object({ keep: z.number().int().min(1).optional().describe("Backups to keep (default: backup.retention)"), confirmed, dry_run: dryRun }), annotations: { destructiveHint: true } }, async (input) => {
    const keep = input.keep ?? ctx.runtime.config.backup.retention;
    const gate = ctx.safetyGate.check({ toolName: "liberate_backup_prune", toolRiskLevel: "high", targetHost: ctx.targetHost, description: `Delete all but the newest ${keep} backup(s)`, confirmed: input.confirmed, dryRun: input.dry_run });
    if (gate) return gate;
    return withRun(ctx, "liberate_backup_prune", input.dry_run, async ({ run, reporter }) => {
      const store = new SnapshotStore(run.storeRoot, reporter);
      if (run.dryRun) {
        const candidates = await store.pruneCandidates(keep);
        for (const id of candidates) reporter.print(`[DRY-RUN] Would remove old backup: ${id}`);
        return { keep, would_remove: candidates };
      }
      return { keep, removed: await store.prune(keep) };
    });
  });

  registerTool(ctx, { name: "liberate_backup_delete", description: "Delete one backup. If it was the latest, latest moves to the newest remaining backup. High risk.", module: "snapshots", riskLevel: "high", inputSchema: z.object({ name: z.string().min(1).describe("Backup id or 'latest'"), confirmed, dry_run: dryRun }), annotations: { destructiveHint: true } }, async (input) => {
    const gate = ctx.safetyGate.check({ toolName: "liberate_backup_delete", toolRiskLevel: "high", targetHost: ctx.targetHost, description: `Delete backup ${input.name}`, confirmed: input.confirmed, dryRun: input.dry_run });
    if (gate) return gate;
    return withRun(ctx, "liberate_backup_delete", input.dry_run, async ({ run, reporter }) => {
      const store = new SnapshotStore(run.storeRoot, reporter);
      if (run.dryRun) {
        const ref = await store.resolve(input.name);
        reporter.print(`[DRY-RUN] Would delete backup ${ref.id}`);
        return { would_delete: ref.id };
      }
      const ref = await store.delete(input.name);
      return { deleted: ref.id };
    });
  });
}
