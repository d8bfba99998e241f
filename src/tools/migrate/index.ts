import { z } from "zod";
import type { ToolContext } from "../context.js";
import { registerTool, withRun } from "../helpers.js";
import { SnapshotStore } from "../../backup/store.js";
import { Migrator } from "../../migrate/migrator.js";
import { CONVERSION_TARGETS, isMajorVersion } from "../../distro/release-table.js";

const flag = (description: string) => z.boolean().optional().default(false).describe(description);

export function registerMigrateTools(ctx: ToolContext): void {
  registerTool(ctx, {
    name: "liberate_migrate",
    description: "Convert this Enterprise Linux host to the SUSE Liberty target: full backup first, then swap the release packages, write the liberated marker and verify. Critical risk.",
    module: "migrate",
    riskLevel: "critical",
    inputSchema: z.object({
      force: flag("Run even if the host is already marked as liberated"),
      no_backup: flag("Skip the automatic backup before converting"),
      install_logos: flag("Also install the target vendor's logos package"),
      reinstall_packages: flag("Reinstall every package from the target repositories afterwards"),
      report: flag("Write a migration report under /var/log"),
      confirmed: flag("Pass true to confirm execution after reviewing a confirmation_required response."),
      dry_run: flag("Preview without executing: prints each conversion step that would run."),
    }),
    annotations: { destructiveHint: true },
  }, async (input) => {
    const identity = ctx.runtime.identity;
    const warnings = input.no_backup ? ["No backup will be taken; a restore will not be possible"] : [];
    const gate = ctx.safetyGate.check({
      toolName: "liberate_migrate",
      toolRiskLevel: "critical",
      targetHost: ctx.targetHost,
      description: identity && isMajorVersion(identity.versionMajor)
        ? `Convert ${identity.name} ${identity.version} to ${CONVERSION_TARGETS[identity.versionMajor].productName}`
        : "Convert this host to SUSE Liberty",
      confirmed: input.confirmed,
      dryRun: input.dry_run,
      warnings,
    });
    if (gate) return gate;
    return withRun(ctx, "liberate_migrate", input.dry_run, async ({ run, reporter }) => {
      const outcome = await new Migrator(run, new SnapshotStore(run.storeRoot, reporter)).run({
        force: input.force,
        noBackup: input.no_backup,
        installLogos: input.install_logos,
        reinstallPackages: input.reinstall_packages,
        report: input.report,
      });
      return {
        status: outcome.status,
        backup: outcome.backup ? { id: outcome.backup.id, path: outcome.backup.path, elements: outcome.backup.elements } : null,
        verification: outcome.verification,
        pruned: outcome.pruned,
        report: outcome.reportPath,
        warnings: outcome.warnings,
      };
    });
  });
}
