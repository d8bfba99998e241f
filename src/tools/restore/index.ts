import { z } from "zod";
import type { ToolContext } from "../context.js";
import { registerTool, withRun } from "../helpers.js";
import { SnapshotStore } from "../../backup/store.js";
import { RestoreOrchestrator } from "../../restore/orchestrator.js";
import { FIXED_POLICIES, stepsFor } from "../../restore/policy.js";

export function registerRestoreTools(ctx: ToolContext): void {
  registerTool(ctx, {
    name: "liberate_restore",
    description: "Restore the host from a backup under a restore policy. 'full' reverses a conversion: vendor release packages are removed, the original release packages, repositories, configuration and deleted files come back, and the liberated marker is cleared. Critical risk.",
    module: "restore",
    riskLevel: "critical",
    inputSchema: z.object({
      name: z.string().min(1).optional().default("latest").describe("Backup id (YYYYMMDD_HHMMSS) or 'latest'"),
      policy: z.enum(FIXED_POLICIES).optional().default("full").describe("Which restore steps to run"),
      confirmed: z.boolean().optional().default(false).describe("Pass true to confirm execution after reviewing a confirmation_required response."),
      dry_run: z.boolean().optional().default(false).describe("Preview without executing: prints each step that would run."),
    }),
    annotations: { destructiveHint: true },
  }, async (input) => {
    const gate = ctx.safetyGate.check({
      toolName: "liberate_restore",
      toolRiskLevel: "critical",
      targetHost: ctx.targetHost,
      description: `Restore backup ${input.name} with policy ${input.policy}: ${stepsFor(input.policy).join(", ")}`,
      confirmed: input.confirmed,
      dryRun: input.dry_run,
      warnings: input.policy === "full" || input.policy === "minimal" ? ["Removes the target vendor's release packages; a reboot is recommended afterwards"] : [],
    });
    if (gate) return gate;
    return withRun(ctx, "liberate_restore", input.dry_run, async ({ run, reporter }) => {
      const outcome = await new RestoreOrchestrator(run, new SnapshotStore(run.storeRoot, reporter)).restore(input.name, input.policy);
      return {
        snapshot: outcome.snapshotId,
        policy: outcome.policy,
        status: outcome.status,
        steps: outcome.steps,
        warnings: outcome.warnings,
      };
    });
  });
}
