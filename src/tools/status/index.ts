import { z } from "zod";
import type { ToolContext } from "../context.js";
import { registerTool, withRun } from "../helpers.js";
import { SnapshotStore } from "../../backup/store.js";
import { readMarker } from "../../system/marker.js";

export function registerStatusTools(ctx: ToolContext): void {
  registerTool(ctx, {
    name: "liberate_status",
    description: "Show the detected distribution, whether the host is liberated, the latest backup and the active configuration file.",
    module: "status",
    riskLevel: "read-only",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true },
  }, async () =>
    withRun(ctx, "liberate_status", false, async ({ run, reporter }) => {
      const { runtime } = ctx;
      const marker = await readMarker(run.paths);
      const store = new SnapshotStore(run.storeRoot, reporter);
      return {
        identity: runtime.identity,
        identity_error: runtime.identityError ? { code: runtime.identityError.code, message: runtime.identityError.message } : null,
        host: runtime.host,
        liberated: marker?.liberated ?? false,
        marker,
        store: store.root,
        latest_backup: await store.latestId(),
        backup_count: (await store.ids()).length,
        config_path: runtime.configPath,
        first_run: runtime.firstRun,
      };
    }),
  );
}
