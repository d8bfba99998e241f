import { z } from "zod";
import { ToolRegistry } from "../../../src/tools/registry.js";
import type { Sandbox } from "../../helpers/sandbox.js";
import { createSandbox, removeSandbox } from "../../helpers/sandbox.js";
import { makeToolContext } from "../../helpers/tool-context.js";

describe("ToolRegistry", () => {
  let sandbox: Sandbox;

  beforeEach(async () => {
    sandbox = await createSandbox();
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it("holds every tool grouped by module", () => {
    const { registry } = makeToolContext(sandbox);
    expect(registry.size).toBe(9);
    expect(registry.byModule()).toEqual({
      status: ["liberate_status"],
      snapshots: [
        "liberate_backup_list",
        "liberate_backup_create",
        "liberate_backup_export",
        "liberate_backup_import",
        "liberate_backup_prune",
        "liberate_backup_delete",
      ],
      restore: ["liberate_restore"],
      migrate: ["liberate_migrate"],
    });
  });

  it("refuses a second tool with the same name", () => {
    const registry = new ToolRegistry();
    const tool = {
      metadata: { name: "liberate_status", description: "", module: "status", riskLevel: "read-only" as const, inputSchema: z.object({}) },
      execute: async () => ({ status: "success" as const, tool: "liberate_status", target_host: "test-host", duration_ms: 0, data: {} }),
    };
    registry.register(tool);
    expect(() => registry.register(tool)).toThrow("Tool liberate_status is already registered");
  });
});
