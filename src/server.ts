#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { hostname } from "node:os";

import { logger } from "./logger.js";
import { bootstrap } from "./bootstrap.js";
import { ENGINE_VERSION } from "./context.js";
import { SafetyGate } from "./safety/gate.js";
import { ToolRegistry } from "./tools/registry.js";
import type { ToolContext } from "./tools/context.js";
import { describeError } from "./shared/errors.js";

// Tool module registrations
import { registerStatusTools } from "./tools/status/index.js";
import { registerSnapshotTools } from "./tools/snapshots/index.js";
import { registerRestoreTools } from "./tools/restore/index.js";
import { registerMigrateTools } from "./tools/migrate/index.js";

async function main(): Promise<void> {
  logger.info("Starting liberate-mcp server");

  // ── Phase 1: Load config, detect the host ─────────────────────
  const runtime = await bootstrap();
  if (runtime.identity) {
    logger.info({ distro: runtime.identity.id, version: runtime.identity.version }, "Source distribution detected");
  }

  // ── Phase 2: Create safety gate ───────────────────────────────
  const safetyGate = new SafetyGate(runtime.config.safety);

  // ── Phase 3: Create tool registry and context ─────────────────
  const registry = new ToolRegistry();
  const ctx: ToolContext = { runtime, safetyGate, registry, targetHost: hostname() };

  // ── Phase 4: Register all tool modules ────────────────────────
  registerStatusTools(ctx);
  registerSnapshotTools(ctx);
  registerRestoreTools(ctx);
  registerMigrateTools(ctx);

  logger.info({ toolCount: registry.size, modules: registry.byModule() }, "All tool modules registered");

  // ── Phase 5: Create MCP server ────────────────────────────────
  const server = new McpServer({
    name: "liberate-mcp",
    version: ENGINE_VERSION,
  });

  // ── Phase 6: Register tools on MCP server ─────────────────────
  for (const [name, tool] of registry.entries()) {
    const meta = tool.metadata;
    server.registerTool(
      name,
      {
        title: name,
        description: meta.description,
        inputSchema: meta.inputSchema.shape,
        annotations: {
          readOnlyHint: meta.annotations?.readOnlyHint ?? meta.riskLevel === "read-only",
          destructiveHint: meta.annotations?.destructiveHint ?? false,
          idempotentHint: meta.annotations?.idempotentHint ?? false,
          openWorldHint: meta.annotations?.openWorldHint ?? false,
        },
      },
      async (args: Record<string, unknown>) => {
        try {
          const response = await tool.execute(args);
          return {
            content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }],
          };
        } catch (err) {
          const message = describeError(err);
          logger.error({ tool: name, error: message }, "Tool execution error");
          return {
            content: [{
              type: "text" as const,
              text: JSON.stringify({
                status: "error",
                tool: name,
                target_host: ctx.targetHost,
                duration_ms: 0,
                error_code: "INTERNAL_ERROR",
                error_category: "state",
                message,
                remediation: ["Check server logs for details"],
              }),
            }],
          };
        }
      },
    );
  }

  // ── Phase 7: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: registry.size, host: ctx.targetHost }, "liberate-mcp server running on stdio");
}

main().catch((err) => {
  logger.fatal({ error: describeError(err) }, "Fatal startup error");
  process.exit(1);
});
