import type { z } from "zod";
import type { ToolContext } from "./context.js";
import type { ErrorCategory, ErrorResponse, SuccessResponse, ToolResponse } from "../types/response.js";
import type { ToolMetadata } from "../types/tool.js";
import type { RunContext } from "../context.js";
import { runContext } from "../bootstrap.js";
import { AutoConfirmer } from "../confirm/confirmer.js";
import { LogReporter } from "../reporting/reporter.js";
import { LiberateErrorCode, describeError, isLiberateError } from "../shared/errors.js";
import { logger } from "../logger.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, targetHost: string, durationMs: number, data: Record<string, unknown>, extra?: Partial<SuccessResponse>): SuccessResponse {
  return { status: "success", tool, target_host: targetHost, duration_ms: durationMs, data, ...extra };
}

export function error(tool: string, targetHost: string, durationMs: number, opts: { code: string; category: ErrorCategory; message: string; remediation?: string[]; output?: string[] }): ErrorResponse {
  return {
    status: "error", tool, target_host: targetHost, duration_ms: durationMs,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    remediation: opts.remediation ?? [],
    output: opts.output,
  };
}

// ── Error Categorization ───────────────────────────────────────────

const ERROR_CATEGORIES: Record<LiberateErrorCode, { category: ErrorCategory; remediation: string[] }> = {
  [LiberateErrorCode.SNAPSHOT_NOT_FOUND]: { category: "not_found", remediation: ["Run liberate_backup_list to see available backups"] },
  [LiberateErrorCode.LATEST_UNDEFINED]: { category: "not_found", remediation: [
    "Create a backup with liberate_backup_create",
    "Or import an exported archive with liberate_backup_import",
  ] },
  [LiberateErrorCode.INVALID_SNAPSHOT]: { category: "validation", remediation: ["Check metadata.json in the backup directory", "Pick another backup from liberate_backup_list"] },
  [LiberateErrorCode.ARCHIVE_NOT_FOUND]: { category: "not_found", remediation: ["Check the archive path; it must be readable on this host"] },
  [LiberateErrorCode.ARCHIVE_INVALID]: { category: "validation", remediation: ["Archives must come from liberate_backup_export (one backup directory per archive)"] },
  [LiberateErrorCode.STORE_UNAVAILABLE]: { category: "resource", remediation: ["Check that backup.directory exists and is writable", "Check free space with df"] },
  [LiberateErrorCode.IDENTITY_UNKNOWN]: { category: "validation", remediation: ["Check that /etc/os-release exists and is readable"] },
  [LiberateErrorCode.UNSUPPORTED_DISTRO]: { category: "validation", remediation: ["Supported: Rocky, AlmaLinux, Oracle Linux, CentOS, RHEL, EuroLinux"] },
  [LiberateErrorCode.UNSUPPORTED_VERSION]: { category: "validation", remediation: ["Supported major versions: 7, 8, 9"] },
  [LiberateErrorCode.PREREQUISITES_FAILED]: { category: "resource", remediation: ["Review the output for the failed checks", "Free disk space or install the missing commands, then retry"] },
  [LiberateErrorCode.COMMAND_FAILED]: { category: "state", remediation: ["Review the command error above", "Try with dry_run: true to preview the operation"] },
};

/** Error response for anything a tool handler threw. */
export function errorFromException(tool: string, targetHost: string, durationMs: number, err: unknown, output?: string[]): ErrorResponse {
  if (isLiberateError(err)) {
    const { category, remediation } = ERROR_CATEGORIES[err.code];
    return error(tool, targetHost, durationMs, { code: err.code, category, message: err.message, remediation, output });
  }
  logger.error({ tool, error: describeError(err) }, "Unexpected tool failure");
  return error(tool, targetHost, durationMs, {
    code: "INTERNAL_ERROR", category: "state", message: describeError(err),
    remediation: ["Check server logs for details"], output,
  });
}

// ── Per-call run context ───────────────────────────────────────────

export interface ToolRun {
  readonly run: RunContext;
  readonly reporter: LogReporter;
  readonly startedAt: number;
}

/** Non-interactive run: every engine question is answered yes, output is buffered for the response. */
export function startRun(ctx: ToolContext, dryRun: boolean): ToolRun {
  const reporter = new LogReporter();
  return { run: runContext(ctx.runtime, { reporter, confirmer: new AutoConfirmer(), dryRun }), reporter, startedAt: performance.now() };
}

export function elapsed(toolRun: ToolRun): number {
  return Math.round(performance.now() - toolRun.startedAt);
}

/**
 * Run one engine operation for a tool: the body's data becomes a success response,
 * a thrown error an error response; both carry the lines the engine printed.
 */
export async function withRun(
  ctx: ToolContext,
  tool: string,
  dryRun: boolean,
  body: (toolRun: ToolRun) => Promise<Record<string, unknown>>,
): Promise<ToolResponse> {
  const toolRun = startRun(ctx, dryRun);
  try {
    const data = await body(toolRun);
    return success(tool, ctx.targetHost, elapsed(toolRun), data, {
      output: toolRun.reporter.lines(),
      ...(dryRun ? { dry_run: true } : {}),
    });
  } catch (err) {
    return errorFromException(tool, ctx.targetHost, elapsed(toolRun), err, toolRun.reporter.lines());
  }
}

// ── Tool Registration Helper ───────────────────────────────────────

/**
 * Register a tool whose handler receives arguments already parsed by its schema.
 * Invalid arguments become a validation error response; thrown errors become error responses.
 */
export function registerTool<S extends z.ZodObject<z.ZodRawShape>>(
  ctx: ToolContext,
  metadata: Omit<ToolMetadata, "inputSchema"> & { inputSchema: S },
  handler: (input: z.infer<S>) => Promise<ToolResponse>,
): void {
  ctx.registry.register({
    metadata,
    execute: async (args) => {
      const start = performance.now();
      const parsed = metadata.inputSchema.safeParse(args);
      if (!parsed.success) {
        return error(metadata.name, ctx.targetHost, 0, {
          code: "INVALID_ARGUMENTS", category: "validation",
          message: parsed.error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; "),
        });
      }
      try {
        return await handler(parsed.data);
      } catch (err) {
        return errorFromException(metadata.name, ctx.targetHost, Math.round(performance.now() - start), err);
      }
    },
  });
}
