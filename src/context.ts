import type { HostInfo, SystemIdentity, TargetVendor } from "./types/distro.js";
import type { LiberateConfig } from "./types/config.js";
import type { Confirmer } from "./confirm/confirmer.js";
import type { Reporter } from "./reporting/reporter.js";
import type { PackageManager } from "./distro/package-manager.js";
import type { Executor } from "./execution/executor.js";
import { SystemPaths } from "./system/paths.js";
import { TARGET_VENDOR } from "./distro/release-table.js";
import { LiberateError, LiberateErrorCode } from "./shared/errors.js";

export const ENGINE_VERSION = "1.3.0";

/**
 * Everything one run needs, fixed before the first step executes.
 * Components receive it explicitly; nothing reads flags or detected state from globals.
 */
export interface RunContext {
  readonly identity: SystemIdentity | null;
  readonly host: HostInfo;
  readonly paths: SystemPaths;
  readonly storeRoot: string;
  readonly archivePrefix: string;
  readonly retention: number;
  readonly minFreeSpaceMb: number;
  readonly dryRun: boolean;
  readonly confirmer: Confirmer;
  readonly reporter: Reporter;
  readonly packages: PackageManager;
  readonly executor: Executor;
  readonly timeoutCeilingSeconds: number;
  readonly vendor: TargetVendor;
  readonly engineVersion: string;
  readonly now: () => Date;
}

export interface RunContextOptions {
  config: LiberateConfig;
  identity: SystemIdentity | null;
  host: HostInfo;
  confirmer: Confirmer;
  reporter: Reporter;
  packages: PackageManager;
  executor: Executor;
  dryRun?: boolean;
  now?: () => Date;
}

export function createRunContext(options: RunContextOptions): RunContext {
  const { config } = options;
  return Object.freeze({
    identity: options.identity,
    host: options.host,
    paths: new SystemPaths(config.system.root, config.system.marker_path),
    storeRoot: config.backup.directory,
    archivePrefix: config.backup.archive_prefix,
    retention: config.backup.retention,
    minFreeSpaceMb: config.migration.min_free_space_mb,
    dryRun: options.dryRun ?? false,
    confirmer: options.confirmer,
    reporter: options.reporter,
    packages: options.packages,
    executor: options.executor,
    timeoutCeilingSeconds: config.errors.command_timeout_ceiling,
    vendor: TARGET_VENDOR,
    engineVersion: ENGINE_VERSION,
    now: options.now ?? (() => new Date()),
  });
}

export function requireIdentity(ctx: RunContext): SystemIdentity {
  if (!ctx.identity) {
    throw new LiberateError(LiberateErrorCode.IDENTITY_UNKNOWN, "System identity has not been detected for this run");
  }
  return ctx.identity;
}

/**
 * Run a mutating action, or only announce it in dry-run mode.
 * Returns the action's result, or null when it was skipped.
 */
export async function perform<T>(ctx: RunContext, description: string, action: () => Promise<T>): Promise<T | null> {
  if (ctx.dryRun) {
    ctx.reporter.print(`[DRY-RUN] ${description}`);
    return null;
  }
  ctx.reporter.info(description);
  return action();
}
