// Startup shared by the MCP server and the CLI: config, executor, identity, package manager.
import path from "node:path";
import type { LiberateConfig } from "./types/config.js";
import type { HostInfo, PackageTool, SystemIdentity } from "./types/distro.js";
import type { Executor } from "./execution/executor.js";
import type { PackageManager } from "./distro/package-manager.js";
import type { Confirmer } from "./confirm/confirmer.js";
import type { Reporter } from "./reporting/reporter.js";
import type { RunContext } from "./context.js";
import { createRunContext } from "./context.js";
import { loadConfig } from "./config/loader.js";
import { LocalExecutor } from "./execution/executor.js";
import { RpmPackageManager } from "./distro/package-manager.js";
import { detectHost, detectIdentity } from "./distro/detector.js";
import { CONVERSION_TARGETS, isMajorVersion } from "./distro/release-table.js";
import { SystemPaths } from "./system/paths.js";
import { isLiberateError } from "./shared/errors.js";
import type { LiberateError } from "./shared/errors.js";
import { logger } from "./logger.js";

export interface Runtime {
  readonly config: LiberateConfig;
  readonly configPath: string;
  readonly firstRun: boolean;
  readonly executor: Executor;
  readonly packages: PackageManager;
  readonly host: HostInfo;
  /** null when the host is not a supported source distribution; see identityError. */
  readonly identity: SystemIdentity | null;
  readonly identityError: LiberateError | null;
}

export interface BootstrapOptions {
  readonly configPath?: string;
  readonly backupDir?: string;
  readonly root?: string;
  readonly executor?: Executor;
}

/** EL7 has no dnf; its conversion always goes through yum. */
export function packageToolFor(configured: "auto" | PackageTool, identity: SystemIdentity | null): "auto" | PackageTool {
  if (configured !== "auto" || identity === null || !isMajorVersion(identity.versionMajor)) return configured;
  return CONVERSION_TARGETS[identity.versionMajor].forceYum ? "yum" : "auto";
}

export async function bootstrap(options: BootstrapOptions = {}): Promise<Runtime> {
  const loaded = loadConfig(options.configPath ?? process.env.LIBERATE_CONFIG);
  const config: LiberateConfig = {
    ...loaded.config,
    backup: { ...loaded.config.backup, directory: options.backupDir ? path.resolve(options.backupDir) : loaded.config.backup.directory },
    system: { ...loaded.config.system, root: options.root ? path.resolve(options.root) : loaded.config.system.root },
  };
  logger.info({ configPath: loaded.configPath, firstRun: loaded.firstRun }, "Configuration loaded");

  let identity: SystemIdentity | null = null;
  let identityError: LiberateError | null = null;
  try {
    identity = await detectIdentity(new SystemPaths(config.system.root, config.system.marker_path));
  } catch (err) {
    if (!isLiberateError(err)) throw err;
    identityError = err;
    logger.warn({ code: err.code, error: err.message }, "System identity unavailable");
  }

  const executor = options.executor ?? new LocalExecutor();
  const packages = new RpmPackageManager(
    executor,
    packageToolFor(config.package_manager.tool, identity),
    config.errors.command_timeout_ceiling,
  );

  return {
    config,
    configPath: loaded.configPath,
    firstRun: loaded.firstRun,
    executor,
    packages,
    host: detectHost(),
    identity,
    identityError,
  };
}

/** A RunContext for one operation on top of the shared runtime. */
export function runContext(runtime: Runtime, run: { reporter: Reporter; confirmer: Confirmer; dryRun?: boolean }): RunContext {
  return createRunContext({
    config: runtime.config,
    identity: runtime.identity,
    host: runtime.host,
    packages: runtime.packages,
    executor: runtime.executor,
    reporter: run.reporter,
    confirmer: run.confirmer,
    dryRun: run.dryRun,
  });
}
