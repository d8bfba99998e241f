#!/usr/bin/env node
/**
 * liberate command-line interface
 *
 * Usage:
 *   liberate [global options] <command> [options]
 *   liberate migrate --report
 *   liberate restore latest --policy select
 */

import { Command } from "commander";
import type { Runtime } from "./bootstrap.js";
import { bootstrap, runContext } from "./bootstrap.js";
import type { RunContext } from "./context.js";
import { ENGINE_VERSION } from "./context.js";
import type { Confirmer } from "./confirm/confirmer.js";
import { AutoConfirmer, PromptConfirmer } from "./confirm/confirmer.js";
import { ConsoleReporter } from "./reporting/reporter.js";
import { SnapshotStore } from "./backup/store.js";
import { SnapshotBuilder } from "./backup/builder.js";
import { PortabilityCodec } from "./backup/codec.js";
import { RestoreOrchestrator } from "./restore/orchestrator.js";
import { parsePolicy } from "./restore/policy.js";
import { Migrator } from "./migrate/migrator.js";
import { readMarker } from "./system/marker.js";
import { describeError, isLiberateError } from "./shared/errors.js";
import { logger } from "./logger.js";

interface GlobalOptions {
  config?: string;
  backupDir?: string;
  root?: string;
  dryRun?: boolean;
  interactive?: boolean;
  verbose?: boolean;
}

interface Session {
  readonly runtime: Runtime;
  readonly run: RunContext;
  readonly store: SnapshotStore;
  readonly reporter: ConsoleReporter;
}

const program: Command = new Command();

program
  .name("liberate")
  .description("Convert Enterprise Linux hosts to SUSE Liberty, with backup and restore")
  .version(ENGINE_VERSION)
  .option("-c, --config <file>", "Configuration file (default: $LIBERATE_CONFIG or /etc/liberate/config.yaml)")
  .option("--backup-dir <dir>", "Snapshot store directory")
  .option("--root <dir>", "System root that every system path is resolved under")
  .option("-n, --dry-run", "Show what would be done without changing anything")
  .option("-i, --interactive", "Ask before each step")
  .option("-v, --verbose", "Show informational messages");

// ============================================================================
// SESSION
// ============================================================================

/**
 * Bootstrap, run one command body and map its failure to the exit code.
 * Commands that change the host need root unless they only preview.
 */
async function session(
  options: { needsRoot: boolean; prompt?: boolean },
  body: (s: Session) => Promise<void>,
): Promise<void> {
  const globals = program.opts<GlobalOptions>();
  const reporter = new ConsoleReporter(globals.verbose ?? false);
  const dryRun = globals.dryRun ?? false;

  if (options.needsRoot && !dryRun && process.getuid?.() !== 0) {
    reporter.error("This command must be run as root");
    process.exitCode = 1;
    return;
  }

  const confirmer: Confirmer = globals.interactive || options.prompt ? new PromptConfirmer() : new AutoConfirmer();
  try {
    const runtime = await bootstrap({ configPath: globals.config, backupDir: globals.backupDir, root: globals.root });
    const run = runContext(runtime, { reporter, confirmer, dryRun });
    if (dryRun) reporter.heading("=== DRY-RUN MODE: no changes will be made ===");
    await body({ runtime, run, store: new SnapshotStore(run.storeRoot, reporter), reporter });
  } catch (err) {
    if (!isLiberateError(err)) throw err;
    reporter.error(err.message);
    process.exitCode = 1;
  } finally {
    confirmer.close();
  }
}

// ============================================================================
// MIGRATION
// ============================================================================

program
  .command("migrate")
  .description("Back up the host, then convert it to SUSE Liberty")
  .option("-f, --force", "Run even if the host is already liberated")
  .option("--no-backup", "Skip the automatic backup")
  .option("--install-logos", "Install the target vendor's logos package")
  .option("--reinstall-packages", "Reinstall every package from the target repositories")
  .option("--report", "Write a migration report under /var/log")
  .action(async (options: { force?: boolean; backup: boolean; installLogos?: boolean; reinstallPackages?: boolean; report?: boolean }) => {
    await session({ needsRoot: true }, async ({ run, store }) => {
      await new Migrator(run, store).run({
        force: options.force,
        noBackup: !options.backup,
        installLogos: options.installLogos,
        reinstallPackages: options.reinstallPackages,
        report: options.report,
      });
    });
  });

// ============================================================================
// BACKUP COMMANDS
// ============================================================================

program
  .command("backup")
  .description("Create a backup of everything the conversion alters")
  .option("-s, --select", "Choose which elements to include")
  .action(async (options: { select?: boolean }) => {
    await session({ needsRoot: true, prompt: options.select }, async ({ run, store }) => {
      const builder = new SnapshotBuilder(run, store);
      await builder.build(options.select ? await builder.selectInclusion() : "all");
    });
  });

program
  .command("list")
  .description("List available backups")
  .action(async () => {
    await session({ needsRoot: false }, async ({ store }) => {
      await store.printListing();
    });
  });

program
  .command("export")
  .description("Export a backup to a portable .tar.gz archive")
  .argument("<name>", "Backup id or 'latest'")
  .option("-o, --output <file>", "Archive path")
  .action(async (name: string, options: { output?: string }) => {
    await session({ needsRoot: false }, async ({ run, store }) => {
      await new PortabilityCodec(run, store).export(name, options.output);
    });
  });

program
  .command("import")
  .description("Import a backup archive and make it the latest backup")
  .argument("<file>", "Archive produced by export")
  .action(async (file: string) => {
    await session({ needsRoot: true }, async ({ run, store }) => {
      await new PortabilityCodec(run, store).import(file);
    });
  });

program
  .command("prune")
  .description("Delete the oldest backups")
  .option("-k, --keep <n>", "Backups to keep (default: backup.retention)", (value: string) => {
    const keep = Number.parseInt(value, 10);
    if (!Number.isInteger(keep) || keep < 1) throw new Error(`--keep must be a positive integer, got ${value}`);
    return keep;
  })
  .action(async (options: { keep?: number }) => {
    await session({ needsRoot: true }, async ({ run, store, reporter }) => {
      const keep = options.keep ?? run.retention;
      if (run.dryRun) {
        for (const id of await store.pruneCandidates(keep)) reporter.print(`[DRY-RUN] Would remove old backup: ${id}`);
        return;
      }
      const removed = await store.prune(keep);
      reporter.success(removed.length > 0 ? `Removed ${removed.length} old backup(s)` : `Nothing to prune (keeping ${keep})`);
    });
  });

program
  .command("delete")
  .description("Delete one backup")
  .argument("<name>", "Backup id or 'latest'")
  .action(async (name: string) => {
    await session({ needsRoot: true }, async ({ run, store, reporter }) => {
      if (run.dryRun) {
        reporter.print(`[DRY-RUN] Would delete backup ${(await store.resolve(name)).id}`);
        return;
      }
      if (!(await run.confirmer.confirm(`Delete backup ${name}?`))) return;
      const ref = await store.delete(name);
      reporter.success(`Deleted backup ${ref.id}`);
    });
  });

// ============================================================================
// RESTORE
// ============================================================================

program
  .command("restore")
  .description("Restore the host from a backup")
  .argument("[name]", "Backup id or 'latest'", "latest")
  .option("-p, --policy <policy>", "full, minimal, repos, release, files, config or select", "full")
  .action(async (name: string, options: { policy: string }) => {
    const policy = parsePolicy(options.policy);
    if (!policy) {
      program.error(`Unknown restore policy: ${options.policy}`);
    }
    await session({ needsRoot: true, prompt: policy === "interactive-select" }, async ({ run, store }) => {
      await new RestoreOrchestrator(run, store).restore(name, policy);
    });
  });

// ============================================================================
// STATUS
// ============================================================================

program
  .command("status")
  .description("Show the detected distribution, liberation state and latest backup")
  .action(async () => {
    await session({ needsRoot: false }, async ({ runtime, run, store, reporter }) => {
      const marker = await readMarker(run.paths);
      if (runtime.identity) reporter.print(`System:        ${runtime.identity.name} ${runtime.identity.version}`);
      else reporter.print(`System:        unsupported (${runtime.identityError?.message ?? "unknown"})`);
      reporter.print(`Liberated:     ${marker?.liberated ? `yes (from ${marker.from ?? "unknown"} on ${marker.date ?? "unknown"})` : "no"}`);
      reporter.print(`Latest backup: ${(await store.latestId()) ?? "none"}`);
      reporter.print(`Backup store:  ${store.root}`);
      reporter.print(`Config:        ${runtime.configPath}`);
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.fatal({ error: describeError(err) }, "Unexpected failure");
  process.stderr.write(`ERROR: ${describeError(err)}\n`);
  process.exit(1);
});
