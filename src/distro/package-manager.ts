// Package-manager capability: rpm queries plus dnf/yum transactions.
// The engine decides what to run and in which order; this adapter only turns intent into argv.
// Every operation returns a PackageOpResult instead of throwing, so callers can degrade to warnings.
import type { Command } from "../types/command.js";
import type { PackageTool } from "../types/distro.js";
import type { DurationCategory } from "../types/risk.js";
import type { Executor } from "../execution/executor.js";
import { execBash, resolveTimeout } from "../execution/executor.js";
import { logger } from "../logger.js";

export type PackageOpResult =
  | { readonly ok: true; readonly output: string }
  | { readonly ok: false; readonly error: string };

export interface InstallFilesOptions {
  /** --force: replace files owned by other packages (transient coexistence with vendor packages). */
  readonly force?: boolean;
  /** --nodeps: skip dependency checks. */
  readonly nodeps?: boolean;
}

export interface PackageManager {
  listInstalled(): Promise<PackageOpResult>;
  listInstalledNames(): Promise<string[]>;
  isInstalled(name: string): Promise<boolean>;
  packageInfo(name: string): Promise<PackageOpResult>;
  /** File name the installed package would have in a cache (name-version-release.arch.rpm). */
  packageFileName(name: string): Promise<string | null>;
  download(names: readonly string[], destDir: string): Promise<PackageOpResult>;
  /** Repository URL of a package, when repoquery can resolve one. */
  locate(name: string): Promise<string | null>;
  fetch(url: string, destFile: string): Promise<PackageOpResult>;
  installFiles(files: readonly string[], options?: InstallFilesOptions): Promise<PackageOpResult>;
  install(names: readonly string[], options?: { allowErasing?: boolean }): Promise<PackageOpResult>;
  erase(name: string, options?: { nodeps?: boolean }): Promise<PackageOpResult>;
  upgrade(names: readonly string[]): Promise<PackageOpResult>;
  reinstall(names: readonly string[], options?: { obsoletes?: boolean }): Promise<PackageOpResult>;
  reinstallAll(excludes: readonly string[]): Promise<PackageOpResult>;
  cleanCache(): Promise<PackageOpResult>;
  repolist(): Promise<PackageOpResult>;
  commandAvailable(command: string): Promise<boolean>;
}

// ── Command builders ────────────────────────────────────────────────

export const rpmCommands = {
  queryAll(): Command {
    return { argv: ["rpm", "-qa", "--queryformat", "%{NAME}-%{VERSION}-%{RELEASE}.%{ARCH}\\n"] };
  },
  queryAllNames(): Command {
    return { argv: ["rpm", "-qa", "--queryformat", "%{NAME}\\n"] };
  },
  query(name: string): Command {
    return { argv: ["rpm", "-q", name] };
  },
  info(name: string): Command {
    return { argv: ["rpm", "-qi", name] };
  },
  fileName(name: string): Command {
    return { argv: ["rpm", "-q", "--queryformat", "%{NAME}-%{VERSION}-%{RELEASE}.%{ARCH}.rpm\\n", name] };
  },
  installFiles(files: readonly string[], options: InstallFilesOptions): Command {
    const argv = ["rpm", "-Uvh"];
    if (options.force) argv.push("--force");
    if (options.nodeps) argv.push("--nodeps");
    return { argv: [...argv, ...files] };
  },
  erase(name: string, nodeps: boolean): Command {
    return { argv: nodeps ? ["rpm", "-e", "--nodeps", name] : ["rpm", "-e", name] };
  },
};

export const frontEndCommands = {
  install(tool: PackageTool, names: readonly string[], allowErasing: boolean): Command {
    const argv = [tool, "install", "-y"];
    if (allowErasing && tool === "dnf") argv.push("--allowerasing");
    return { argv: [...argv, ...names] };
  },
  download(tool: PackageTool | "yumdownloader", names: readonly string[], destDir: string): Command {
    switch (tool) {
      case "dnf": return { argv: ["dnf", "download", `--destdir=${destDir}`, ...names] };
      case "yumdownloader": return { argv: ["yumdownloader", `--destdir=${destDir}`, ...names] };
      case "yum": return { argv: ["yum", "install", "--downloadonly", `--downloaddir=${destDir}`, "-y", ...names] };
    }
  },
  upgrade(tool: PackageTool, names: readonly string[]): Command {
    return { argv: [tool, "-y", "upgrade", ...names] };
  },
  reinstall(tool: PackageTool, names: readonly string[], obsoletes: boolean): Command {
    return { argv: [tool, "-y", "reinstall", ...names, ...(obsoletes ? ["--obsoletes"] : [])] };
  },
  reinstallAll(tool: PackageTool, excludes: readonly string[]): Command {
    return { argv: [tool, ...excludes.flatMap((e) => ["-x", e]), "reinstall", "*", "-y"] };
  },
  cleanAll(tool: PackageTool): Command {
    return { argv: [tool, "clean", "all"] };
  },
  repolist(tool: PackageTool): Command {
    return { argv: [tool, "repolist"] };
  },
  locate(name: string): Command {
    return { argv: ["repoquery", "--location", name] };
  },
  fetch(url: string, destFile: string): Command {
    return { argv: ["curl", "-sSfL", "-o", destFile, url] };
  },
};

// ── rpm + dnf/yum adapter ───────────────────────────────────────────

export class RpmPackageManager implements PackageManager {
  private resolvedTool: PackageTool | null;

  constructor(
    private readonly executor: Executor,
    tool: "auto" | PackageTool = "auto",
    private readonly timeoutCeilingSeconds = 0,
  ) {
    this.resolvedTool = tool === "auto" ? null : tool;
  }

  async listInstalled(): Promise<PackageOpResult> {
    return this.run(rpmCommands.queryAll(), "normal");
  }

  async listInstalledNames(): Promise<string[]> {
    const r = await this.run(rpmCommands.queryAllNames(), "normal");
    return r.ok ? splitLines(r.output) : [];
  }

  async isInstalled(name: string): Promise<boolean> {
    return (await this.run(rpmCommands.query(name), "instant")).ok;
  }

  async packageInfo(name: string): Promise<PackageOpResult> {
    return this.run(rpmCommands.info(name), "quick");
  }

  async packageFileName(name: string): Promise<string | null> {
    const r = await this.run(rpmCommands.fileName(name), "quick");
    return r.ok ? (splitLines(r.output)[0] ?? null) : null;
  }

  async download(names: readonly string[], destDir: string): Promise<PackageOpResult> {
    let downloader: PackageTool | "yumdownloader";
    if (await this.commandAvailable("dnf")) downloader = "dnf";
    else if (await this.commandAvailable("yumdownloader")) downloader = "yumdownloader";
    else if (await this.commandAvailable("yum")) downloader = "yum";
    else return { ok: false, error: "no dnf, yumdownloader or yum available" };
    return this.run(frontEndCommands.download(downloader, names, destDir), "slow");
  }

  async locate(name: string): Promise<string | null> {
    if (!(await this.commandAvailable("repoquery"))) return null;
    const r = await this.run(frontEndCommands.locate(name), "normal");
    return r.ok ? (splitLines(r.output)[0] ?? null) : null;
  }

  async fetch(url: string, destFile: string): Promise<PackageOpResult> {
    return this.run(frontEndCommands.fetch(url, destFile), "slow");
  }

  async installFiles(files: readonly string[], options: InstallFilesOptions = {}): Promise<PackageOpResult> {
    return this.run(rpmCommands.installFiles(files, options), "slow");
  }

  async install(names: readonly string[], options: { allowErasing?: boolean } = {}): Promise<PackageOpResult> {
    return this.run(frontEndCommands.install(await this.tool(), names, options.allowErasing ?? false), "slow");
  }

  async erase(name: string, options: { nodeps?: boolean } = {}): Promise<PackageOpResult> {
    return this.run(rpmCommands.erase(name, options.nodeps ?? false), "normal");
  }

  async upgrade(names: readonly string[]): Promise<PackageOpResult> {
    return this.run(frontEndCommands.upgrade(await this.tool(), names), "slow");
  }

  async reinstall(names: readonly string[], options: { obsoletes?: boolean } = {}): Promise<PackageOpResult> {
    return this.run(frontEndCommands.reinstall(await this.tool(), names, options.obsoletes ?? false), "long_running");
  }

  async reinstallAll(excludes: readonly string[]): Promise<PackageOpResult> {
    return this.run(frontEndCommands.reinstallAll(await this.tool(), excludes), "long_running");
  }

  async cleanCache(): Promise<PackageOpResult> {
    return this.run(frontEndCommands.cleanAll(await this.tool()), "normal");
  }

  async repolist(): Promise<PackageOpResult> {
    return this.run(frontEndCommands.repolist(await this.tool()), "normal");
  }

  async commandAvailable(command: string): Promise<boolean> {
    if (!/^[A-Za-z0-9._-]+$/.test(command)) return false;
    const r = await execBash(this.executor, `command -v ${command}`, resolveTimeout("instant", this.timeoutCeilingSeconds));
    return r.exitCode === 0;
  }

  /** dnf when present, yum otherwise; resolved once. */
  async tool(): Promise<PackageTool> {
    if (this.resolvedTool === null) {
      this.resolvedTool = (await this.commandAvailable("dnf")) ? "dnf" : "yum";
      logger.debug({ tool: this.resolvedTool }, "Package manager front end resolved");
    }
    return this.resolvedTool;
  }

  private async run(command: Command, duration: DurationCategory): Promise<PackageOpResult> {
    const r = await this.executor.execute(command, resolveTimeout(duration, this.timeoutCeilingSeconds));
    logger.debug({ argv: command.argv, exitCode: r.exitCode, durationMs: r.durationMs }, "Package command finished");
    if (r.exitCode === 0) return { ok: true, output: r.stdout };
    return { ok: false, error: r.stderr.trim() || `${command.argv[0]} exited with ${r.exitCode}` };
  }
}

function splitLines(output: string): string[] {
  return output.split("\n").map((l) => l.trim()).filter(Boolean);
}
