import path from "node:path";
import fs from "node:fs/promises";
import { Migrator } from "../../../src/migrate/migrator.js";
import { LiberateErrorCode } from "../../../src/shared/errors.js";
import type { Sandbox } from "../../helpers/sandbox.js";
import { createSandbox, makeContext, makeStore, readSystemFile, removeSandbox, writeSystemFile } from "../../helpers/sandbox.js";
import { ScriptedConfirmer } from "../../helpers/scripted-confirmer.js";

describe("Migrator", () => {
  let sandbox: Sandbox;

  beforeEach(async () => {
    sandbox = await createSandbox();
    await writeSystemFile(sandbox, "/etc/os-release", 'ID="rocky"\nVERSION_ID="9.3"\n');
    await writeSystemFile(sandbox, "/usr/share/redhat-release/EULA", "eula\n");
    sandbox.executor
      .installed("rocky-release", "sll-release")
      .on(["dnf", "install"], async () => {
        await writeSystemFile(sandbox, "/etc/os-release", 'ID="sll"\nPRETTY_NAME="SUSE Liberty Linux 9"\nVERSION_ID="9"\n');
        return {};
      });
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it("swaps the release package and writes the marker", async () => {
    const migrator = new Migrator(makeContext(sandbox), makeStore(sandbox));

    const outcome = await migrator.run({ noBackup: true });

    expect(outcome.status).toBe("completed");
    expect(outcome.backup).toBeNull();
    expect(outcome.verification).toEqual({ passed: true, problems: [], releasePackage: "sll-release" });
    expect(sandbox.executor.commands()).toEqual([
      "dnf repolist",
      "rpm -q rocky-release",
      "rpm -e --nodeps rocky-release",
      "dnf install -y sll-release",
      "rpm -q sll-release",
    ]);
    expect(await readSystemFile(sandbox, "/etc/sysconfig/liberated")).toBe(
      [
        "# SUSE Liberation marker file",
        "# Created by liberate v1.3.0",
        'LIBERATED="true"',
        'LIBERATED_FROM="Rocky Linux 9.3"',
        'LIBERATED_DATE="2026-03-14 09:30:05"',
        'LIBERATED_REINSTALLED="false"',
        "",
      ].join("\n"),
    );
    await expect(fs.stat(path.join(sandbox.root, "usr", "share", "redhat-release"))).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("takes a full backup first and writes a report", async () => {
    const outcome = await new Migrator(makeContext(sandbox), makeStore(sandbox)).run({ report: true });

    expect(outcome.status).toBe("completed");
    expect(outcome.backup?.written).toBe(true);
    expect(outcome.backup?.path).toBe(path.join(sandbox.storeRoot, "20260314_093005"));
    expect(await makeStore(sandbox).latestId()).toBe("20260314_093005");
    expect(outcome.reportPath).toBe(path.join(sandbox.root, "var", "log", "liberate_report_20260314_093005.txt"));

    const report = await fs.readFile(path.join(sandbox.root, "var", "log", "liberate_report_20260314_093005.txt"), "utf-8");
    expect(report).toContain(`-- Backup Location --\n${path.join(sandbox.storeRoot, "20260314_093005")}\n`);
    expect(report).toContain("-- Current System --\nName: SUSE Liberty Linux 9\nID: sll\nVersion: 9\n");
  });

  it("queries but changes nothing in dry-run mode", async () => {
    const outcome = await new Migrator(makeContext(sandbox, { dryRun: true }), makeStore(sandbox)).run({ noBackup: true, report: true });

    expect(outcome.status).toBe("dry-run");
    expect(sandbox.executor.commands()).toEqual(["dnf repolist", "rpm -q rocky-release"]);
    expect(sandbox.reporter.messages("print")).toContain("[DRY-RUN] Would generate migration report");
    await expect(fs.stat(path.join(sandbox.root, "etc", "sysconfig", "liberated"))).rejects.toMatchObject({ code: "ENOENT" });
    expect(await readSystemFile(sandbox, "/usr/share/redhat-release/EULA")).toBe("eula\n");
  });

  it("stops on an already liberated host unless forced", async () => {
    await writeSystemFile(sandbox, "/etc/sysconfig/liberated", 'LIBERATED="true"\nLIBERATED_DATE="2026-01-02 03:04:05"\n');

    const outcome = await new Migrator(makeContext(sandbox), makeStore(sandbox)).run({ noBackup: true });

    expect(outcome.status).toBe("already-liberated");
    expect(sandbox.executor.commands()).toEqual([]);
    expect(sandbox.reporter.messages("warn")[0]).toBe("System already liberated on 2026-01-02 03:04:05");

    const forced = await new Migrator(makeContext(sandbox), makeStore(sandbox)).run({ noBackup: true, force: true });
    expect(forced.status).toBe("completed");
  });

  it("stops when the first question is declined", async () => {
    const ctx = makeContext(sandbox, { confirmer: new ScriptedConfirmer([false]) });

    const outcome = await new Migrator(ctx, makeStore(sandbox)).run();

    expect(outcome.status).toBe("cancelled");
    expect(sandbox.executor.commands()).toEqual(["dnf repolist"]);
  });

  it("fails when the target release package cannot be installed", async () => {
    sandbox.executor.on(["dnf", "install"], { exitCode: 1, stderr: "No match for argument: sll-release" });

    await expect(new Migrator(makeContext(sandbox), makeStore(sandbox)).run({ noBackup: true })).rejects.toMatchObject({
      code: LiberateErrorCode.COMMAND_FAILED,
      message: "Failed to install sll-release: No match for argument: sll-release",
    });
  });

  it("treats missing package tools as a failed prerequisite", async () => {
    sandbox.executor.available.clear();

    await expect(new Migrator(makeContext(sandbox), makeStore(sandbox)).run({ noBackup: true })).rejects.toMatchObject({
      code: LiberateErrorCode.PREREQUISITES_FAILED,
    });
    expect(sandbox.reporter.messages("error")).toEqual(["Missing required commands: rpm dnf or yum"]);
  });

  it("only warns when the repositories cannot be reached", async () => {
    sandbox.executor.on(["dnf", "repolist"], { exitCode: 1, stderr: "Cannot download repomd.xml" });

    const outcome = await new Migrator(makeContext(sandbox), makeStore(sandbox)).run({ noBackup: true });

    expect(outcome.warnings).toEqual([
      {
        category: "prerequisite",
        source: "repositories",
        message: "Repository check failed, ensure SUSE repos are configured: Cannot download repomd.xml",
      },
    ]);
  });
});
