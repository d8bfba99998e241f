import path from "node:path";
import fs from "node:fs/promises";
import { RestoreOrchestrator } from "../../../src/restore/orchestrator.js";
import { LiberateErrorCode } from "../../../src/shared/errors.js";
import { STEP_DESCRIPTIONS } from "../../../src/restore/policy.js";
import type { RestoreStep } from "../../../src/types/restore.js";
import { RESTORE_STEP_ORDER } from "../../../src/types/restore.js";
import type { Sandbox } from "../../helpers/sandbox.js";
import { createSandbox, makeContext, makeStore, readSystemFile, removeSandbox, seedSnapshot, writeSystemFile } from "../../helpers/sandbox.js";
import { ScriptedConfirmer } from "../../helpers/scripted-confirmer.js";

const ID = "20260314_093005";
const RELEASE_RPM = "rocky-release-9.3-1.el9.noarch.rpm";
const ALL = ["packages", "repos", "release_files", "config", "release_rpms", "deleted_files"];

const SUBSETS: RestoreStep[][] = Array.from({ length: 2 ** RESTORE_STEP_ORDER.length }, (_, mask) =>
  RESTORE_STEP_ORDER.filter((_, i) => (mask >> i) & 1),
);

const PAYLOAD: Record<string, string> = {
  "repos/rocky.repo": "[baseos]\n",
  [`rpms/${RELEASE_RPM}`]: "payload",
  "release-packages.list": "rocky-release\n",
  "dnf-yum-config/dnf.conf": "[main]\ngpgcheck=1\n",
  "deleted-files/usr/share/redhat-release/EULA": "eula\n",
  "deleted-files.manifest": "/usr/share/redhat-release/EULA\n",
};

describe("RestoreOrchestrator", () => {
  let sandbox: Sandbox;
  let snapshotDir: string;

  beforeEach(async () => {
    sandbox = await createSandbox();
    snapshotDir = await seedSnapshot(sandbox, ID, { elements: ALL, files: PAYLOAD });
    await makeStore(sandbox).setLatest(ID);
    // A converted host: vendor repo, vendor release package and the marker.
    await writeSystemFile(sandbox, "/etc/yum.repos.d/SLL-9.repo", "[sll]\n");
    await writeSystemFile(sandbox, "/etc/dnf/dnf.conf", "[main]\n");
    await writeSystemFile(sandbox, "/etc/sysconfig/liberated", 'LIBERATED="true"\n');
    sandbox.executor.installed("sll-release");
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it("runs a full restore in the fixed order", async () => {
    const confirmer = new ScriptedConfirmer();
    const ctx = makeContext(sandbox, { confirmer });

    const outcome = await new RestoreOrchestrator(ctx, makeStore(sandbox)).restore("latest", "full");

    expect(confirmer.prompts).toEqual(["Restore system to Rocky Linux 9.3?"]);
    expect(outcome.status).toBe("completed");
    expect(outcome.warnings).toEqual([]);
    expect(outcome.steps.map((s) => [s.step, s.status, s.count])).toEqual([
      ["remove-vendor-packages", "done", 1],
      ["repos", "done", 1],
      ["release-packages", "done", 1],
      ["config", "done", 1],
      ["deleted-files", "done", 1],
      ["remove-marker", "done", 1],
    ]);
    expect(sandbox.executor.commands()).toEqual([
      "rpm -q sll-release",
      "rpm -e --nodeps sll-release",
      "rpm -q sll-logos",
      "rpm -q sles_es-release",
      "rpm -q sles_es-logos",
      "rpm -q sles_es-release-server",
      `rpm -Uvh --force --nodeps ${path.join(snapshotDir, "rpms", RELEASE_RPM)}`,
      "dnf clean all",
    ]);
    expect(await fs.readdir(path.join(sandbox.root, "etc", "yum.repos.d"))).toEqual(["rocky.repo"]);
    expect(await readSystemFile(sandbox, "/etc/dnf/dnf.conf")).toBe("[main]\ngpgcheck=1\n");
    expect(await readSystemFile(sandbox, "/usr/share/redhat-release/EULA")).toBe("eula\n");
    await expect(fs.stat(path.join(sandbox.root, "etc", "sysconfig", "liberated"))).rejects.toMatchObject({ code: "ENOENT" });
    expect(sandbox.reporter.messages("success")).toEqual(["System restore completed!"]);
    expect(sandbox.reporter.messages("print")).toContain("A system reboot is recommended to complete the restore.");
  });

  it("changes nothing when the confirmation is declined", async () => {
    const ctx = makeContext(sandbox, { confirmer: new ScriptedConfirmer([false]) });

    const outcome = await new RestoreOrchestrator(ctx, makeStore(sandbox)).restore(ID, "full");

    expect(outcome).toEqual({ snapshotId: ID, policy: "full", status: "cancelled", steps: [], warnings: [] });
    expect(sandbox.executor.commands()).toEqual([]);
    expect(await readSystemFile(sandbox, "/etc/sysconfig/liberated")).toBe('LIBERATED="true"\n');
  });

  it("only announces steps in dry-run mode", async () => {
    const confirmer = new ScriptedConfirmer();
    const ctx = makeContext(sandbox, { dryRun: true, confirmer });

    const outcome = await new RestoreOrchestrator(ctx, makeStore(sandbox)).restore("latest", "minimal");

    expect(confirmer.prompts).toEqual([]);
    expect(outcome.status).toBe("dry-run");
    expect(outcome.steps.map((s) => s.status)).toEqual(["dry-run", "dry-run", "dry-run", "dry-run"]);
    expect(sandbox.executor.commands()).toEqual([]);
    expect(sandbox.reporter.messages("print")).toEqual(
      expect.arrayContaining([
        "[DRY-RUN] Step 1/4: Remove target vendor release packages",
        "[DRY-RUN] Step 4/4: Remove liberated marker",
        `[DRY-RUN] Would restore from backup ${ID}`,
      ]),
    );
    expect(await readSystemFile(sandbox, "/etc/sysconfig/liberated")).toBe('LIBERATED="true"\n');
  });

  it("warns about an element the snapshot never captured", async () => {
    await seedSnapshot(sandbox, "20260315_080000", { elements: ["repos"], files: { "repos/rocky.repo": "[baseos]\n" } });

    const outcome = await new RestoreOrchestrator(makeContext(sandbox), makeStore(sandbox)).restore("20260315_080000", "config-only");

    expect(outcome.steps).toEqual([{ step: "config", status: "skipped", count: 0, notes: [] }]);
    expect(outcome.warnings).toEqual([
      {
        category: "degraded-replay",
        source: "config",
        message: "Nothing to restore: package manager configuration not captured in backup 20260315_080000",
      },
    ]);
    expect(await readSystemFile(sandbox, "/etc/dnf/dnf.conf")).toBe("[main]\n");
  });

  it("leaves the same repository set when repos-only runs twice", async () => {
    const orchestrator = new RestoreOrchestrator(makeContext(sandbox), makeStore(sandbox));

    const first = await orchestrator.restore(ID, "repos-only");
    const second = await orchestrator.restore(ID, "repos-only");

    expect(first.steps[0].count).toBe(1);
    expect(second.steps[0]).toEqual({ step: "repos", status: "done", count: 1, notes: [] });
    expect(await fs.readdir(path.join(sandbox.root, "etc", "yum.repos.d"))).toEqual(["rocky.repo"]);
    expect(sandbox.reporter.messages("print")).toContain("Repository files restored. To complete rollback:");
    expect(sandbox.executor.commands()).toEqual([]);
  });

  it("asks about each step the snapshot and system can satisfy", async () => {
    const confirmer = new ScriptedConfirmer([false, true, false, false, false, true, true]);
    const ctx = makeContext(sandbox, { confirmer });

    const outcome = await new RestoreOrchestrator(ctx, makeStore(sandbox)).restore(ID, "interactive-select");

    expect(confirmer.prompts).toEqual([
      "Remove SUSE packages (sll-release)?",
      "Restore 1 repository file(s)?",
      "Install 1 release package(s) from backup?",
      "Restore 1 package manager configuration file(s)?",
      "Restore 1 deleted file(s)?",
      "Remove the liberated marker?",
      "Proceed with interactive-select restore?",
    ]);
    expect(outcome.steps.map((s) => s.step)).toEqual(["repos", "remove-marker"]);
    expect(sandbox.executor.commands().filter((c) => !c.startsWith("rpm -q "))).toEqual([]);
  });

  it.each(SUBSETS.map((subset) => [subset.join(",") || "(none)", subset] as const))(
    "runs the selected steps %s in the fixed order",
    async (_label, subset) => {
      const markerFile = path.join(sandbox.root, "etc", "sysconfig", "liberated");
      const markerSeen: boolean[] = [];
      const recordMarker = async (): Promise<{ exitCode: number }> => {
        markerSeen.push(await fs.access(markerFile).then(() => true, () => false));
        return { exitCode: 0 };
      };
      sandbox.executor.on(["rpm", "-e"], recordMarker).on(["rpm", "-Uvh"], recordMarker);
      // One answer per offered step in the fixed order, then the final confirmation.
      const confirmer = new ScriptedConfirmer([...RESTORE_STEP_ORDER.map((step) => subset.includes(step)), true]);

      const outcome = await new RestoreOrchestrator(makeContext(sandbox, { confirmer }), makeStore(sandbox)).restore(ID, "interactive-select");

      expect(outcome.steps.map((s) => s.step)).toEqual(subset);
      expect(sandbox.reporter.messages("info").filter((m) => m.startsWith("Step "))).toEqual(
        subset.map((step, i) => `Step ${i + 1}/${subset.length}: ${STEP_DESCRIPTIONS[step]}`),
      );
      const commands = sandbox.executor.commands();
      const removal = commands.indexOf("rpm -e --nodeps sll-release");
      const install = commands.findIndex((c) => c.startsWith("rpm -Uvh") || c.includes(" install "));
      expect(removal >= 0).toBe(subset.includes("remove-vendor-packages"));
      expect(install >= 0).toBe(subset.includes("release-packages"));
      if (removal >= 0 && install >= 0) expect(removal).toBeLessThan(install);
      expect(markerSeen.every(Boolean)).toBe(true);
      await expect(fs.access(markerFile).then(() => true, () => false)).resolves.toBe(!subset.includes("remove-marker"));
    },
  );

  it("offers a repository install when only the package names were captured", async () => {
    await fs.rm(path.join(snapshotDir, "rpms"), { recursive: true });
    const confirmer = new ScriptedConfirmer([], false);

    const outcome = await new RestoreOrchestrator(makeContext(sandbox, { confirmer }), makeStore(sandbox)).restore(ID, "interactive-select");

    expect(confirmer.prompts).toContain("Install release packages from repositories (rocky-release)?");
    expect(outcome.status).toBe("nothing-selected");
  });

  it("fails before any step when the snapshot does not exist", async () => {
    await expect(new RestoreOrchestrator(makeContext(sandbox), makeStore(sandbox)).restore("20990101_000000", "full")).rejects.toMatchObject({
      code: LiberateErrorCode.SNAPSHOT_NOT_FOUND,
    });
    expect(sandbox.executor.commands()).toEqual([]);
  });
});
