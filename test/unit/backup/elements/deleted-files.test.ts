import path from "node:path";
import fs from "node:fs/promises";
import { DeletedFilesBackend } from "../../../../src/backup/elements/deleted-files.js";
import type { Sandbox } from "../../../helpers/sandbox.js";
import { createSandbox, makeContext, readSystemFile, removeSandbox, writeSystemFile } from "../../../helpers/sandbox.js";

describe("DeletedFilesBackend", () => {
  let sandbox: Sandbox;
  let snapshotDir: string;

  beforeEach(async () => {
    sandbox = await createSandbox();
    snapshotDir = path.join(sandbox.storeRoot, "20260314_093005");
    await writeSystemFile(sandbox, "/usr/share/redhat-release/EULA", "eula\n");
    await writeSystemFile(sandbox, "/usr/lib/os-release", 'ID="rocky"\n');
    await fs.mkdir(path.join(sandbox.root, "etc"), { recursive: true });
    await fs.symlink("../usr/lib/os-release", path.join(sandbox.root, "etc", "os-release"));
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it("captures the targets, the file behind os-release and a manifest", async () => {
    const result = await new DeletedFilesBackend(makeContext(sandbox)).capture(snapshotDir);

    expect(result).toEqual({ count: 3, warnings: [] });
    expect(await fs.readFile(path.join(snapshotDir, "deleted-files.manifest"), "utf-8")).toBe(
      "/etc/os-release\n/usr/lib/os-release\n/usr/share/redhat-release/EULA\n",
    );
    expect(await fs.readlink(path.join(snapshotDir, "deleted-files", "etc", "os-release"))).toBe("../usr/lib/os-release");
  });

  it("restores exactly the manifest entries", async () => {
    const backend = new DeletedFilesBackend(makeContext(sandbox));
    await backend.capture(snapshotDir);
    await fs.rm(path.join(sandbox.root, "usr"), { recursive: true });
    await fs.rm(path.join(sandbox.root, "etc", "os-release"));

    const result = await backend.replay(snapshotDir);

    expect(result).toEqual({
      count: 3,
      warnings: [],
      notes: ["Restored: /etc/os-release", "Restored: /usr/lib/os-release", "Restored: /usr/share/redhat-release/EULA"],
    });
    expect(await fs.readlink(path.join(sandbox.root, "etc", "os-release"))).toBe("../usr/lib/os-release");
    expect(await readSystemFile(sandbox, "/usr/share/redhat-release/EULA")).toBe("eula\n");
  });

  it("skips manifest entries that climb out of the root", async () => {
    const backend = new DeletedFilesBackend(makeContext(sandbox));
    await backend.capture(snapshotDir);
    await fs.appendFile(path.join(snapshotDir, "deleted-files.manifest"), "/../outside\n/etc/missing-release\n", "utf-8");

    const result = await backend.replay(snapshotDir);

    expect(result.count).toBe(3);
    expect(result.warnings).toEqual([
      "Skipped manifest entry outside the restore root: /../outside",
      "Listed in manifest but missing from backup: /etc/missing-release",
    ]);
  });

  it("reports a snapshot without the payload directory", async () => {
    await fs.mkdir(snapshotDir, { recursive: true });
    expect(await new DeletedFilesBackend(makeContext(sandbox)).replay(snapshotDir)).toEqual({
      count: 0,
      warnings: ["No deleted-files directory in backup"],
    });
  });

  describe("without a manifest", () => {
    const NO_MANIFEST = "No deleted-files.manifest in backup; restored the whole payload over the root";

    async function seedPayload(): Promise<void> {
      const payload = path.join(snapshotDir, "deleted-files");
      await fs.mkdir(path.join(payload, "etc"), { recursive: true });
      await fs.mkdir(path.join(payload, "usr", "share", "redhat-release"), { recursive: true });
      await fs.writeFile(path.join(payload, "etc", "rocky-release"), "Rocky Linux release 9.3\n", "utf-8");
      await fs.symlink("rocky-release", path.join(payload, "etc", "redhat-release"));
      await fs.writeFile(path.join(payload, "usr", "share", "redhat-release", "EULA"), "saved eula\n", "utf-8");
    }

    it("lays every captured file over the root", async () => {
      const backend = new DeletedFilesBackend(makeContext(sandbox));
      await backend.capture(snapshotDir);
      await fs.rm(path.join(snapshotDir, "deleted-files.manifest"));
      await fs.rm(path.join(sandbox.root, "usr"), { recursive: true });
      await fs.rm(path.join(sandbox.root, "etc", "os-release"));

      const result = await backend.replay(snapshotDir);

      expect(result).toEqual({
        count: 3,
        warnings: [NO_MANIFEST],
        notes: ["Restored: /etc/os-release", "Restored: /usr/lib/os-release", "Restored: /usr/share/redhat-release/EULA"],
      });
      expect(await fs.readlink(path.join(sandbox.root, "etc", "os-release"))).toBe("../usr/lib/os-release");
      expect(await readSystemFile(sandbox, "/usr/lib/os-release")).toBe('ID="rocky"\n');
    });

    it("replaces a live regular file with a captured nested link", async () => {
      await seedPayload();
      await writeSystemFile(sandbox, "/etc/redhat-release", "SUSE Liberty Linux release 9\n");

      const result = await new DeletedFilesBackend(makeContext(sandbox)).replay(snapshotDir);

      expect(result).toEqual({
        count: 3,
        warnings: [NO_MANIFEST],
        notes: ["Restored: /etc/redhat-release", "Restored: /etc/rocky-release", "Restored: /usr/share/redhat-release/EULA"],
      });
      expect(await fs.readlink(path.join(sandbox.root, "etc", "redhat-release"))).toBe("rocky-release");
      expect(await readSystemFile(sandbox, "/etc/rocky-release")).toBe("Rocky Linux release 9.3\n");
      expect(await readSystemFile(sandbox, "/usr/share/redhat-release/EULA")).toBe("saved eula\n");
    });

    it("keeps going after an entry fails and counts only what was restored", async () => {
      await seedPayload();
      await writeSystemFile(sandbox, "/etc/rocky-release/keep", "in the way\n");

      const result = await new DeletedFilesBackend(makeContext(sandbox)).replay(snapshotDir);

      expect(result.count).toBe(2);
      expect(result.notes).toEqual(["Restored: /etc/redhat-release", "Restored: /usr/share/redhat-release/EULA"]);
      expect(result.warnings).toHaveLength(2);
      expect(result.warnings[0]).toBe(NO_MANIFEST);
      expect(result.warnings[1]).toMatch(/^Failed to restore: \/etc\/rocky-release \(/);
      expect(await readSystemFile(sandbox, "/usr/share/redhat-release/EULA")).toBe("saved eula\n");
    });
  });
});
