import path from "node:path";
import { ConfigBackend } from "../../../../src/backup/elements/config.js";
import type { Sandbox } from "../../../helpers/sandbox.js";
import { createSandbox, makeContext, readSystemFile, removeSandbox, writeSystemFile } from "../../../helpers/sandbox.js";

describe("ConfigBackend", () => {
  let sandbox: Sandbox;
  let snapshotDir: string;

  beforeEach(async () => {
    sandbox = await createSandbox();
    snapshotDir = path.join(sandbox.storeRoot, "20260314_093005");
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it("captures dnf.conf and the protected-package directory", async () => {
    await writeSystemFile(sandbox, "/etc/dnf/dnf.conf", "[main]\ngpgcheck=1\n");
    await writeSystemFile(sandbox, "/etc/dnf/protected.d/redhat-release.conf", "redhat-release\n");

    const backend = new ConfigBackend(makeContext(sandbox));
    expect(await backend.capture(snapshotDir)).toEqual({ count: 2, warnings: [] });
    expect(await backend.inspect(snapshotDir)).toBe(2);
  });

  it("writes the captured files back over changed ones", async () => {
    await writeSystemFile(sandbox, "/etc/dnf/dnf.conf", "[main]\ngpgcheck=1\n");
    await writeSystemFile(sandbox, "/etc/dnf/protected.d/redhat-release.conf", "redhat-release\n");
    const backend = new ConfigBackend(makeContext(sandbox));
    await backend.capture(snapshotDir);
    await writeSystemFile(sandbox, "/etc/dnf/dnf.conf", "[main]\ngpgcheck=0\n");

    const result = await backend.replay(snapshotDir);

    expect(result).toEqual({ count: 2, warnings: [], notes: ["Restored /etc/dnf/dnf.conf", "Restored /etc/dnf/protected.d"] });
    expect(await readSystemFile(sandbox, "/etc/dnf/dnf.conf")).toBe("[main]\ngpgcheck=1\n");
    expect(await readSystemFile(sandbox, "/etc/dnf/protected.d/redhat-release.conf")).toBe("redhat-release\n");
  });

  it("warns when there is nothing to restore", async () => {
    const backend = new ConfigBackend(makeContext(sandbox));
    await backend.capture(snapshotDir);
    expect(await backend.replay(snapshotDir)).toEqual({ count: 0, warnings: ["No package manager configuration in snapshot"], notes: [] });
  });
});
