import type { Sandbox } from "../../helpers/sandbox.js";
import { ROCKY_9, createSandbox, makeStore, removeSandbox, seedSnapshot, writeSystemFile } from "../../helpers/sandbox.js";
import { callTool, makeToolContext, successData } from "../../helpers/tool-context.js";

describe("liberate_status", () => {
  let sandbox: Sandbox;

  beforeEach(async () => {
    sandbox = await createSandbox();
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it("reports an unconverted host with no backups", async () => {
    const data = successData(await callTool(makeToolContext(sandbox), "liberate_status"));

    expect(data).toEqual({
      identity: ROCKY_9,
      identity_error: null,
      host: { hostname: "test-host", kernel: "5.14.0-test" },
      liberated: false,
      marker: null,
      store: sandbox.storeRoot,
      latest_backup: null,
      backup_count: 0,
      config_path: "/etc/liberate/config.yaml",
      first_run: false,
    });
  });

  it("reports the marker and the latest backup", async () => {
    await writeSystemFile(sandbox, "/etc/sysconfig/liberated", 'LIBERATED="true"\nLIBERATED_FROM="Rocky Linux 9.3"\nLIBERATED_DATE="2026-03-14 09:30:05"\n');
    await seedSnapshot(sandbox, "20260314_093005");
    await makeStore(sandbox).setLatest("20260314_093005");

    const data = successData(await callTool(makeToolContext(sandbox), "liberate_status"));

    expect(data).toMatchObject({
      liberated: true,
      marker: { liberated: true, from: "Rocky Linux 9.3", date: "2026-03-14 09:30:05", reinstalled: false },
      latest_backup: "20260314_093005",
      backup_count: 1,
    });
  });
});
