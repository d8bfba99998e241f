import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import { detectIdentity, parseOsRelease, resolveIdentity } from "../../../src/distro/detector.js";
import { SystemPaths } from "../../../src/system/paths.js";
import { LiberateErrorCode } from "../../../src/shared/errors.js";

describe("parseOsRelease", () => {
  it("parses quoted and unquoted values", () => {
    const parsed = parseOsRelease('NAME="Rocky Linux"\nID=rocky\nVERSION_ID="9.3"\n# comment\n');
    expect(parsed).toEqual({ NAME: "Rocky Linux", ID: "rocky", VERSION_ID: "9.3" });
  });
});

describe("resolveIdentity", () => {
  it("resolves a supported distribution", () => {
    expect(resolveIdentity({ ID: "rocky", VERSION_ID: "9.3" }, null)).toEqual({
      id: "rocky",
      name: "Rocky Linux",
      version: "9.3",
      versionMajor: "9",
    });
  });

  it("names CentOS Stream from centos-release", () => {
    const identity = resolveIdentity({ ID: "centos", VERSION_ID: "8" }, "CentOS Stream release 8\n");
    expect(identity.name).toBe("CentOS Stream");
  });

  it("accepts oracle as an alias of ol", () => {
    expect(resolveIdentity({ ID: "oracle", VERSION_ID: "8.9" }, null).name).toBe("Oracle Linux");
  });

  it("rejects unsupported distributions", () => {
    expect(() => resolveIdentity({ ID: "ubuntu", VERSION_ID: "22.04" }, null)).toThrow(
      expect.objectContaining({ code: LiberateErrorCode.UNSUPPORTED_DISTRO }),
    );
  });

  it("rejects unsupported major versions", () => {
    expect(() => resolveIdentity({ ID: "rocky", VERSION_ID: "10.0" }, null)).toThrow(
      expect.objectContaining({ code: LiberateErrorCode.UNSUPPORTED_VERSION }),
    );
  });
});

describe("detectIdentity", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "liberate-detect-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("reads os-release under the root", async () => {
    await fs.mkdir(path.join(root, "etc"));
    await fs.writeFile(path.join(root, "etc", "os-release"), 'ID="almalinux"\nVERSION_ID="8.9"\n', "utf-8");
    const identity = await detectIdentity(new SystemPaths(root, "/etc/sysconfig/liberated"));
    expect(identity).toEqual({ id: "almalinux", name: "AlmaLinux", version: "8.9", versionMajor: "8" });
  });

  it("fails with IDENTITY_UNKNOWN when os-release is missing", async () => {
    await expect(detectIdentity(new SystemPaths(root, "/etc/sysconfig/liberated"))).rejects.toMatchObject({
      code: LiberateErrorCode.IDENTITY_UNKNOWN,
    });
  });
});
