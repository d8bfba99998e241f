import { RpmPackageManager, frontEndCommands, rpmCommands } from "../../../src/distro/package-manager.js";
import { FakeExecutor } from "../../helpers/fake-executor.js";

describe("command builders", () => {
  it("adds --allowerasing for dnf only", () => {
    expect(frontEndCommands.install("dnf", ["rocky-release"], true).argv).toEqual(["dnf", "install", "-y", "--allowerasing", "rocky-release"]);
    expect(frontEndCommands.install("yum", ["rocky-release"], true).argv).toEqual(["yum", "install", "-y", "rocky-release"]);
  });

  it("excludes packages from a full reinstall", () => {
    expect(frontEndCommands.reinstallAll("yum", ["salt-minion", "venv-salt-minion"]).argv).toEqual([
      "yum", "-x", "salt-minion", "-x", "venv-salt-minion", "reinstall", "*", "-y",
    ]);
  });

  it("installs payloads with the requested rpm flags", () => {
    expect(rpmCommands.installFiles(["/b/a.rpm"], { force: true, nodeps: true }).argv).toEqual(["rpm", "-Uvh", "--force", "--nodeps", "/b/a.rpm"]);
    expect(rpmCommands.erase("sll-release", true).argv).toEqual(["rpm", "-e", "--nodeps", "sll-release"]);
  });
});

describe("RpmPackageManager", () => {
  it("resolves yum when dnf is not available", async () => {
    const executor = new FakeExecutor();
    executor.available.delete("dnf");
    const packages = new RpmPackageManager(executor);
    expect(await packages.tool()).toBe("yum");
    await packages.install(["sles_es-release-server"]);
    expect(executor.commands()).toEqual(["yum install -y sles_es-release-server"]);
  });

  it("downloads with yumdownloader when dnf is missing", async () => {
    const executor = new FakeExecutor();
    executor.available.delete("dnf");
    executor.available.add("yumdownloader");
    await new RpmPackageManager(executor, "yum").download(["centos-release"], "/store/rpms");
    expect(executor.commands()).toEqual(["yumdownloader --destdir=/store/rpms centos-release"]);
  });

  it("reports failures with stderr, or the exit code when stderr is empty", async () => {
    const executor = new FakeExecutor()
      .on(["rpm", "-e"], { exitCode: 1, stderr: "error: package sll-release is not installed\n" })
      .on(["dnf", "clean"], { exitCode: 3 });
    const packages = new RpmPackageManager(executor, "dnf");
    expect(await packages.erase("sll-release")).toEqual({ ok: false, error: "error: package sll-release is not installed" });
    expect(await packages.cleanCache()).toEqual({ ok: false, error: "dnf exited with 3" });
  });

  it("answers installed queries from rpm -q", async () => {
    const executor = new FakeExecutor().installed("sll-release");
    const packages = new RpmPackageManager(executor, "dnf");
    expect(await packages.isInstalled("sll-release")).toBe(true);
    expect(await packages.isInstalled("sll-logos")).toBe(false);
  });

  it("skips repoquery when it is not installed", async () => {
    const executor = new FakeExecutor();
    expect(await new RpmPackageManager(executor, "dnf").locate("rocky-release")).toBeNull();
    expect(executor.calls).toEqual([]);
  });
});
