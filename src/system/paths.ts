import path from "node:path";
import { readlink } from "node:fs/promises";

/**
 * Well-known system locations, resolved under a root prefix.
 * Everything the engine reads or writes on the live system goes through here,
 * so a run against root "/srv/chroot" never touches the host's /etc.
 */
export class SystemPaths {
  readonly reposDir = "/etc/yum.repos.d";
  readonly osRelease = "/etc/os-release";
  readonly centosRelease = "/etc/centos-release";
  readonly dnfConf = "/etc/dnf/dnf.conf";
  readonly yumConf = "/etc/yum.conf";
  readonly protectedDir = "/etc/dnf/protected.d";
  readonly redhatReleaseShare = "/usr/share/redhat-release";
  readonly protectedReleaseConf = "/etc/dnf/protected.d/redhat-release.conf";

  constructor(
    readonly root: string,
    readonly markerPath: string,
  ) {}

  /** Host path for a system-absolute path. */
  resolve(systemPath: string): string {
    return path.join(this.root, systemPath);
  }

  /**
   * System-absolute target of a symbolic link, resolved the way the live system would
   * (relative targets against the link's directory), without leaving the root.
   */
  async linkTarget(systemPath: string): Promise<string | null> {
    try {
      const target = await readlink(this.resolve(systemPath));
      return path.posix.resolve(path.posix.dirname(systemPath), target);
    } catch (err) {
      const code = (err as NodeJS.ErrnoException).code;
      if (code === "EINVAL" || code === "ENOENT") return null;
      throw err;
    }
  }
}

/** True when a system-absolute path is normalized and cannot climb out of its root. */
export function isSafeSystemPath(systemPath: string): boolean {
  return systemPath.startsWith("/") && path.posix.normalize(systemPath) === systemPath && !systemPath.split("/").includes("..");
}
