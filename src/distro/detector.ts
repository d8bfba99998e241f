import { readFile } from "node:fs/promises";
import { hostname, release } from "node:os";
import type { HostInfo, SystemIdentity } from "../types/distro.js";
import type { SystemPaths } from "../system/paths.js";
import { DISTRO_ALIASES, DISTRO_NAMES, isMajorVersion } from "./release-table.js";
import { LiberateError, LiberateErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Parse KEY=value lines (os-release, sysconfig files) into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

/** Map os-release fields to a supported source identity, or throw. */
export function resolveIdentity(osRelease: Record<string, string>, centosReleaseText: string | null): SystemIdentity {
  const rawId = (osRelease.ID ?? "unknown").toLowerCase();
  const source = DISTRO_ALIASES[rawId];
  if (!source) {
    throw new LiberateError(LiberateErrorCode.UNSUPPORTED_DISTRO, `Unsupported distribution: ${rawId}`, { id: rawId });
  }

  let name = DISTRO_NAMES[source];
  if (source === "centos" && centosReleaseText && /stream/i.test(centosReleaseText)) name = "CentOS Stream";

  const version = osRelease.VERSION_ID ?? "unknown";
  const versionMajor = version.split(".")[0] ?? version;
  if (!isMajorVersion(versionMajor)) {
    throw new LiberateError(
      LiberateErrorCode.UNSUPPORTED_VERSION,
      `Unsupported version: ${version} (major version ${versionMajor})`,
      { version },
    );
  }

  return { id: rawId, name, version, versionMajor };
}

/** Detect the running distribution from <root>/etc/os-release. */
export async function detectIdentity(paths: SystemPaths): Promise<SystemIdentity> {
  let content: string;
  try {
    content = await readFile(paths.resolve(paths.osRelease), "utf-8");
  } catch (err) {
    throw new LiberateError(LiberateErrorCode.IDENTITY_UNKNOWN, `Cannot detect OS: ${paths.osRelease} not readable`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  let centosRelease: string | null = null;
  try {
    centosRelease = await readFile(paths.resolve(paths.centosRelease), "utf-8");
  } catch (err) {
    // absent on everything but CentOS
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
  }

  const identity = resolveIdentity(parseOsRelease(content), centosRelease);
  logger.info({ identity }, "Distro detection complete");
  return identity;
}

/** Host name and kernel release of the machine running the engine. */
export function detectHost(): HostInfo {
  return { hostname: hostname(), kernel: release() };
}
