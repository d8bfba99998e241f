/** Distributions the conversion accepts as a source. */
export type SourceDistroId = "rocky" | "almalinux" | "ol" | "centos" | "rhel" | "eurolinux";

/** Supported Enterprise Linux major versions. */
export type MajorVersion = "7" | "8" | "9";

/** Package manager front end used for installs and downloads. */
export type PackageTool = "dnf" | "yum";

/**
 * Identity of the running system, resolved once per run.
 * Consumed by element backends (which release packages are distro-specific)
 * and by the restore orchestrator (confirmation text).
 */
export interface SystemIdentity {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly versionMajor: string;
}

/** Host facts recorded in every snapshot descriptor. */
export interface HostInfo {
  readonly hostname: string;
  readonly kernel: string;
}

/** The distribution the host is converted to; its packages and repos are removed on restore. */
export interface TargetVendor {
  readonly name: string;
  readonly releasePackages: readonly string[];
  readonly repoFilePatterns: readonly RegExp[];
  readonly packageNamePattern: RegExp;
}
