// Static distribution data: display names, release packages and the conversion target.
// Pure data; element backends and the migrator consume it, nothing here runs commands.
import type { MajorVersion, SourceDistroId, TargetVendor } from "../types/distro.js";

export const SUPPORTED_MAJOR_VERSIONS: readonly MajorVersion[] = ["7", "8", "9"];

export function isMajorVersion(value: string): value is MajorVersion {
  return SUPPORTED_MAJOR_VERSIONS.some((v) => v === value);
}

/** os-release ID → source distribution. "oracle" is accepted as an alias of "ol". */
export const DISTRO_ALIASES: Readonly<Record<string, SourceDistroId>> = {
  rocky: "rocky",
  almalinux: "almalinux",
  ol: "ol",
  oracle: "ol",
  centos: "centos",
  rhel: "rhel",
  eurolinux: "eurolinux",
};

export const DISTRO_NAMES: Readonly<Record<SourceDistroId, string>> = {
  rocky: "Rocky Linux",
  almalinux: "AlmaLinux",
  ol: "Oracle Linux",
  centos: "CentOS",
  rhel: "Red Hat Enterprise Linux",
  eurolinux: "EuroLinux",
};

type ReleasePackageRule = (versionMajor: string) => string[];

const RELEASE_PACKAGES: Readonly<Record<SourceDistroId, ReleasePackageRule>> = {
  rocky: (v) => ["rocky-release", "rocky-repos", "rocky-gpg-keys", ...(v === "9" || v === "8" ? [`rocky-release-${v}`] : [])],
  almalinux: () => ["almalinux-release", "almalinux-repos", "almalinux-gpg-keys"],
  ol: (v) => ["oraclelinux-release", `oraclelinux-release-el${v}`, `oracle-epel-release-el${v}`, `oracle-release-el${v}`],
  centos: (v) => (v === "7" ? ["centos-release", "centos-release-cr"] : ["centos-stream-release", "centos-stream-repos", "centos-gpg-keys"]),
  rhel: () => ["redhat-release", "redhat-release-server"],
  eurolinux: () => ["eurolinux-release", "eurolinux-repos"],
};

/** Release-adjacent packages present on most EL derivatives. */
export const COMMON_RELEASE_PACKAGES: readonly string[] = ["system-release", "redhat-logos", "os-prober"];

/** Local package names that look like a release package: foo-release, foo-release-9, foo-release-server. */
export const RELEASE_NAME_PATTERN = /^[a-z]+-release(-[a-z0-9]+)?$/;

/** Candidate release packages for a distribution, before filtering by what is installed. */
export function releasePackageCandidates(distroId: string, versionMajor: string): string[] {
  const source = DISTRO_ALIASES[distroId];
  const specific = source ? RELEASE_PACKAGES[source](versionMajor) : [];
  return [...specific, ...COMMON_RELEASE_PACKAGES];
}

export const TARGET_VENDOR: TargetVendor = {
  name: "SUSE",
  releasePackages: ["sll-release", "sll-logos", "sles_es-release", "sles_es-logos", "sles_es-release-server"],
  repoFilePatterns: [/^SLL.*\.repo$/, /^sles.*\.repo$/],
  packageNamePattern: /sll|sles/,
};

/** Per-version conversion plan: which vendor release package replaces the original. */
export interface ConversionTarget {
  readonly productName: string;
  readonly releasePackage: string;
  readonly logosPackage: string;
  /** Packages excluded from a full reinstall. */
  readonly reinstallExcludes: readonly string[];
  /** yum is the only front end on EL7. */
  readonly forceYum: boolean;
}

export const CONVERSION_TARGETS: Readonly<Record<MajorVersion, ConversionTarget>> = {
  "9": { productName: "SUSE Liberty Linux", releasePackage: "sll-release", logosPackage: "sll-logos", reinstallExcludes: ["venv-salt-minion"], forceYum: false },
  "8": { productName: "SLES Expanded Support", releasePackage: "sles_es-release", logosPackage: "sles_es-logos", reinstallExcludes: ["venv-salt-minion", "salt-minion"], forceYum: false },
  "7": { productName: "SLES Expanded Support", releasePackage: "sles_es-release-server", logosPackage: "sles_es-logos", reinstallExcludes: ["venv-salt-minion", "salt-minion", "libreport-plugin-bugzilla"], forceYum: true },
};

/** Release packages a converted host may carry, newest target first. */
export const TARGET_RELEASE_PACKAGES: readonly string[] = [...new Set(
  [...SUPPORTED_MAJOR_VERSIONS].reverse().map((v) => CONVERSION_TARGETS[v].releasePackage),
)];

/** The original release package the conversion removes, per distribution and major version. */
export function originalReleasePackage(distroId: string, versionMajor: string, centosStream: boolean): string | null {
  const source = DISTRO_ALIASES[distroId];
  if (!source) return null;
  if (versionMajor === "7") {
    switch (source) {
      case "ol": return "oraclelinux-release-el7";
      case "centos": return "centos-release";
      case "rhel": return "redhat-release-server";
      case "eurolinux": return "eurolinux-release";
      default: return null;
    }
  }
  switch (source) {
    case "rocky": return "rocky-release";
    case "almalinux": return "almalinux-release";
    case "ol": return "oraclelinux-release";
    case "centos": return versionMajor === "9" || centosStream ? "centos-stream-release" : "centos-release";
    case "rhel": return "redhat-release";
    case "eurolinux": return "eurolinux-release";
  }
}

/** Paths the conversion deletes or overwrites; captured as the deleted_files element. */
export const DELETED_FILE_TARGETS: readonly string[] = [
  "/usr/share/redhat-release",
  "/etc/dnf/protected.d/redhat-release.conf",
  "/etc/os-release",
  "/etc/redhat-release",
  "/etc/system-release",
  "/etc/system-release-cpe",
  "/etc/centos-release",
  "/etc/oracle-release",
  "/etc/rocky-release",
  "/etc/almalinux-release",
  "/etc/eurolinux-release",
];

/** Identity files captured as the release_files element. */
export const RELEASE_FILES: readonly string[] = ["/etc/os-release", "/etc/redhat-release", "/etc/system-release", "/etc/centos-release"];

/** Package-manager cache directories searched when a release package cannot be downloaded. */
export const PACKAGE_CACHE_DIRS: readonly string[] = ["/var/cache/yum", "/var/cache/dnf", "/var/lib/rpm"];
