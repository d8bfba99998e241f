// Config loader: reads /etc/liberate/config.yaml and deep-merges it over defaults.
// On first run (no config file) the defaults are written out and firstRun is true.
// The merged result is validated against configSchema; an invalid file falls back to defaults.
// Config shape is defined in src/types/config.ts; add new fields there, in configSchema and in DEFAULT_CONFIG.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { LiberateConfig } from "../types/config.js";
import { logger } from "../logger.js";

export const DEFAULT_CONFIG_PATH = "/etc/liberate/config.yaml";

export const DEFAULT_CONFIG: LiberateConfig = {
  backup: { directory: "/var/lib/liberate/backups", retention: 5, archive_prefix: "liberate-backup" },
  system: { root: "/", marker_path: "/etc/sysconfig/liberated" },
  package_manager: { tool: "auto" },
  errors: { command_timeout_ceiling: 0 },
  safety: { confirmation_threshold: "high", dry_run_bypass_confirmation: true },
  migration: { min_free_space_mb: 100 },
};

const DEFAULT_CONFIG_YAML = `# liberate: configuration
# Generated automatically on first run. All values shown are defaults.

backup:
  # Snapshot store root; one directory per snapshot plus a "latest" link
  directory: /var/lib/liberate/backups
  # Snapshots kept after a migration (oldest are pruned first)
  retention: 5
  # Exported archives are named <archive_prefix>-<snapshot-id>.tar.gz
  archive_prefix: liberate-backup

system:
  # Every system path (/etc/yum.repos.d, /etc/os-release, ...) is resolved under this root
  root: /
  marker_path: /etc/sysconfig/liberated

package_manager:
  # auto | dnf | yum
  tool: auto

errors:
  # Upper bound for any single command, in seconds (0 = per-command defaults)
  command_timeout_ceiling: 0

safety:
  confirmation_threshold: high
  dry_run_bypass_confirmation: true

migration:
  min_free_space_mb: 100
`;

const riskLevel = z.enum(["read-only", "low", "moderate", "high", "critical"]);

const absolutePath = z.string().min(1).refine((p) => p.startsWith("/"), { message: "must be an absolute path" });

export const configSchema = z.object({
  backup: z.object({
    directory: absolutePath,
    retention: z.number().int().min(1),
    archive_prefix: z.string().min(1).regex(/^[A-Za-z0-9._-]+$/),
  }),
  system: z.object({
    root: absolutePath,
    marker_path: absolutePath,
  }),
  package_manager: z.object({
    tool: z.enum(["auto", "dnf", "yum"]),
  }),
  errors: z.object({
    command_timeout_ceiling: z.number().min(0),
  }),
  safety: z.object({
    confirmation_threshold: riskLevel,
    dry_run_bypass_confirmation: z.boolean(),
  }),
  migration: z.object({
    min_free_space_mb: z.number().min(0),
  }),
});

export interface ConfigResult {
  config: LiberateConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: true };
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    const parsed: unknown = parseYaml(raw);
    const merged = deepMerge(toRecord(DEFAULT_CONFIG), isRecord(parsed) ? parsed : {});
    const config = configSchema.parse(merged);
    return { config, configPath, firstRun: false };
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to parse config, using defaults");
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: false };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function toRecord(config: LiberateConfig): Record<string, unknown> {
  const copy: Record<string, unknown> = JSON.parse(JSON.stringify(config));
  return copy;
}

/** Deep merge b into a (a provides defaults, b overrides). */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
