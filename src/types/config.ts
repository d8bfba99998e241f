import type { RiskLevel } from "./risk.js";

/** Full configuration as read from config.yaml. */
export interface LiberateConfig {
  backup: {
    directory: string;
    retention: number;
    archive_prefix: string;
  };
  system: {
    root: string;
    marker_path: string;
  };
  package_manager: {
    tool: "auto" | "dnf" | "yum";
  };
  errors: {
    command_timeout_ceiling: number;
  };
  safety: {
    confirmation_threshold: RiskLevel;
    dry_run_bypass_confirmation: boolean;
  };
  migration: {
    min_free_space_mb: number;
  };
}
