import type { RestorePolicy, RestoreStep } from "../types/restore.js";
import { RESTORE_POLICIES, RESTORE_STEP_ORDER } from "../types/restore.js";

export type FixedPolicy = Exclude<RestorePolicy, "interactive-select">;

/** Policies that need no answers from a person; the only ones the MCP tools accept. */
export const FIXED_POLICIES = [
  "full",
  "minimal",
  "repos-only",
  "release-only",
  "files-only",
  "config-only",
] as const satisfies readonly FixedPolicy[];

/**
 * Steps each non-interactive policy runs. minimal still removes the target vendor's
 * packages: it skips repositories and configuration, not the vendor identity.
 */
export const POLICY_STEPS: Readonly<Record<FixedPolicy, readonly RestoreStep[]>> = {
  "full": ["remove-vendor-packages", "repos", "release-packages", "config", "deleted-files", "remove-marker"],
  "minimal": ["remove-vendor-packages", "release-packages", "deleted-files", "remove-marker"],
  "repos-only": ["repos"],
  "release-only": ["release-packages"],
  "files-only": ["deleted-files"],
  "config-only": ["config"],
};

export const STEP_DESCRIPTIONS: Readonly<Record<RestoreStep, string>> = {
  "remove-vendor-packages": "Remove target vendor release packages",
  "repos": "Restore repository configuration",
  "release-packages": "Install original release packages",
  "config": "Restore package manager configuration",
  "deleted-files": "Restore deleted files",
  "remove-marker": "Remove liberated marker",
};

/** Short names accepted on the command line. */
const POLICY_ALIASES: Readonly<Record<string, RestorePolicy>> = {
  repos: "repos-only",
  release: "release-only",
  files: "files-only",
  config: "config-only",
  select: "interactive-select",
};

export function parsePolicy(name: string): RestorePolicy | null {
  const found = RESTORE_POLICIES.find((p) => p === name);
  return found ?? POLICY_ALIASES[name] ?? null;
}

/** Selected steps in canonical order, whatever order they were chosen in. */
export function orderSteps(selected: Iterable<RestoreStep>): RestoreStep[] {
  const chosen = new Set(selected);
  return RESTORE_STEP_ORDER.filter((s) => chosen.has(s));
}

export function stepsFor(policy: FixedPolicy): RestoreStep[] {
  return orderSteps(POLICY_STEPS[policy]);
}
