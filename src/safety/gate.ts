// Safety gate: intercepts every state-changing MCP tool before it runs.
// A tool at or above the confirmation threshold needs confirmed=true, unless it is a
// dry run and dry runs bypass confirmation. The CLI never goes through here; it asks
// through its Confirmer instead.
import type { RiskLevel } from "../types/risk.js";
import { RISK_ORDER } from "../types/risk.js";
import type { ConfirmationResponse } from "../types/response.js";
import { logger } from "../logger.js";

export class SafetyGate {
  private readonly threshold: RiskLevel;
  private readonly dryRunBypass: boolean;

  constructor(config: { confirmation_threshold: RiskLevel; dry_run_bypass_confirmation: boolean }) {
    this.threshold = config.confirmation_threshold;
    this.dryRunBypass = config.dry_run_bypass_confirmation;
  }

  /**
   * Check if an operation requires confirmation.
   * Returns null if allowed, or a ConfirmationResponse if confirmation is needed.
   */
  check(params: {
    toolName: string;
    toolRiskLevel: RiskLevel;
    targetHost: string;
    description: string;
    confirmed?: boolean;
    dryRun?: boolean;
    warnings?: string[];
  }): ConfirmationResponse | null {
    if (params.dryRun && this.dryRunBypass) return null;

    // Read-only and low risk never need confirmation
    if (RISK_ORDER[params.toolRiskLevel] < RISK_ORDER["moderate"]) return null;
    if (RISK_ORDER[params.toolRiskLevel] < RISK_ORDER[this.threshold]) return null;
    if (params.confirmed) return null;

    logger.info({ tool: params.toolName, risk: params.toolRiskLevel, threshold: this.threshold }, "Confirmation required");

    return {
      status: "confirmation_required",
      tool: params.toolName,
      target_host: params.targetHost,
      duration_ms: null,
      risk_level: params.toolRiskLevel,
      dry_run_available: true,
      preview: {
        description: params.description,
        warnings: params.warnings ?? [],
      },
    };
  }
}
