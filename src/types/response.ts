/** Error categories reported to MCP clients. */
export type ErrorCategory = "not_found" | "validation" | "resource" | "state";

/** Base fields present in every response. */
export interface ResponseBase {
  status: "success" | "error" | "confirmation_required";
  tool: string;
  target_host: string;
  /** null when nothing ran (confirmation responses). */
  duration_ms: number | null;
}

/** Successful response with tool-specific data. */
export interface SuccessResponse extends ResponseBase {
  status: "success";
  data: Record<string, unknown>;
  /** Presentation lines the engine printed while running. */
  output?: string[];
  dry_run?: boolean;
}

export interface ErrorResponse extends ResponseBase {
  status: "error";
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  remediation: string[];
  output?: string[];
}

/** Returned instead of running a state-changing tool that needs explicit confirmation. */
export interface ConfirmationResponse extends ResponseBase {
  status: "confirmation_required";
  risk_level: string;
  dry_run_available: boolean;
  preview: {
    description: string;
    warnings: string[];
  };
}

export type ToolResponse = SuccessResponse | ErrorResponse | ConfirmationResponse;
