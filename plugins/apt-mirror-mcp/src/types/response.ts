// JSON envelope every tool returns. `status` discriminates the three shapes;
// the MCP layer serialises the envelope as the text content of the result.

export type ErrorCategory = "validation" | "not_found" | "network" | "state";

interface Envelope {
  tool: string;
  target_host: string;
  /** Command that changed the system, or null when nothing ran. */
  command_executed: string | null;
}

export interface SuccessResponse extends Envelope {
  status: "success";
  duration_ms: number;
  data: Record<string, unknown>;
  /** List tools: how many items exist and how many are in `data`. */
  total?: number;
  returned?: number;
  truncated?: boolean;
  summary?: string;
  dry_run?: boolean;
}

export interface ErrorResponse extends Envelope {
  status: "error";
  duration_ms: number;
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  /** Retrying later may succeed (network, mirrors mid-sync). */
  transient: boolean;
  remediation: string[];
  data?: Record<string, unknown>;
}

/** Returned instead of running a gated tool; repeat the call with `confirmed: true`. */
export interface ConfirmationResponse extends Envelope {
  status: "confirmation_required";
  duration_ms: null;
  risk_level: string;
  dry_run_available: boolean;
  preview: {
    command: string;
    description: string;
    warnings: string[];
  };
}

export type ToolResponse = SuccessResponse | ErrorResponse | ConfirmationResponse;
