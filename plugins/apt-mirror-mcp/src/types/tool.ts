import type { AnyZodObject } from "zod";
import type { ToolResponse } from "./response.js";

/** Lowest to highest. `high` and above change what apt fetches from. */
export type RiskLevel = "read-only" | "low" | "moderate" | "high" | "critical";

export const RISK_ORDER: Record<RiskLevel, number> = {
  "read-only": 0,
  low: 1,
  moderate: 2,
  high: 3,
  critical: 4,
};

export interface ToolMetadata {
  readonly name: string;
  readonly description: string;
  readonly riskLevel: RiskLevel;
  /** Parsed (defaults applied) before the handler runs; its shape is advertised in tools/list. */
  readonly inputSchema: AnyZodObject;
  readonly annotations?: {
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
    idempotentHint?: boolean;
    openWorldHint?: boolean;
  };
}

export interface ExecutionContext {
  readonly targetHost: string;
  /** Aborted when the client cancels the request. */
  readonly signal?: AbortSignal;
}

export interface RegisteredTool {
  readonly metadata: ToolMetadata;
  readonly execute: (args: Record<string, unknown>, context: ExecutionContext) => Promise<ToolResponse>;
}
