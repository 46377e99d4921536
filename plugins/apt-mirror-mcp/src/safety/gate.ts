// Confirmation gate for the tools that rewrite the sources list or run
// apt-get. Risk at or above the configured threshold (never below
// `moderate`) is held until the caller repeats the request with
// `confirmed: true`. Dry runs pass when the config allows it.
import type { PluginConfig } from "../types/config.js";
import type { RiskLevel } from "../types/tool.js";
import { RISK_ORDER } from "../types/tool.js";
import type { ConfirmationResponse } from "../types/response.js";
import { logger } from "../logger.js";

export interface GateRequest {
  readonly tool: string;
  readonly risk: RiskLevel;
  readonly targetHost: string;
  /** What would run, shown in the preview. */
  readonly command: string;
  readonly description: string;
  readonly warnings?: readonly string[];
  readonly confirmed: boolean;
  readonly dryRun: boolean;
}

export class SafetyGate {
  constructor(private readonly settings: PluginConfig["safety"]) {}

  needsConfirmation(risk: RiskLevel, request: { confirmed: boolean; dryRun: boolean }): boolean {
    if (request.confirmed) return false;
    if (request.dryRun && this.settings.dry_run_bypass_confirmation) return false;
    const threshold = Math.max(RISK_ORDER.moderate, RISK_ORDER[this.settings.confirmation_threshold]);
    return RISK_ORDER[risk] >= threshold;
  }

  /** null when the call may proceed, else the response to return in its place. */
  check(request: GateRequest): ConfirmationResponse | null {
    if (!this.needsConfirmation(request.risk, request)) return null;

    logger.info({ tool: request.tool, risk: request.risk, threshold: this.settings.confirmation_threshold }, "Confirmation required");
    return {
      status: "confirmation_required",
      tool: request.tool,
      target_host: request.targetHost,
      // Nothing ran, so there is no duration.
      duration_ms: null,
      command_executed: null,
      risk_level: request.risk,
      dry_run_available: true,
      preview: {
        command: request.command,
        description: request.description,
        warnings: [...(request.warnings ?? [])],
      },
    };
  }
}
