import type { z } from "zod";
import type { PluginContext } from "./context.js";
import type { ToolResponse, SuccessResponse, ErrorResponse, ErrorCategory } from "../types/response.js";
import type { ToolMetadata, ExecutionContext } from "../types/tool.js";
import { MirrorError, MirrorErrorCode } from "../shared/errors.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, targetHost: string, durationMs: number, commandExecuted: string | null, data: Record<string, unknown>, extra?: Partial<SuccessResponse>): SuccessResponse {
  return { status: "success", tool, target_host: targetHost, duration_ms: durationMs, command_executed: commandExecuted, data, ...extra };
}

export function error(tool: string, targetHost: string, durationMs: number, opts: { code: string; category: ErrorCategory; message: string; transient?: boolean; remediation?: string[]; data?: Record<string, unknown> }): ErrorResponse {
  return {
    status: "error", tool, target_host: targetHost, duration_ms: durationMs, command_executed: null,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    transient: opts.transient ?? false,
    remediation: opts.remediation ?? [],
    ...(opts.data ? { data: opts.data } : {}),
  };
}

// ── Error Mapping ──────────────────────────────────────────────────

const MIRROR_ERROR_CATEGORIES: Record<MirrorErrorCode, { category: ErrorCategory; transient: boolean; remediation: string[] }> = {
  [MirrorErrorCode.CONFIGURATION_ERROR]: { category: "validation", transient: false, remediation: ["Fix the value named in the message (config.yaml or tool arguments)"] },
  [MirrorErrorCode.DISCOVERY_FAILED]: { category: "network", transient: true, remediation: ["Check outbound HTTP access and proxy settings", "Set target.custom_mirror_file to skip discovery"] },
  [MirrorErrorCode.UNKNOWN_DISTRIBUTOR]: { category: "validation", transient: false, remediation: ["Set target.distributor and target.codename in config.yaml"] },
  [MirrorErrorCode.NO_MIRRORS]: { category: "not_found", transient: true, remediation: ["Loosen the exclusion patterns", "Raise ranking.max_mirrors"] },
  [MirrorErrorCode.SOURCES_LIST_ERROR]: { category: "state", transient: false, remediation: ["Check the sources list path (target.sources_list)", "Verify passwordless sudo for cp and install"] },
};

/** Error response for an exception thrown by a tool handler. */
export function errorFromException(tool: string, targetHost: string, durationMs: number, err: unknown): ErrorResponse {
  if (err instanceof MirrorError) {
    const meta = MIRROR_ERROR_CATEGORIES[err.code];
    return error(tool, targetHost, durationMs, { code: err.code, message: err.message, ...meta });
  }
  return error(tool, targetHost, durationMs, {
    code: "INTERNAL_ERROR", category: "state", message: err instanceof Error ? err.message : String(err),
    remediation: ["Check server logs for details"],
  });
}

// ── Tool Registration Helper ───────────────────────────────────────

/**
 * Register a tool whose handler receives arguments already parsed by its
 * zod schema (defaults applied). Validation failures become error responses.
 */
export function registerTool<S extends z.ZodRawShape>(
  ctx: PluginContext,
  metadata: Omit<ToolMetadata, "inputSchema"> & { readonly inputSchema: z.ZodObject<S> },
  handler: (args: z.infer<z.ZodObject<S>>, execCtx: ExecutionContext) => Promise<ToolResponse>,
): void {
  ctx.registry.register({
    metadata,
    execute: async (args, execCtx) => {
      const parsed = metadata.inputSchema.safeParse(args);
      if (!parsed.success) {
        return error(metadata.name, execCtx.targetHost, 0, {
          code: "INVALID_ARGUMENTS", category: "validation",
          message: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; "),
        });
      }
      return handler(parsed.data, execCtx);
    },
  });
}
