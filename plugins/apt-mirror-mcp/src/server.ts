#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { RequestHandlerExtra } from "@modelcontextprotocol/sdk/shared/protocol.js";
import type { ServerNotification, ServerRequest } from "@modelcontextprotocol/sdk/types.js";
import { cpus, hostname } from "node:os";

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { detectSystemRelease, verifySudo } from "./distro/detector.js";
import { resolveSourcesListPath } from "./distro/sources-file.js";
import { LocalExecutor } from "./execution/executor.js";
import { HttpProbeClient } from "./http/probe-client.js";
import { ReleaseRegistry } from "./releases/registry.js";
import { SafetyGate } from "./safety/gate.js";
import { defaultConcurrency } from "./shared/limiter.js";
import { ToolRegistry } from "./tools/registry.js";
import type { PluginContext } from "./tools/context.js";
import type { ToolResponse } from "./types/response.js";
import { errorFromException } from "./tools/helpers.js";

import { registerMirrorTools } from "./tools/mirrors/index.js";

async function main(): Promise<void> {
  logger.info("Starting apt-mirror-mcp server");

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, firstRun } = loadConfig(process.env.APT_MIRROR_MCP_CONFIG);
  logger.info({ configPath, firstRun }, "Configuration loaded");

  // ── Phase 2: Detect release ───────────────────────────────────
  const system = detectSystemRelease(config.target);
  const releases = ReleaseRegistry.bundled();
  logger.info({ releases: releases.size }, "Release table loaded");

  // ── Phase 3: Privilege ────────────────────────────────────────
  const isRoot = process.getuid?.() === 0;
  const sudo = !isRoot;
  if (sudo && !verifySudo()) {
    logger.warn("Passwordless sudo not available; mirror_change and mirror_smart_update will fail");
  }

  // ── Phase 4: Executor, prober, safety gate ────────────────────
  const executor = new LocalExecutor();
  const prober = new HttpProbeClient();
  const safetyGate = new SafetyGate(config.safety);

  // ── Phase 5: Create tool registry and plugin context ──────────
  const registry = new ToolRegistry();
  const ctx: PluginContext = {
    config, system, executor, prober, releases, safetyGate, registry,
    targetHost: hostname(),
    sourcesListPath: resolveSourcesListPath(config.target.sources_list),
    concurrency: config.ranking.concurrency ?? defaultConcurrency(cpus().length),
    sudo,
  };

  // ── Phase 6: Register tool modules ────────────────────────────
  registerMirrorTools(ctx);
  logger.info({ toolCount: registry.size, sourcesList: ctx.sourcesListPath, concurrency: ctx.concurrency }, "All tool modules registered");

  // ── Phase 7: Create MCP server ────────────────────────────────
  const server = new McpServer({ name: "apt-mirror-mcp", version: "0.1.0" });

  // ── Phase 8: Register tools on MCP server ─────────────────────
  for (const tool of registry) {
    const { name, description, inputSchema, riskLevel, annotations } = tool.metadata;
    server.registerTool(
      name,
      {
        title: name,
        description,
        inputSchema: inputSchema.shape,
        annotations: {
          readOnlyHint: annotations?.readOnlyHint ?? riskLevel === "read-only",
          destructiveHint: annotations?.destructiveHint ?? false,
          idempotentHint: annotations?.idempotentHint ?? false,
          openWorldHint: annotations?.openWorldHint ?? false,
        },
      },
      async (args: Record<string, unknown>, extra: RequestHandlerExtra<ServerRequest, ServerNotification>) => {
        let response: ToolResponse;
        try {
          response = await tool.execute(args, { targetHost: ctx.targetHost, signal: extra.signal });
        } catch (err) {
          logger.error({ tool: name, error: err instanceof Error ? err.message : String(err) }, "Tool execution error");
          response = errorFromException(name, ctx.targetHost, 0, err);
        }
        return { content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }] };
      },
    );
  }

  // ── Phase 9: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: registry.size, host: ctx.targetHost }, "apt-mirror-mcp server running on stdio");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
