import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { PluginContext } from "../context.js";
import type { ExecutionContext } from "../../types/tool.js";
import type { RankedMirror } from "../../types/mirror.js";
import type { Distributor } from "../../types/distributor.js";
import { DISTRIBUTORS } from "../../types/distributor.js";
import { registerTool, success, error, errorFromException } from "../helpers.js";
import { archiveServesRelease, discoverAndRank, parseMirrorFile, selectBestMirror, resolveEffectiveRelease, validateMirrorUrl, type DiscoveryReport } from "../../mirrors/discovery.js";
import { ExclusionSet } from "../../mirrors/exclusions.js";
import { checkEol } from "../../releases/eol.js";
import { profileFor } from "../../backends/dispatch.js";
import { generateSourcesList, replaceMirror } from "../../distro/sources-list.js";
import { SourcesListFile } from "../../distro/sources-file.js";
import { smartUpdate } from "../../update/orchestrator.js";
import { AptUpdateRunner, aptUpdateCommand } from "../../update/apt.js";
import { mergeSignatures } from "../../update/classifier.js";
import { MirrorError, MirrorErrorCode } from "../../shared/errors.js";
import { logger } from "../../logger.js";

// ── Shared argument shapes ─────────────────────────────────────────

const releaseArgs = {
  distributor: z.enum(DISTRIBUTORS).optional().describe("Distributor; defaults to the detected system"),
  codename: z.string().min(1).optional().describe("Release codename, e.g. bookworm or jammy; defaults to the detected system"),
  architecture: z.string().min(1).optional().describe("dpkg architecture; defaults to the detected system"),
};

/** Ranking options for the local system's own release. */
const systemRankingArgs = {
  exclude: z.array(z.string()).optional().default([]).describe("Extra shell-glob patterns of mirror URLs to skip"),
  max_mirrors: z.number().int().min(0).optional().describe("Probe at most this many candidates (0 = all)"),
  country: z.string().min(1).optional().describe("Country name for mirror-page filtering; skips geolocation"),
  upstream_mode: z.boolean().optional().describe("Linux Mint: rank Ubuntu mirrors for the base release"),
};

const rankingArgs = { ...releaseArgs, ...systemRankingArgs };

const safetyArgs = {
  confirmed: z.boolean().optional().default(false).describe("Pass true to confirm execution after reviewing a confirmation_required response."),
  dry_run: z.boolean().optional().default(false).describe("Preview without executing; nothing on the system changes."),
};

type ReleaseArgs = { distributor?: Distributor; codename?: string; architecture?: string };
type RankingArgs = ReleaseArgs & { exclude: string[]; max_mirrors?: number; country?: string; upstream_mode?: boolean };

function elapsed(start: number): number {
  return Math.round(performance.now() - start);
}

/** Arguments override the config, which overrides detection. */
function releaseFor(ctx: PluginContext, args: ReleaseArgs): { distributor: Distributor; codename: string; architecture: string } {
  const distributor = args.distributor ?? ctx.system.distributor;
  const codename = args.codename ?? (distributor === ctx.system.distributor ? ctx.system.codename : null);
  if (!codename) {
    throw new MirrorError(MirrorErrorCode.CONFIGURATION_ERROR, `A codename is required for ${distributor} on this ${ctx.system.distributor} system`);
  }
  return { distributor, codename, architecture: args.architecture ?? ctx.system.architecture };
}

function rankingSettings(ctx: PluginContext) {
  const r = ctx.config.ranking;
  return {
    concurrency: ctx.concurrency,
    timeouts: { requestMs: r.request_timeout_seconds * 1000, mirrorMs: r.mirror_timeout_seconds * 1000 },
    bandwidth: { windowMs: r.bandwidth_window_ms, minBytes: r.bandwidth_min_bytes, maxBytes: r.bandwidth_max_bytes },
    discoveryAttempts: r.discovery_attempts,
  };
}

async function customMirrors(ctx: PluginContext): Promise<string[]> {
  const path = ctx.config.target.custom_mirror_file;
  if (!path) return [];
  return parseMirrorFile(await readFile(path, "utf-8"));
}

function sourcesFile(ctx: PluginContext, distributor: Distributor): SourcesListFile {
  const profile = profileFor(distributor);
  return new SourcesListFile(ctx.sourcesListPath, ctx.executor, {
    timeoutMs: 30_000,
    sudo: ctx.sudo,
    archiveUrl: profile.archiveUrl,
    securityUrl: profile.securityUrl,
    now: ctx.now,
  });
}

/** Current mirror when the sources list names one and it belongs to the distributor being ranked. */
async function currentMirrorFor(ctx: PluginContext, distributor: Distributor): Promise<string | null> {
  if (distributor !== ctx.system.distributor) return null;
  try {
    return await sourcesFile(ctx, distributor).currentMirror();
  } catch (err) {
    if (!(err instanceof MirrorError)) throw err;
    logger.debug({ error: err.message }, "No current mirror in sources list");
    return null;
  }
}

async function runDiscovery(ctx: PluginContext, args: RankingArgs, signal?: AbortSignal): Promise<DiscoveryReport> {
  const release = releaseFor(ctx, args);
  const upstreamMode = args.upstream_mode ?? ctx.config.target.upstream_mode;
  const effective = resolveEffectiveRelease(ctx.releases, { ...release, upstreamMode });
  return discoverAndRank(
    { prober: ctx.prober, registry: ctx.releases, now: ctx.now, sleep: ctx.sleep },
    {
      ...release,
      ...rankingSettings(ctx),
      upstreamMode,
      country: args.country ?? ctx.config.target.country,
      customMirrors: await customMirrors(ctx),
      currentMirror: await currentMirrorFor(ctx, effective.distributor),
      exclusions: ExclusionSet.of([...ctx.config.exclude, ...args.exclude]),
      maxProbeCount: args.max_mirrors ?? ctx.config.ranking.max_mirrors,
      signal,
    },
  );
}

export function describeMirror(m: RankedMirror): Record<string, unknown> {
  return {
    rank: m.rank,
    url: m.url,
    source: m.source,
    tier: m.tier,
    availability: m.status.availability,
    updating: m.status.isUpdating,
    staleness: m.status.staleness.state === "behind" ? `${m.status.staleness.seconds}s behind` : m.status.staleness.state,
    bandwidth_bps: m.status.bandwidth,
    index_date: m.status.indexDate,
  };
}

function reportSummary(report: DiscoveryReport): Record<string, unknown> {
  return {
    distributor: report.target.distributor,
    codename: report.target.codename,
    architecture: report.target.architecture,
    eol_status: report.eol.status,
    eol_source: report.eol.source,
    eol_date: report.eol.eolDate ?? null,
    archive_url: report.archiveUrl,
    best_mirror: selectBestMirror(report),
    interrupted: report.interrupted,
  };
}

export function registerMirrorTools(ctx: PluginContext): void {
  // ── mirror_rank ─────────────────────────────────────────────────
  registerTool(ctx, {
    name: "mirror_rank",
    description: "Discover mirrors for a release, probe availability, freshness and bandwidth, and return them best first.",
    riskLevel: "read-only",
    inputSchema: z.object({
      ...rankingArgs,
      limit: z.number().int().min(1).max(500).optional().default(20).describe("Number of ranked mirrors to return"),
    }),
    annotations: { readOnlyHint: true, openWorldHint: true },
  }, async (args, execCtx) => {
    const start = performance.now();
    try {
      const report = await runDiscovery(ctx, args, execCtx.signal);
      const mirrors = report.mirrors.slice(0, args.limit).map(describeMirror);
      return success("mirror_rank", ctx.targetHost, elapsed(start), null, { ...reportSummary(report), mirrors }, {
        total: report.mirrors.length, returned: mirrors.length, truncated: report.mirrors.length > mirrors.length,
        summary: `${report.mirrors.filter((m) => m.tier === 1).length} of ${report.mirrors.length} mirrors available and in sync`,
      });
    } catch (err) {
      return errorFromException("mirror_rank", ctx.targetHost, elapsed(start), err);
    }
  });

  // ── mirror_best ─────────────────────────────────────────────────
  registerTool(ctx, {
    name: "mirror_best",
    description: "Return the single best mirror URL for a release (the old-releases archive for end-of-life releases).",
    riskLevel: "read-only",
    inputSchema: z.object(rankingArgs),
    annotations: { readOnlyHint: true, openWorldHint: true },
  }, async (args, execCtx) => {
    const start = performance.now();
    try {
      const report = await runDiscovery(ctx, args, execCtx.signal);
      const best = selectBestMirror(report);
      if (!best) {
        return error("mirror_best", ctx.targetHost, elapsed(start), {
          code: MirrorErrorCode.NO_MIRRORS, category: "not_found", transient: true,
          message: `None of ${report.mirrors.length} candidate mirrors is available`,
          remediation: ["Loosen the exclusion patterns", "Retry later; mirrors may be syncing"],
          data: reportSummary(report),
        });
      }
      return success("mirror_best", ctx.targetHost, elapsed(start), null, reportSummary(report));
    } catch (err) {
      return errorFromException("mirror_best", ctx.targetHost, elapsed(start), err);
    }
  });

  // ── mirror_check_eol ────────────────────────────────────────────
  registerTool(ctx, {
    name: "mirror_check_eol",
    description: "Report whether a release is supported, end-of-life or unknown, from the release table or the security archive.",
    riskLevel: "read-only",
    inputSchema: z.object(releaseArgs),
    annotations: { readOnlyHint: true, openWorldHint: true },
  }, async (args, execCtx) => {
    const start = performance.now();
    try {
      const release = releaseFor(ctx, args);
      const report = await checkEol(
        { registry: ctx.releases, prober: ctx.prober, now: ctx.now },
        { ...release, timeoutMs: ctx.config.ranking.request_timeout_seconds * 1000, signal: execCtx.signal },
      );
      return success("mirror_check_eol", ctx.targetHost, elapsed(start), null, {
        distributor: release.distributor,
        codename: release.codename,
        architecture: release.architecture,
        status: report.status,
        source: report.source,
        eol_date: report.eolDate ?? null,
        checked_url: report.checkedUrl ?? null,
        release: report.release ?? null,
      });
    } catch (err) {
      return errorFromException("mirror_check_eol", ctx.targetHost, elapsed(start), err);
    }
  });

  // ── mirror_current ──────────────────────────────────────────────
  registerTool(ctx, {
    name: "mirror_current",
    description: "Show the mirror the system's sources list currently points at.",
    riskLevel: "read-only",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true },
  }, async () => {
    const start = performance.now();
    try {
      const mirror = await sourcesFile(ctx, ctx.system.distributor).currentMirror();
      return success("mirror_current", ctx.targetHost, elapsed(start), null, {
        mirror, sources_list: ctx.sourcesListPath, distributor: ctx.system.distributor, codename: ctx.system.codename,
      });
    } catch (err) {
      return errorFromException("mirror_current", ctx.targetHost, elapsed(start), err);
    }
  });

  // ── mirror_sources_list ─────────────────────────────────────────
  registerTool(ctx, {
    name: "mirror_sources_list",
    description: "Generate sources.list content for a mirror (the best ranked one when mirror_url is omitted). Writes nothing.",
    riskLevel: "read-only",
    inputSchema: z.object({
      ...rankingArgs,
      mirror_url: z.string().min(1).optional().describe("Mirror base URL; ranked when omitted"),
      suites: z.array(z.string()).optional().describe("Suite keywords, e.g. release, updates, security, backports"),
      components: z.array(z.string()).optional().describe("Components, e.g. main, universe"),
      enable_sources: z.boolean().optional().default(false).describe("Also emit deb-src lines"),
    }),
    annotations: { readOnlyHint: true, openWorldHint: true },
  }, async (args, execCtx) => {
    const start = performance.now();
    try {
      const release = releaseFor(ctx, args);
      let mirrorUrl = args.mirror_url ? validateMirrorUrl(args.mirror_url) : null;
      let archive = false;
      let distributor = release.distributor;
      let codename = release.codename;
      if (!mirrorUrl) {
        const report = await runDiscovery(ctx, args, execCtx.signal);
        mirrorUrl = selectBestMirror(report);
        archive = report.archiveUrl !== null;
        distributor = report.target.distributor;
        codename = report.target.codename;
      }
      if (!mirrorUrl) {
        return error("mirror_sources_list", ctx.targetHost, elapsed(start), {
          code: MirrorErrorCode.NO_MIRRORS, category: "not_found", transient: true, message: "No available mirror to generate sources for",
        });
      }
      const content = generateSourcesList({
        distributor, codename, mirrorUrl, archive,
        suites: args.suites, components: args.components, enableSources: args.enable_sources,
      });
      return success("mirror_sources_list", ctx.targetHost, elapsed(start), null, { mirror: mirrorUrl, distributor, codename, content });
    } catch (err) {
      return errorFromException("mirror_sources_list", ctx.targetHost, elapsed(start), err);
    }
  });

  // ── mirror_change ───────────────────────────────────────────────
  registerTool(ctx, {
    name: "mirror_change",
    description: "Point the system's sources list at another mirror (the best ranked one when mirror_url is omitted). Backs up the file first. High risk: requires confirmation.",
    riskLevel: "high",
    inputSchema: z.object({
      ...systemRankingArgs,
      mirror_url: z.string().min(1).optional().describe("New mirror base URL; ranked when omitted"),
      ...safetyArgs,
    }),
    annotations: { readOnlyHint: false, destructiveHint: false, openWorldHint: true },
  }, async (args, execCtx) => {
    const start = performance.now();
    try {
      const file = sourcesFile(ctx, ctx.system.distributor);
      const current = await file.currentMirror();
      const target = args.mirror_url
        ? validateMirrorUrl(args.mirror_url)
        : selectBestMirror(await runDiscovery(ctx, args, execCtx.signal));
      if (!target) {
        return error("mirror_change", ctx.targetHost, elapsed(start), {
          code: MirrorErrorCode.NO_MIRRORS, category: "not_found", transient: true, message: "No available mirror to switch to",
        });
      }
      const gate = ctx.safetyGate.check({
        tool: "mirror_change", risk: "high", targetHost: ctx.targetHost,
        command: `rewrite ${ctx.sourcesListPath}: ${current} -> ${target}`,
        description: `Switch APT mirror from ${current} to ${target}`,
        warnings: [`The current file is kept as ${ctx.sourcesListPath}.backup.<epoch>`],
        confirmed: args.confirmed, dryRun: args.dry_run,
      });
      if (gate) return gate;
      if (args.dry_run) {
        const preview = replaceMirror(await file.read(), [current], target);
        return success("mirror_change", ctx.targetHost, elapsed(start), null, { from: current, to: target, sources_list: ctx.sourcesListPath, content: preview }, { dry_run: true });
      }
      await file.switchMirror(current, target);
      return success("mirror_change", ctx.targetHost, elapsed(start), `install ${ctx.sourcesListPath}`, { from: current, to: target, sources_list: ctx.sourcesListPath });
    } catch (err) {
      return errorFromException("mirror_change", ctx.targetHost, elapsed(start), err);
    }
  });

  // ── mirror_smart_update ─────────────────────────────────────────
  registerTool(ctx, {
    name: "mirror_smart_update",
    description: "Run apt-get update, switching mirrors on mirror faults and retrying transient failures. High risk: may rewrite the sources list.",
    riskLevel: "high",
    inputSchema: z.object({
      extra_args: z.array(z.string()).optional().default([]).describe("Arguments passed verbatim to apt-get update"),
      exclude: z.array(z.string()).optional().default([]).describe("Mirror URL globs never switched to"),
      max_attempts: z.number().int().min(1).max(50).optional().describe("Overrides update.max_attempts"),
      ...safetyArgs,
    }),
    annotations: { readOnlyHint: false, destructiveHint: false, openWorldHint: true },
  }, async (args, execCtx) => {
    const start = performance.now();
    try {
      const command = aptUpdateCommand(args.extra_args, ctx.sudo);
      const gate = ctx.safetyGate.check({
        tool: "mirror_smart_update", risk: "high", targetHost: ctx.targetHost,
        command: command.argv.join(" "),
        description: "Update package lists; on mirror faults the sources list is rewritten to another mirror",
        warnings: [`Up to ${args.max_attempts ?? ctx.config.update.max_attempts} attempts; ${ctx.sourcesListPath} may be rewritten`],
        confirmed: args.confirmed, dryRun: args.dry_run,
      });
      if (gate) return gate;
      if (args.dry_run) {
        return success("mirror_smart_update", ctx.targetHost, elapsed(start), null, { command: command.argv.join(" "), sources_list: ctx.sourcesListPath }, { dry_run: true });
      }
      return await runSmartUpdate(ctx, args, execCtx, start);
    } catch (err) {
      return errorFromException("mirror_smart_update", ctx.targetHost, elapsed(start), err);
    }
  });
}

async function runSmartUpdate(
  ctx: PluginContext,
  args: { extra_args: string[]; exclude: string[]; max_attempts?: number },
  execCtx: ExecutionContext,
  start: number,
) {
  const { update } = ctx.config;
  const release = { distributor: ctx.system.distributor, codename: ctx.system.codename, architecture: ctx.system.architecture };
  const effective = resolveEffectiveRelease(ctx.releases, { ...release, upstreamMode: ctx.config.target.upstream_mode });
  const profile = profileFor(effective.distributor);
  const settings = rankingSettings(ctx);
  const custom = await customMirrors(ctx);
  const eolQuery = { distributor: effective.distributor, codename: effective.codename, architecture: ctx.system.architecture, timeoutMs: settings.timeouts.requestMs };

  const result = await smartUpdate(
    {
      runner: new AptUpdateRunner(ctx.executor, { timeoutMs: update.command_timeout_seconds * 1000, sudo: ctx.sudo }),
      switcher: sourcesFile(ctx, effective.distributor),
      rank: async (exclusions, signal) => {
        const report = await discoverAndRank(
          { prober: ctx.prober, registry: ctx.releases, now: ctx.now, sleep: ctx.sleep },
          {
            ...release, ...settings,
            upstreamMode: ctx.config.target.upstream_mode,
            country: ctx.config.target.country,
            customMirrors: custom,
            exclusions,
            maxProbeCount: ctx.config.ranking.max_mirrors,
            signal,
          },
        );
        return report.mirrors;
      },
      checkEol: (signal) => checkEol({ registry: ctx.releases, prober: ctx.prober, now: ctx.now }, { ...eolQuery, signal }),
      archiveUrl: profile.archiveUrl,
      confirmArchive: async (signal) =>
        profile.archiveUrl !== null &&
        archiveServesRelease(ctx.prober, profile.archiveUrl, effective.codename, { timeoutMs: settings.timeouts.requestMs, signal }),
      sleep: ctx.sleep,
    },
    {
      maxAttempts: args.max_attempts ?? update.max_attempts,
      sameMirrorRetries: update.same_mirror_retries,
      backoffMs: update.retry_backoff_seconds * 1000,
      signatures: mergeSignatures(update.signatures),
    },
    { extraArgs: args.extra_args, exclusions: ExclusionSet.of([...ctx.config.exclude, ...args.exclude]), signal: execCtx.signal },
  );

  const data = {
    succeeded: result.succeeded,
    state: result.state,
    retries: result.retries,
    final_mirror: result.finalMirror,
    reason: result.reason ?? null,
    attempts: result.attempts.map((a) => ({
      attempt: a.attempt, mirror: a.mirror, classification: a.classification, reason: a.reason,
      signature: a.signature, exit_code: a.exitCode, duration_ms: a.durationMs, output: a.output,
    })),
  };
  if (result.succeeded) {
    return success("mirror_smart_update", ctx.targetHost, elapsed(start), "apt-get update", data, {
      summary: result.retries === 0 ? "Package lists updated" : `Package lists updated after ${result.retries} retries`,
    });
  }
  const local = result.reason === "fatal-error" || result.reason === "switch-failed";
  return error("mirror_smart_update", ctx.targetHost, elapsed(start), {
    code: "UPDATE_FAILED",
    category: local ? "state" : "network",
    transient: !local,
    message: `apt-get update failed after ${result.attempts.length} attempt(s): ${result.reason ?? "unknown"}`,
    remediation: result.reason === "fatal-error"
      ? ["Review the last attempt's output; this failure is not mirror related"]
      : result.reason === "switch-failed"
        ? ["Check the sources list path (target.sources_list)", "Verify passwordless sudo for cp and install"]
        : ["Retry later", "Add a known-good mirror to target.custom_mirror_file"],
    data,
  });
}
