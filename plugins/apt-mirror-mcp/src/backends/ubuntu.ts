import type { CandidateMirror } from "../types/mirror.js";
import type { DiscoveryContext } from "./types.js";
import { fetchText } from "../http/fetch-text.js";
import { MirrorError, MirrorErrorCode } from "../shared/errors.js";
import { parseTables, httpLinks, textOf } from "./html.js";
import { logger } from "../logger.js";

/** Geographically suitable mirrors, one URL per line. */
export const MIRROR_SELECTION_URL = "http://mirrors.ubuntu.com/mirrors.txt";
/** Full archive mirror page, grouped by country headers. */
export const LAUNCHPAD_MIRRORS_URL = "https://launchpad.net/ubuntu/+archivemirrors";

export function parseMirrorSelection(text: string): CandidateMirror[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.startsWith("http://") || line.startsWith("https://"))
    .map((url) => ({ url, source: "mirror-list" as const }));
}

/**
 * Mirrors listed under the `<th>` naming `country` in the first table.
 * Collection stops at the first row without a link after the header.
 */
export function parseLaunchpadMirrors(html: string, country: string | null): CandidateMirror[] {
  const [table] = parseTables(html);
  if (!table) {
    throw new MirrorError(MirrorErrorCode.DISCOVERY_FAILED, `No <table> in Ubuntu mirror page (${LAUNCHPAD_MIRRORS_URL})`);
  }
  const mirrors: CandidateMirror[] = [];
  let inCountry = country === null;
  for (const row of Array.from(table.querySelectorAll("tr"))) {
    const header = row.querySelector("th");
    if (header) {
      if (country !== null && inCountry) break;
      inCountry = country === null || textOf(header) === country;
      continue;
    }
    if (!inCountry) continue;
    const links = httpLinks(row);
    if (links.length === 0) {
      if (country !== null) break;
      continue;
    }
    for (const url of links) mirrors.push({ url, source: "launchpad" });
  }
  return mirrors;
}

async function discoverFromLaunchpad(ctx: DiscoveryContext): Promise<CandidateMirror[]> {
  const country = await ctx.country();
  logger.info({ url: LAUNCHPAD_MIRRORS_URL, country }, "Discovering Ubuntu mirrors from Launchpad");
  const html = await fetchText(ctx.prober, LAUNCHPAD_MIRRORS_URL, {
    timeoutMs: Math.max(ctx.timeoutMs, 70_000),
    attempts: ctx.attempts,
    signal: ctx.signal,
    sleep: ctx.sleep,
  });
  return parseLaunchpadMirrors(html, country);
}

/** mirrors.txt first; Launchpad when it is empty or unreachable, or to top up fewer than 2. */
export async function discoverUbuntuMirrors(ctx: DiscoveryContext): Promise<CandidateMirror[]> {
  let mirrors: CandidateMirror[] = [];
  try {
    const text = await fetchText(ctx.prober, MIRROR_SELECTION_URL, {
      timeoutMs: Math.min(ctx.timeoutMs, 3_000),
      attempts: Math.max(ctx.attempts, 5),
      signal: ctx.signal,
      sleep: ctx.sleep,
    });
    mirrors = parseMirrorSelection(text);
  } catch (err) {
    if (!(err instanceof MirrorError)) throw err;
    logger.warn({ url: MIRROR_SELECTION_URL, error: err.message }, "Mirror selection list unavailable");
  }
  if (mirrors.length < 2) {
    logger.info({ found: mirrors.length }, "Too few Ubuntu mirrors; consulting Launchpad");
    mirrors = [...mirrors, ...(await discoverFromLaunchpad(ctx))];
  }
  if (mirrors.length === 0) {
    throw new MirrorError(MirrorErrorCode.DISCOVERY_FAILED, "Failed to discover any Ubuntu mirrors");
  }
  logger.info({ count: mirrors.length }, "Discovered Ubuntu mirrors");
  return mirrors;
}
