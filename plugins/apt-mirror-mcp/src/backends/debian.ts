import type { CandidateMirror } from "../types/mirror.js";
import type { DiscoveryContext } from "./types.js";
import { fetchText } from "../http/fetch-text.js";
import { MirrorError, MirrorErrorCode } from "../shared/errors.js";
import { parseTables, httpLinks, textOf } from "./html.js";
import { logger } from "../logger.js";

export const DEBIAN_MIRRORS_URL = "https://www.debian.org/mirror/list";

/**
 * The mirror page has a table of primary sites followed by one organised by
 * country: a row holding just the country name, then one row per mirror.
 * Fewer than 3 country mirrors pulls in the primary sites as well.
 */
export function parseDebianMirrorPage(html: string, country: string | null): CandidateMirror[] {
  const tables = parseTables(html);
  if (tables.length === 0) {
    throw new MirrorError(MirrorErrorCode.DISCOVERY_FAILED, `No <table> in Debian mirror page (${DEBIAN_MIRRORS_URL})`);
  }
  const mirrors: CandidateMirror[] = [];
  const byCountry = tables[1];
  if (country !== null && byCountry) {
    let inCountry = false;
    for (const row of Array.from(byCountry.querySelectorAll("tr"))) {
      if (inCountry) {
        const [url] = httpLinks(row);
        if (!url) break;
        mirrors.push({ url, source: "mirror-page" });
      } else if (textOf(row) === country) {
        inCountry = true;
      }
    }
  }
  if (mirrors.length < 3) {
    for (const url of httpLinks(tables[0])) mirrors.push({ url, source: "mirror-page" });
  }
  return mirrors;
}

export async function discoverDebianMirrors(ctx: DiscoveryContext): Promise<CandidateMirror[]> {
  const country = await ctx.country();
  logger.info({ url: DEBIAN_MIRRORS_URL, country }, "Discovering Debian mirrors");
  const html = await fetchText(ctx.prober, DEBIAN_MIRRORS_URL, {
    timeoutMs: Math.max(ctx.timeoutMs, 20_000),
    attempts: ctx.attempts,
    signal: ctx.signal,
    sleep: ctx.sleep,
  });
  const mirrors = parseDebianMirrorPage(html, country);
  if (mirrors.length === 0) {
    throw new MirrorError(MirrorErrorCode.DISCOVERY_FAILED, `Failed to discover any Debian mirrors (using ${DEBIAN_MIRRORS_URL})`);
  }
  logger.info({ count: mirrors.length }, "Discovered Debian mirrors");
  return mirrors;
}
