import type { CandidateMirror } from "../types/mirror.js";
import type { DiscoveryContext } from "./types.js";
import { fetchText } from "../http/fetch-text.js";
import { MirrorError, MirrorErrorCode } from "../shared/errors.js";
import { parseTables, textOf } from "./html.js";
import { logger } from "../logger.js";

export const LINUXMINT_MIRRORS_URL = "https://linuxmint.com/mirrors.php";

/** The mirror page spells some countries differently from the geolocation services. */
const COUNTRY_ALIASES: Record<string, string> = {
  "United States": "USA",
};

/**
 * Rows of the third table that mention the country, widened to the
 * "Worldwide" rows when that yields fewer than 3.
 */
export function parseLinuxMintMirrorPage(html: string, country: string | null): CandidateMirror[] {
  const tables = parseTables(html);
  const table = tables[2];
  if (!table) {
    throw new MirrorError(MirrorErrorCode.DISCOVERY_FAILED, `Mirror table missing from Linux Mint mirror page (${LINUXMINT_MIRRORS_URL})`);
  }
  const rows = Array.from(table.querySelectorAll("tr"));
  const collect = (label: string): CandidateMirror[] => {
    const found: CandidateMirror[] = [];
    for (const row of rows) {
      if (!textOf(row).includes(label)) continue;
      for (const cell of Array.from(row.querySelectorAll("td"))) {
        const text = textOf(cell);
        if (text.startsWith("http://") || text.startsWith("https://")) found.push({ url: text, source: "mirror-page" });
      }
    }
    return found;
  };

  const label = country === null ? "Worldwide" : (COUNTRY_ALIASES[country] ?? country);
  let mirrors = collect(label);
  if (mirrors.length < 3 && label !== "Worldwide") {
    logger.info({ country: label, found: mirrors.length }, "Too few Linux Mint mirrors in country; adding worldwide mirrors");
    mirrors = [...mirrors, ...collect("Worldwide")];
  }
  return mirrors;
}

export async function discoverLinuxMintMirrors(ctx: DiscoveryContext): Promise<CandidateMirror[]> {
  const country = await ctx.country();
  logger.info({ url: LINUXMINT_MIRRORS_URL, country }, "Discovering Linux Mint mirrors");
  const html = await fetchText(ctx.prober, LINUXMINT_MIRRORS_URL, {
    timeoutMs: Math.max(ctx.timeoutMs, 20_000),
    attempts: ctx.attempts,
    signal: ctx.signal,
    sleep: ctx.sleep,
  });
  const mirrors = parseLinuxMintMirrorPage(html, country);
  if (mirrors.length === 0) {
    throw new MirrorError(MirrorErrorCode.DISCOVERY_FAILED, `Failed to discover any Linux Mint mirrors (using ${LINUXMINT_MIRRORS_URL})`);
  }
  logger.info({ count: mirrors.length }, "Discovered Linux Mint mirrors");
  return mirrors;
}
