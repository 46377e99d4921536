// Release table loader. The bundled data/releases.yaml is read once at startup;
// a user-supplied file with the same layout can replace it.
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { Distributor } from "../types/distributor.js";
import type { Release } from "../types/release.js";
import { ConfigurationError } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Path of the table shipped with the package (src/ and dist/ sit beside data/). */
export const BUNDLED_RELEASES_PATH = join(__dirname, "..", "..", "data", "releases.yaml");

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const releaseEntry = z.object({
  series: z.string().min(1),
  codename: z.string().min(1),
  version: z.coerce.string(),
  created_date: isoDate.nullish(),
  release_date: isoDate.nullish(),
  eol_date: isoDate.nullish(),
  extended_eol_date: isoDate.nullish(),
  is_lts: z.boolean().default(false),
  compatible_repository: z.string().min(1).nullish(),
});

const releaseTable = z.object({
  debian: z.array(releaseEntry).default([]),
  ubuntu: z.array(releaseEntry).default([]),
  linuxmint: z.array(releaseEntry).default([]),
});

type ReleaseEntry = z.infer<typeof releaseEntry>;

function toRelease(distributor: Distributor, entry: ReleaseEntry): Release {
  return {
    distributor,
    series: entry.series.toLowerCase(),
    codename: entry.codename,
    version: entry.version,
    createdDate: entry.created_date ?? null,
    releaseDate: entry.release_date ?? null,
    eolDate: entry.eol_date ?? null,
    extendedEolDate: entry.extended_eol_date ?? null,
    isLts: entry.is_lts,
    compatibleRepository: entry.compatible_repository?.toLowerCase() ?? null,
  };
}

/** Parse release-table YAML. Throws ConfigurationError when the table is malformed. */
export function parseReleaseTable(yamlText: string, source = "<inline>"): Release[] {
  const parsed = releaseTable.safeParse(parseYaml(yamlText) ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid release table ${source}: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`, { source });
  }
  const table = parsed.data;
  return [
    ...table.debian.map((e) => toRelease("debian", e)),
    ...table.ubuntu.map((e) => toRelease("ubuntu", e)),
    ...table.linuxmint.map((e) => toRelease("linuxmint", e)),
  ];
}

export function loadReleaseTable(path: string = BUNDLED_RELEASES_PATH): Release[] {
  const releases = parseReleaseTable(readFileSync(path, "utf-8"), path);
  logger.debug({ path, count: releases.length }, "Release table loaded");
  return releases;
}
