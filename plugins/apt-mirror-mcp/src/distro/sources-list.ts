// sources.list parsing, rewriting and generation. Handles the one-line format
// and deb822 `.sources` stanzas; `[options]` and comments survive a rewrite.
import type { Distributor } from "../types/distributor.js";
import { profileFor } from "../backends/dispatch.js";
import { normalizeMirrorUrl } from "../mirrors/exclusions.js";
import { ConfigurationError, MirrorError, MirrorErrorCode } from "../shared/errors.js";

export interface SourcesEntry {
  readonly line: number;
  readonly type: "deb" | "deb-src";
  /** Raw text between `[` and `]`, or null. */
  readonly options: string | null;
  readonly uri: string;
  readonly suite: string;
  readonly components: readonly string[];
}

const ONE_LINE = /^\s*(deb|deb-src)\s+(?:\[([^\]]*)\]\s+)?(\S+)\s+(\S+)((?:\s+[^\s#]+)*)\s*(?:#.*)?$/;
const MIRROR_SCHEME = /^(https?|ftp|mirror(\+\w+)?):\/\//;

export function isDeb822(text: string): boolean {
  return /^Types:/im.test(text);
}

/** One entry per URI and type. deb822 stanzas expand to several entries. */
export function parseSourcesList(text: string): SourcesEntry[] {
  return isDeb822(text) ? parseDeb822(text) : parseOneLine(text);
}

function parseOneLine(text: string): SourcesEntry[] {
  const entries: SourcesEntry[] = [];
  text.split("\n").forEach((raw, line) => {
    const m = ONE_LINE.exec(raw);
    if (!m) return;
    const type = m[1] === "deb-src" ? "deb-src" : "deb";
    entries.push({
      line,
      type,
      options: m[2]?.trim() ?? null,
      uri: m[3] ?? "",
      suite: m[4] ?? "",
      components: (m[5] ?? "").trim().split(/\s+/).filter(Boolean),
    });
  });
  return entries;
}

interface Stanza {
  readonly firstLine: number;
  readonly fields: Map<string, { value: string; line: number }>;
}

function parseStanzas(text: string): Stanza[] {
  const stanzas: Stanza[] = [];
  let current: Stanza | null = null;
  text.split("\n").forEach((raw, line) => {
    if (raw.trim() === "") {
      current = null;
      return;
    }
    if (raw.trimStart().startsWith("#")) return;
    const m = /^([A-Za-z][A-Za-z0-9-]*):\s*(.*)$/.exec(raw);
    if (!m || !m[1]) return;
    if (!current) {
      current = { firstLine: line, fields: new Map() };
      stanzas.push(current);
    }
    current.fields.set(m[1].toLowerCase(), { value: (m[2] ?? "").trim(), line });
  });
  return stanzas;
}

function parseDeb822(text: string): SourcesEntry[] {
  const entries: SourcesEntry[] = [];
  for (const stanza of parseStanzas(text)) {
    if (stanza.fields.get("enabled")?.value.toLowerCase() === "no") continue;
    const words = (name: string) => (stanza.fields.get(name)?.value ?? "").split(/\s+/).filter(Boolean);
    const uris = stanza.fields.get("uris");
    for (const type of words("types")) {
      if (type !== "deb" && type !== "deb-src") continue;
      for (const uri of words("uris")) {
        for (const suite of words("suites")) {
          entries.push({ line: uris?.line ?? stanza.firstLine, type, options: null, uri, suite, components: words("components") });
        }
      }
    }
  }
  return entries;
}

/** First `deb`/`deb-src` entry with a mirror URL and the `main` component, normalised. */
export function findCurrentMirror(text: string): string {
  const entry = parseSourcesList(text).find((e) => MIRROR_SCHEME.test(e.uri) && e.components.includes("main"));
  if (!entry) {
    throw new MirrorError(MirrorErrorCode.SOURCES_LIST_ERROR, "No deb entry with a 'main' component found in sources list");
  }
  return normalizeMirrorUrl(entry.uri);
}

/**
 * Point every entry whose URI is one of `fromUrls` at `toUrl`. The trailing
 * slash style of each replaced URI is kept.
 */
export function replaceMirror(text: string, fromUrls: readonly string[], toUrl: string): string {
  const from = new Set(fromUrls.map(normalizeMirrorUrl));
  const target = normalizeMirrorUrl(toUrl);
  const swap = (uri: string) => (from.has(normalizeMirrorUrl(uri)) ? target + (uri.endsWith("/") ? "/" : "") : uri);

  const lines = text.split("\n");
  if (isDeb822(text)) {
    return lines
      .map((raw) => {
        const m = /^(URIs:\s*)(.*)$/i.exec(raw);
        if (!m) return raw;
        return (m[1] ?? "") + (m[2] ?? "").split(/(\s+)/).map((part) => (part.trim() === "" ? part : swap(part))).join("");
      })
      .join("\n");
  }
  for (const entry of parseOneLine(text)) {
    const raw = lines[entry.line];
    if (raw === undefined) continue;
    const replacement = swap(entry.uri);
    if (replacement === entry.uri) continue;
    // Skip past the options so a URI inside them is never touched.
    const start = entry.options === null ? 0 : raw.indexOf("]") + 1;
    lines[entry.line] = raw.slice(0, start) + raw.slice(start).replace(entry.uri, replacement);
  }
  return lines.join("\n");
}

export interface GenerateOptions {
  readonly distributor: Distributor;
  readonly mirrorUrl: string;
  readonly codename: string;
  readonly suites?: readonly string[];
  readonly components?: readonly string[];
  readonly enableSources?: boolean;
  /** Archive tier: security suites come from the mirror itself. */
  readonly archive?: boolean;
}

/** One-line sources.list for a mirror and release. */
export function generateSourcesList(options: GenerateOptions): string {
  const profile = profileFor(options.distributor);
  const suites = options.suites ?? profile.suites.default;
  const components = options.components ?? profile.components;
  for (const suite of suites) {
    if (!profile.suites.valid.includes(suite)) {
      throw new ConfigurationError(`Invalid ${profile.displayName} suite '${suite}' (valid: ${profile.suites.valid.join(", ")})`, { suite });
    }
  }
  for (const component of components) {
    if (!profile.components.includes(component)) {
      throw new ConfigurationError(`Invalid ${profile.displayName} component '${component}' (valid: ${profile.components.join(", ")})`, { component });
    }
  }

  const mirror = normalizeMirrorUrl(options.mirrorUrl);
  const types = options.enableSources ? ["deb", "deb-src"] : ["deb"];
  const lines = [`# ${profile.displayName} ${options.codename} sources generated by apt-mirror-mcp using ${mirror}`];
  for (const suite of suites) {
    const uri = suite === "security" && !options.archive ? profile.securityUrl : mirror;
    for (const type of types) {
      lines.push(`${type} ${uri} ${profile.suiteName(suite, options.codename)} ${components.join(" ")}`);
    }
  }
  return lines.join("\n") + "\n";
}
