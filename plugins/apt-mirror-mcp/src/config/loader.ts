// Config loader: reads ~/.config/apt-mirror-mcp/config.yaml and deep-merges it over
// DEFAULT_CONFIG, then validates the result against config/schema.ts.
// On first run (no file) the commented defaults are written out.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import type { PluginConfig } from "../types/config.js";
import { configSchema } from "./schema.js";
import { ExclusionSet } from "../mirrors/exclusions.js";
import { ConfigurationError } from "../shared/errors.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "apt-mirror-mcp");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

export const DEFAULT_CONFIG: PluginConfig = {
  target: {
    distributor: null,
    codename: null,
    architecture: null,
    upstream_mode: false,
    country: null,
    custom_mirror_file: null,
    sources_list: null,
  },
  ranking: {
    concurrency: null,
    max_mirrors: 50,
    request_timeout_seconds: 10,
    mirror_timeout_seconds: 30,
    bandwidth_window_ms: 2000,
    bandwidth_min_bytes: 16384,
    bandwidth_max_bytes: 1048576,
    discovery_attempts: 3,
  },
  exclude: [],
  update: {
    max_attempts: 5,
    same_mirror_retries: 2,
    retry_backoff_seconds: 10,
    command_timeout_seconds: 600,
    signatures: { fatal: [], mirror: [], transient: [] },
  },
  safety: { confirmation_threshold: "high", dry_run_bypass_confirmation: true },
};

const DEFAULT_CONFIG_YAML = `# apt-mirror-mcp configuration
# Generated automatically on first run. All values shown are defaults.

target:
  # debian | ubuntu | linuxmint; detected from /etc/os-release when null
  distributor: null
  codename: null
  # dpkg --print-architecture when null
  architecture: null
  # Linux Mint: rank Ubuntu mirrors for the release Mint is built on
  upstream_mode: false
  # Country name used to filter mirror pages; geolocated when null
  country: null
  # File with one mirror URL per line; replaces discovery
  custom_mirror_file: null
  # /etc/apt/sources.list, or a deb822 .sources file when present
  sources_list: null

ranking:
  # null = max(4, 2 x CPUs)
  concurrency: null
  # 0 probes every discovered mirror
  max_mirrors: 50
  request_timeout_seconds: 10
  mirror_timeout_seconds: 30
  bandwidth_window_ms: 2000
  bandwidth_min_bytes: 16384
  bandwidth_max_bytes: 1048576
  discovery_attempts: 3

# Shell globs matched against mirror URLs, e.g. "http://*.example.org/*"
exclude: []

update:
  max_attempts: 5
  same_mirror_retries: 2
  retry_backoff_seconds: 10
  command_timeout_seconds: 600
  # Extra case-insensitive output substrings added to the built-in lists
  signatures:
    fatal: []
    mirror: []
    transient: []

safety:
  confirmation_threshold: high
  dry_run_bypass_confirmation: true
`;

export interface ConfigResult {
  config: PluginConfig;
  configPath: string;
  firstRun: boolean;
}

/**
 * Merge user values over defaults and validate. Malformed exclusion patterns
 * and out-of-range values raise ConfigurationError.
 */
export function resolveConfig(user: unknown, source = "<inline>"): PluginConfig {
  if (user !== null && user !== undefined && !isRecord(user)) {
    throw new ConfigurationError(`Config ${source} must be a mapping`, { source });
  }
  const merged = deepMerge(toRecord(DEFAULT_CONFIG), isRecord(user) ? user : {});
  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid config ${source}: ${details}`, { source });
  }
  // Compiling throws on a malformed pattern.
  ExclusionSet.of(parsed.data.exclude);
  return parsed.data;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found; writing defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: true };
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`, { configPath });
  }
  return { config: resolveConfig(raw, configPath), configPath, firstRun: false };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
