import type { PluginConfig } from "../types/config.js";
import type { Executor } from "../execution/executor.js";
import type { Prober } from "../http/probe-client.js";
import type { ReleaseRegistry } from "../releases/registry.js";
import type { SystemRelease } from "../distro/detector.js";
import type { SafetyGate } from "../safety/gate.js";
import type { ToolRegistry } from "./registry.js";

/**
 * Shared plugin context, created once at startup and passed to every tool module.
 */
export interface PluginContext {
  readonly config: PluginConfig;
  readonly system: SystemRelease;
  readonly executor: Executor;
  readonly prober: Prober;
  readonly releases: ReleaseRegistry;
  readonly safetyGate: SafetyGate;
  readonly registry: ToolRegistry;
  readonly targetHost: string;
  /** Resolved sources list path. */
  readonly sourcesListPath: string;
  /** Effective ranking concurrency. */
  readonly concurrency: number;
  readonly sudo: boolean;
  readonly now?: () => Date;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}
