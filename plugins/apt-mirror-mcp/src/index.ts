// Programmatic API. The MCP server entry point is server.ts.
export type { Distributor } from "./types/distributor.js";
export { DISTRIBUTORS, isDistributor } from "./types/distributor.js";
export type { Release, EolReport, EolStatus } from "./types/release.js";
export type { CandidateMirror, MirrorStatus, RankedMirror, RankTarget, RankTier, Staleness } from "./types/mirror.js";
export type { UpdateAttempt, UpdateResult, SignatureSet } from "./types/update.js";
export type { PluginConfig } from "./types/config.js";

export { MirrorError, MirrorErrorCode, ConfigurationError } from "./shared/errors.js";
export { loadConfig, resolveConfig, DEFAULT_CONFIG } from "./config/loader.js";
export { ReleaseRegistry } from "./releases/registry.js";
export { loadReleaseTable, parseReleaseTable } from "./releases/loader.js";
export { checkEol, applicableEolDate } from "./releases/eol.js";
export { HttpProbeClient, type Prober } from "./http/probe-client.js";
export { DISTRIBUTOR_PROFILES, profileFor, type DistributorProfile } from "./backends/dispatch.js";
export { ExclusionSet } from "./mirrors/exclusions.js";
export { rankMirrors, sortByRank, type RankRequest, type RankingResult } from "./mirrors/ranking.js";
export { discoverAndRank, selectBestMirror, type DiscoveryReport, type DiscoveryRequest } from "./mirrors/discovery.js";
export { classifyUpdateOutput, DEFAULT_SIGNATURES, mergeSignatures } from "./update/classifier.js";
export { smartUpdate, DEFAULT_UPDATE_POLICY, type UpdateRunner, type MirrorSwitcher } from "./update/orchestrator.js";
export { AptUpdateRunner } from "./update/apt.js";
export { LocalExecutor, type Executor, type ExecResult } from "./execution/executor.js";
export { parseSourcesList, findCurrentMirror, replaceMirror, generateSourcesList } from "./distro/sources-list.js";
export { SourcesListFile } from "./distro/sources-file.js";
export { detectSystemRelease } from "./distro/detector.js";
