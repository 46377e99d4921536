// Per-distributor dispatch table. Everything that differs between Debian,
// Ubuntu and Linux Mint (base URLs, index paths, sources.list layout, the
// discovery backend) is looked up here by the closed Distributor union.
import type { Distributor } from "../types/distributor.js";
import type { DiscoverMirrors } from "./types.js";
import { discoverDebianMirrors } from "./debian.js";
import { discoverUbuntuMirrors } from "./ubuntu.js";
import { discoverLinuxMintMirrors } from "./linuxmint.js";

export interface DistributorProfile {
  readonly id: Distributor;
  readonly displayName: string;
  /** Official archive: the staleness reference and a candidate in its own right. */
  readonly referenceUrl: string;
  readonly securityUrl: string;
  /** Old-releases archive for end-of-life releases; null when there is none. */
  readonly archiveUrl: string | null;
  /** Release index fetched for availability and its `Date:` field. */
  readonly indexPath: (codename: string) => string;
  /** URL whose 404 means the release has left the security archive. */
  readonly securityProbeUrl: (codename: string) => string;
  /** Architectures the extended EOL covers; null means every architecture. */
  readonly extendedEolArchitectures: readonly string[] | null;
  readonly suites: {
    readonly valid: readonly string[];
    readonly default: readonly string[];
  };
  readonly components: readonly string[];
  /** Suite name for a sources.list suite keyword. */
  readonly suiteName: (suite: string, codename: string) => string;
  readonly discover: DiscoverMirrors;
}

/** Debian releases that still used `<codename>/updates` for security. */
const DEBIAN_LEGACY_SECURITY = new Set(["wheezy", "jessie", "stretch", "buster"]);
const DEBIAN_ROLLING = new Set(["sid", "experimental"]);

function debianSuiteName(suite: string, codename: string): string {
  if (suite === "release") return codename;
  if (suite === "security") return DEBIAN_LEGACY_SECURITY.has(codename) ? `${codename}/updates` : `${codename}-security`;
  return `${codename}-${suite}`;
}

function ubuntuSuiteName(suite: string, codename: string): string {
  return suite === "release" ? codename : `${codename}-${suite}`;
}

const DEBIAN: DistributorProfile = {
  id: "debian",
  displayName: "Debian",
  referenceUrl: "http://deb.debian.org/debian",
  securityUrl: "http://security.debian.org/debian-security",
  archiveUrl: "http://archive.debian.org/debian",
  indexPath: (codename) => (DEBIAN_ROLLING.has(codename) ? `dists/${codename}/Release` : `dists/${codename}-updates/Release`),
  securityProbeUrl: (codename) => `http://security.debian.org/debian-security/dists/${debianSuiteName("security", codename)}/Release`,
  extendedEolArchitectures: ["i386", "amd64", "armel", "armhf", "arm64"],
  suites: { valid: ["release", "security", "updates", "backports"], default: ["release", "security", "updates"] },
  components: ["main", "contrib", "non-free", "non-free-firmware"],
  suiteName: debianSuiteName,
  discover: discoverDebianMirrors,
};

const UBUNTU: DistributorProfile = {
  id: "ubuntu",
  displayName: "Ubuntu",
  referenceUrl: "http://archive.ubuntu.com/ubuntu",
  securityUrl: "http://security.ubuntu.com/ubuntu",
  archiveUrl: "http://old-releases.ubuntu.com/ubuntu",
  indexPath: (codename) => `dists/${codename}-security/Release`,
  securityProbeUrl: (codename) => `http://security.ubuntu.com/ubuntu/dists/${codename}-security/Release`,
  extendedEolArchitectures: null,
  suites: { valid: ["release", "security", "updates", "backports", "proposed"], default: ["release", "updates", "backports", "security"] },
  components: ["main", "restricted", "universe", "multiverse"],
  suiteName: ubuntuSuiteName,
  discover: discoverUbuntuMirrors,
};

const LINUXMINT: DistributorProfile = {
  id: "linuxmint",
  displayName: "Linux Mint",
  referenceUrl: "http://packages.linuxmint.com",
  securityUrl: "http://security.ubuntu.com/ubuntu",
  archiveUrl: null,
  indexPath: (codename) => `dists/${codename}/Release`,
  securityProbeUrl: (codename) => `http://packages.linuxmint.com/dists/${codename}/Release`,
  extendedEolArchitectures: null,
  suites: { valid: ["release"], default: ["release"] },
  components: ["main", "upstream", "import", "backport"],
  suiteName: (_suite, codename) => codename,
  discover: discoverLinuxMintMirrors,
};

export const DISTRIBUTOR_PROFILES: Record<Distributor, DistributorProfile> = {
  debian: DEBIAN,
  ubuntu: UBUNTU,
  linuxmint: LINUXMINT,
};

export function profileFor(distributor: Distributor): DistributorProfile {
  return DISTRIBUTOR_PROFILES[distributor];
}

/** Index checked on the archive tier; old releases have no `-updates` guarantee. */
export function archiveIndexPath(codename: string): string {
  return `dists/${codename}/Release`;
}

/** Package index streamed for the bandwidth measurement. */
export function bandwidthPath(codename: string, architecture: string): string {
  return `dists/${codename}/main/binary-${architecture}/Packages.gz`;
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}
