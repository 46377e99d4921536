import { readFileSync } from "node:fs";
import { execFileSync } from "node:child_process";
import type { Distributor } from "../types/distributor.js";
import { isDistributor } from "../types/distributor.js";
import { MirrorError, MirrorErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/** The local release, as the mirror tools need it. */
export interface SystemRelease {
  readonly distributor: Distributor;
  readonly codename: string;
  readonly architecture: string;
  /** Ubuntu series a Linux Mint system is built on (UBUNTU_CODENAME). */
  readonly upstreamCodename: string | null;
  readonly name: string;
}

export interface ReleaseOverrides {
  readonly distributor?: Distributor | null;
  readonly codename?: string | null;
  readonly architecture?: string | null;
}

/** Parse /etc/os-release into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

const NODE_ARCH_TO_DPKG: Record<string, string> = {
  x64: "amd64",
  arm64: "arm64",
  ia32: "i386",
  arm: "armhf",
  ppc64: "ppc64el",
  s390x: "s390x",
  riscv64: "riscv64",
};

function readOsReleaseFile(): string | null {
  try {
    return readFileSync("/etc/os-release", "utf-8");
  } catch {
    logger.warn("Could not read /etc/os-release");
    return null;
  }
}

/** `dpkg --print-architecture`, or null where dpkg is missing. */
function dpkgArchitecture(): string | null {
  try {
    return execFileSync("dpkg", ["--print-architecture"], { encoding: "utf-8", stdio: ["ignore", "pipe", "ignore"] }).trim() || null;
  } catch {
    return null;
  }
}

export interface DetectorSources {
  readonly osRelease?: () => string | null;
  readonly dpkgArchitecture?: () => string | null;
  readonly nodeArch?: string;
}

/** Resolve distributor, codename and architecture; config overrides win field by field. */
export function detectSystemRelease(overrides: ReleaseOverrides = {}, sources: DetectorSources = {}): SystemRelease {
  const content = (sources.osRelease ?? readOsReleaseFile)();
  const os = content ? parseOsRelease(content) : {};
  const id = (os.ID ?? "").toLowerCase();

  const distributor = overrides.distributor ?? (isDistributor(id) ? id : null);
  if (!distributor) {
    throw new MirrorError(MirrorErrorCode.UNKNOWN_DISTRIBUTOR, `Unsupported distributor '${os.ID ?? "unknown"}'; set target.distributor in config`, { id: os.ID });
  }
  const codename = overrides.codename ?? os.VERSION_CODENAME ?? os.UBUNTU_CODENAME ?? null;
  if (!codename) {
    throw new MirrorError(MirrorErrorCode.UNKNOWN_DISTRIBUTOR, "Could not determine release codename; set target.codename in config");
  }
  const architecture =
    overrides.architecture ?? (sources.dpkgArchitecture ?? dpkgArchitecture)() ?? NODE_ARCH_TO_DPKG[sources.nodeArch ?? process.arch] ?? "amd64";

  const release: SystemRelease = {
    distributor,
    codename: codename.toLowerCase(),
    architecture,
    upstreamCodename: os.UBUNTU_CODENAME?.toLowerCase() ?? null,
    name: os.PRETTY_NAME ?? os.NAME ?? distributor,
  };
  logger.info({ release }, "System release detected");
  return release;
}

/** Whether `sudo -n` works without a password prompt. */
export function verifySudo(): boolean {
  try {
    execFileSync("sudo", ["-n", "true"], { stdio: "ignore" });
    return true;
  } catch {
    return false;
  }
}
