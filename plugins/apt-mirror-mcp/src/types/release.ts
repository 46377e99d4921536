import type { Distributor } from "./distributor.js";

/** One row of the bundled release table. Dates are ISO `YYYY-MM-DD` strings. */
export interface Release {
  readonly distributor: Distributor;
  /** Lowercase series name, e.g. `bookworm`, `jammy`, `wilma`. */
  readonly series: string;
  /** Display codename, e.g. `Jammy Jellyfish`. */
  readonly codename: string;
  readonly version: string;
  readonly createdDate: string | null;
  readonly releaseDate: string | null;
  readonly eolDate: string | null;
  /** LTS/ESM end of life. For Debian it only covers the LTS architectures. */
  readonly extendedEolDate: string | null;
  readonly isLts: boolean;
  /** Ubuntu series a Linux Mint release is built on. */
  readonly compatibleRepository: string | null;
}

export type EolStatus = "supported" | "end-of-life" | "unknown";

export interface EolReport {
  readonly status: EolStatus;
  readonly source: "release-table" | "security-mirror";
  readonly release?: Release;
  /** The EOL date that was applied, when the table had one. */
  readonly eolDate?: string;
  /** URL probed when the codename was not in the table. */
  readonly checkedUrl?: string;
}
