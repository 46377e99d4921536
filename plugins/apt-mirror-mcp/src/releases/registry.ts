import type { Distributor } from "../types/distributor.js";
import type { Release } from "../types/release.js";
import { loadReleaseTable } from "./loader.js";

/** Read-only lookup over the release table. Safe to share between concurrent callers. */
export class ReleaseRegistry {
  private readonly releases: readonly Release[];

  constructor(releases: readonly Release[]) {
    this.releases = [...releases];
  }

  static bundled(): ReleaseRegistry {
    return new ReleaseRegistry(loadReleaseTable());
  }

  /** Match by series (`jammy`) or the first word of the codename (`Jammy Jellyfish`). */
  find(distributor: Distributor, codename: string): Release | undefined {
    const needle = codename.trim().toLowerCase();
    return this.releases.find(
      (r) =>
        r.distributor === distributor &&
        (r.series === needle || r.codename.toLowerCase() === needle || r.codename.split(/\s+/)[0]?.toLowerCase() === needle),
    );
  }

  list(distributor?: Distributor): readonly Release[] {
    return distributor ? this.releases.filter((r) => r.distributor === distributor) : this.releases;
  }

  get size(): number {
    return this.releases.length;
  }
}
