export const DISTRIBUTORS = ["debian", "ubuntu", "linuxmint"] as const;

/** Distributors with a mirror backend. Linux Mint is the Ubuntu-based derivative. */
export type Distributor = (typeof DISTRIBUTORS)[number];

export function isDistributor(value: string): value is Distributor {
  return DISTRIBUTORS.some((d) => d === value);
}
