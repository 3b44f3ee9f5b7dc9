/**
 * Tally engine.
 *
 * Totals are exact wei sums. Each voter adds their weight at most once per
 * proposal, however many times the proposal appears in their yays.
 * Equal totals are ordered by ascending address (byte order) so the ranking
 * is deterministic.
 */

import type { Address } from "viem";
import type { TallyEntry, Voter, VoterWeight } from "./types.js";

function byWeightThenAddress(a: [Address, bigint], b: [Address, bigint]): number {
  if (a[1] !== b[1]) return a[1] > b[1] ? -1 : 1;
  const x = a[0].toLowerCase();
  const y = b[0].toLowerCase();
  return x < y ? -1 : x > y ? 1 : 0;
}

function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function tally(voters: ReadonlyMap<Address, Voter>): TallyEntry[] {
  // Keyed by lowercase address; the first spelling seen is kept for display.
  const totals = new Map<string, [Address, bigint]>();

  for (const voter of voters.values()) {
    const counted = new Set<string>();
    for (const proposal of voter.yays) {
      const key = proposal.toLowerCase();
      if (counted.has(key)) continue;
      counted.add(key);
      const entry = totals.get(key);
      if (entry) entry[1] += voter.weight;
      else totals.set(key, [proposal, voter.weight]);
    }
  }

  return [...totals.values()]
    .sort(byWeightThenAddress)
    .map(([proposal, total]) => ({ proposal, total }));
}

export function votersFor(proposal: Address, voters: ReadonlyMap<Address, Voter>): VoterWeight[] {
  const supporters: [Address, bigint][] = [];
  for (const [address, voter] of voters) {
    if (voter.weight > 0n && voter.yays.some((yay) => sameAddress(yay, proposal))) {
      supporters.push([address, voter.weight]);
    }
  }
  return supporters.sort(byWeightThenAddress).map(([voter, weight]) => ({ voter, weight }));
}
