import { describe, it, expect } from "vitest";
import type { Address } from "viem";
import { ETHER, P1, P2, P3, VOTER_A, VOTER_B, VOTER_C } from "../../__mocks__/chief-client.js";
import { tally, votersFor } from "./tally.js";
import type { Voter } from "./types.js";

function votersOf(entries: Array<[Address, Address[], bigint]>): Map<Address, Voter> {
  return new Map(entries.map(([address, yays, weight]) => [address, { yays, weight }]));
}

describe("tally", () => {
  it("ranks proposals by total deposited weight", () => {
    const voters = votersOf([
      [VOTER_A, [P2], 10n * ETHER],
      [VOTER_B, [P1, P3], 5n * ETHER],
    ]);

    expect(tally(voters)).toEqual([
      { proposal: P2, total: 10n * ETHER },
      { proposal: P1, total: 5n * ETHER },
      { proposal: P3, total: 5n * ETHER },
    ]);
  });

  it("sums the weights of every voter backing a proposal", () => {
    const voters = votersOf([
      [VOTER_A, [P1], 3n],
      [VOTER_B, [P1, P2], 4n],
      [VOTER_C, [P2], 1n],
    ]);

    expect(tally(voters)).toEqual([
      { proposal: P1, total: 7n },
      { proposal: P2, total: 5n },
    ]);
  });

  it("counts a proposal once per voter however often it is listed", () => {
    const voters = votersOf([[VOTER_A, [P1, P1, P1], 2n]]);
    expect(tally(voters)).toEqual([{ proposal: P1, total: 2n }]);
  });

  it("matches proposals regardless of address case", () => {
    const lower: Address = "0xabc0000000000000000000000000000000000001";
    const mixed: Address = "0xABC0000000000000000000000000000000000001";
    const voters = votersOf([
      [VOTER_A, [lower], 1n],
      [VOTER_B, [mixed], 2n],
    ]);

    expect(tally(voters)).toEqual([{ proposal: lower, total: 3n }]);
  });

  it("keeps proposals backed only by zero-weight voters", () => {
    const voters = votersOf([
      [VOTER_A, [P1], 1n],
      [VOTER_B, [P2], 0n],
    ]);

    expect(tally(voters)).toEqual([
      { proposal: P1, total: 1n },
      { proposal: P2, total: 0n },
    ]);
  });

  it("breaks ties by ascending address", () => {
    const voters = votersOf([
      [VOTER_A, [P3], 4n],
      [VOTER_B, [P1], 4n],
      [VOTER_C, [P2], 4n],
    ]);

    expect(tally(voters).map((entry) => entry.proposal)).toEqual([P1, P2, P3]);
  });

  it("returns nothing for no voters", () => {
    expect(tally(new Map())).toEqual([]);
  });

  it("totals add up to the weight each voter spreads over distinct proposals", () => {
    const voters = votersOf([
      [VOTER_A, [P1, P2], 6n],
      [VOTER_B, [P2, P3, P2], 9n],
      [VOTER_C, [], 100n],
    ]);

    const sum = tally(voters).reduce((acc, entry) => acc + entry.total, 0n);
    expect(sum).toBe(6n * 2n + 9n * 2n);
  });
});

describe("votersFor", () => {
  it("lists voters with weight behind the proposal, heaviest first", () => {
    const voters = votersOf([
      [VOTER_A, [P1], 2n],
      [VOTER_B, [P1, P2], 8n],
      [VOTER_C, [P2], 5n],
    ]);

    expect(votersFor(P1, voters)).toEqual([
      { voter: VOTER_B, weight: 8n },
      { voter: VOTER_A, weight: 2n },
    ]);
  });

  it("omits voters with zero weight", () => {
    const voters = votersOf([
      [VOTER_A, [P1], 0n],
      [VOTER_B, [P1], 1n],
    ]);

    expect(votersFor(P1, voters)).toEqual([{ voter: VOTER_B, weight: 1n }]);
  });

  it("orders equal weights by address", () => {
    const voters = votersOf([
      [VOTER_C, [P1], 3n],
      [VOTER_A, [P1], 3n],
    ]);

    expect(votersFor(P1, voters).map((entry) => entry.voter)).toEqual([VOTER_A, VOTER_C]);
  });

  it("returns nothing for a proposal nobody backs", () => {
    expect(votersFor(P3, votersOf([[VOTER_A, [P1], 1n]]))).toEqual([]);
  });
});
