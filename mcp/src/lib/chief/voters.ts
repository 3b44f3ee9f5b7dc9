/**
 * Voter state: replay vote notes, then weigh each voter by their deposit.
 *
 * Replay is strictly sequential in log order. Each decodable note replaces the
 * caller's choice set outright (last write wins), which is why notes must never
 * be reordered or processed in parallel. Weights are looked up afterwards, all
 * at once, through the caller's pool.
 */

import type { Address, Hash } from "viem";
import { toChiefError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Pool } from "../pool.js";
import type { ChiefClient } from "./client.js";
import { decodeVoteNote } from "./events.js";
import type { EtchEntry, Voter, VoteNote } from "./types.js";

/** Every slate that replay may need: all etched slates plus any voted by hash. */
export function collectSlateHashes(etches: readonly EtchEntry[], notes: readonly VoteNote[]): Set<Hash> {
  const slates = new Set<Hash>(etches.map((etch) => etch.slate));
  for (const note of notes) {
    const choice = decodeVoteNote(note.calldata);
    if (choice.kind === "slate") slates.add(choice.slate);
  }
  return slates;
}

export function buildVoters(
  notes: readonly VoteNote[],
  slates: ReadonlyMap<Hash, readonly Address[]>,
  log?: Logger,
): Map<Address, Voter> {
  const voters = new Map<Address, Voter>();

  for (const note of notes) {
    const choice = decodeVoteNote(note.calldata);
    if (choice.kind === "undecodable") {
      log?.debug(
        { guy: note.guy, blockNumber: note.blockNumber, logIndex: note.logIndex, reason: choice.reason },
        "skipping undecodable vote",
      );
      continue;
    }

    const yays = choice.kind === "yays" ? choice.yays : [...(slates.get(choice.slate) ?? [])];
    const voter = voters.get(note.guy);
    if (voter) {
      voter.yays = yays;
    } else {
      voters.set(note.guy, { yays, weight: 0n });
    }
  }

  return voters;
}

export async function resolveWeights(
  client: ChiefClient,
  voters: Map<Address, Voter>,
  pool: Pool,
): Promise<void> {
  const addresses = [...voters.keys()];
  const deposits = await pool.map(addresses, async (address) => {
    try {
      return await client.getDeposit(address);
    } catch (err) {
      throw toChiefError(err, `deposits(${address})`);
    }
  });

  addresses.forEach((address, i) => {
    const voter = voters.get(address);
    if (voter) voter.weight = deposits[i];
  });
}
