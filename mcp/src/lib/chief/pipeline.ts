/**
 * End-to-end tally run.
 *
 * chief interface → history → slates → replay → weights → tally → spells → hat
 *
 * Each fan-out phase gets its own pool, awaited before the next phase starts.
 */

import type { Address } from "viem";
import { InterfaceMismatchError, toChiefError } from "../errors.js";
import { declaredSignatures, type ContractAbi } from "../explorer/etherscan.js";
import type { AbiCache } from "../explorer/abi-cache.js";
import type { Logger } from "../logger.js";
import { createPool } from "../pool.js";
import { REQUIRED_CHIEF_EVENTS, REQUIRED_CHIEF_FUNCTIONS } from "./abi.js";
import type { ChiefClient } from "./client.js";
import { readChiefHistory } from "./events.js";
import { SlateCache, SlateResolver } from "./slates.js";
import { decodeSpells } from "./spell.js";
import { tally } from "./tally.js";
import type { ChiefReport } from "./types.js";
import { buildVoters, collectSlateHashes, resolveWeights } from "./voters.js";

export interface TallyDeps {
  client: ChiefClient;
  abis: AbiCache;
  fromBlock: bigint;
  concurrency: number;
  logChunkSize?: bigint;
  log?: Logger;
}

export function assertChiefInterface(address: Address, abi: ContractAbi): void {
  const declared = declaredSignatures(abi);
  const missing = [...REQUIRED_CHIEF_FUNCTIONS, ...REQUIRED_CHIEF_EVENTS].filter(
    (signature) => !declared.has(signature),
  );
  if (missing.length > 0) {
    throw new InterfaceMismatchError(address, `${address} is not a chief: missing ${missing.join(", ")}`);
  }
}

export async function runChiefTally(deps: TallyDeps): Promise<ChiefReport> {
  const { client, abis, log } = deps;

  assertChiefInterface(client.address, await abis.get(client.address));
  log?.info({ chief: client.address }, "got chief");

  const history = await readChiefHistory(client, {
    fromBlock: deps.fromBlock,
    chunkSize: deps.logChunkSize,
    log: log?.child({ module: "events" }),
  });
  log?.info({ etches: history.etches.length, notes: history.notes.length }, "got notes");

  const resolver = new SlateResolver(client, new SlateCache(), log?.child({ module: "slates" }));
  const slates = await resolver.resolveAll(
    collectSlateHashes(history.etches, history.notes),
    createPool(deps.concurrency),
  );
  log?.info({ slates: slates.size }, "got slates");

  const voters = buildVoters(history.notes, slates, log?.child({ module: "voters" }));
  await resolveWeights(client, voters, createPool(deps.concurrency));
  log?.info({ voters: voters.size }, "got voters");

  const ranking = tally(voters);
  log?.info({ proposals: ranking.length }, "got results");

  const spells = await decodeSpells(
    { client, abis, log: log?.child({ module: "spells" }) },
    ranking.map((entry) => entry.proposal),
    createPool(deps.concurrency),
  );
  log?.info({ spells: spells.size }, "got spells");

  let hat: Address;
  try {
    hat = await client.getHat();
  } catch (err) {
    throw toChiefError(err, "hat()");
  }
  log?.info({ hat }, "got hat");

  return { hat, ranking, voters, spells };
}
