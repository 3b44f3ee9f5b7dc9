/**
 * In-memory ChiefClient for tests: no RPC, configurable responses, call tracking.
 */

import { Abi } from "abitype/zod";
import {
  encodeAbiParameters,
  encodeFunctionData,
  keccak256,
  pad,
  toHex,
  type Address,
  type Hash,
  type Hex,
} from "viem";
import {
  CHIEF_ABI,
  ETCH_EVENT,
  NOTE_DATA_PARAMS,
  VOTE_SLATE_ABI,
  VOTE_SLATE_SIGNATURE,
  VOTE_YAYS_ABI,
  VOTE_YAYS_SIGNATURE,
  noteTopic,
} from "../lib/chief/abi.js";
import type { BlockRange, ChiefClient, RawLog, SpellAction } from "../lib/chief/client.js";
import type { EtchEntry } from "../lib/chief/types.js";

// Digit-only addresses are already in checksum form.
export const CHIEF = "0x9000000000000000000000000000000000000009" as const;
export const MOM = "0x8000000000000000000000000000000000000008" as const;
export const P1 = "0x1000000000000000000000000000000000000001" as const;
export const P2 = "0x2000000000000000000000000000000000000002" as const;
export const P3 = "0x3000000000000000000000000000000000000003" as const;
export const VOTER_A = "0x0000000000000000000000000000000000001001" as const;
export const VOTER_B = "0x0000000000000000000000000000000000002002" as const;
export const VOTER_C = "0x0000000000000000000000000000000000003003" as const;

export const ETHER = 10n ** 18n;

export function slateHash(label: string): Hash {
  return keccak256(toHex(label));
}

export function yaysCalldata(yays: readonly Address[]): Hex {
  return encodeFunctionData({ abi: VOTE_YAYS_ABI, functionName: "vote", args: [yays] });
}

export function slateCalldata(slate: Hash): Hex {
  return encodeFunctionData({ abi: VOTE_SLATE_ABI, functionName: "vote", args: [slate] });
}

/** A ds-note log as the chief emits it for a call with `calldata`. */
export function noteLog(
  guy: Address,
  calldata: Hex,
  blockNumber: bigint,
  logIndex = 0,
  signature: string = VOTE_YAYS_SIGNATURE,
): RawLog {
  return {
    blockNumber,
    logIndex,
    topics: [noteTopic(signature), pad(guy), pad("0x00"), pad("0x00")],
    data: encodeAbiParameters(NOTE_DATA_PARAMS, [0n, calldata]),
  };
}

export const CHIEF_INTERFACE = Abi.parse([...CHIEF_ABI, ...VOTE_YAYS_ABI, ...VOTE_SLATE_ABI, ETCH_EVENT]);

export const MOM_INTERFACE = Abi.parse([
  {
    name: "setFee",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [{ name: "ray", type: "uint256" }],
    outputs: [],
  },
  {
    name: "setCap",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [{ name: "wad", type: "uint256" }],
    outputs: [],
  },
]);

function inRange(blockNumber: bigint, range: BlockRange): boolean {
  return blockNumber >= range.fromBlock && (range.toBlock === "latest" || blockNumber <= range.toBlock);
}

export class FakeChiefClient implements ChiefClient {
  blockNumber = 1_000n;
  etches: EtchEntry[] = [];
  noteLogs: RawLog[] = [];
  slates = new Map<Hash, Address[]>();
  deposits = new Map<Address, bigint>();
  hat: Address = P1;
  spells = new Map<Address, SpellAction>();

  failLogs = false;
  failingSlates = new Set<Hash>();
  failingDeposits = new Set<Address>();

  // Call tracking for assertions
  noteQueries: BlockRange[] = [];
  slateMemberCalls: Array<{ slate: Hash; index: bigint }> = [];
  depositCalls: Address[] = [];

  constructor(public readonly address: Address = CHIEF) {}

  /** Append a vote note after every note already recorded. */
  vote(guy: Address, choice: readonly Address[] | Hash, blockNumber: bigint, logIndex = 0): this {
    const calldata = typeof choice === "string" ? slateCalldata(choice) : yaysCalldata(choice);
    const signature = typeof choice === "string" ? VOTE_SLATE_SIGNATURE : VOTE_YAYS_SIGNATURE;
    this.noteLogs.push(noteLog(guy, calldata, blockNumber, logIndex, signature));
    return this;
  }

  etch(slate: Hash, members: Address[], blockNumber: bigint, logIndex = 0): this {
    this.slates.set(slate, members);
    this.etches.push({ slate, blockNumber, logIndex });
    return this;
  }

  async getBlockNumber(): Promise<bigint> {
    return this.blockNumber;
  }

  async getEtchLogs(range: BlockRange): Promise<EtchEntry[]> {
    if (this.failLogs) throw new Error("eth_getLogs: upstream unavailable");
    return this.etches.filter((etch) => inRange(etch.blockNumber, range));
  }

  async getNoteLogs(range: BlockRange, sigTopics: readonly Hex[]): Promise<RawLog[]> {
    if (this.failLogs) throw new Error("eth_getLogs: upstream unavailable");
    this.noteQueries.push(range);
    return this.noteLogs.filter(
      (log) => inRange(log.blockNumber, range) && log.topics[0] !== undefined && sigTopics.includes(log.topics[0]),
    );
  }

  async getSlateMember(slate: Hash, index: bigint): Promise<Address | null> {
    this.slateMemberCalls.push({ slate, index });
    if (this.failingSlates.has(slate)) throw new Error(`eth_call: timeout reading ${slate}`);
    const members = this.slates.get(slate) ?? [];
    return index < BigInt(members.length) ? members[Number(index)] : null;
  }

  async getDeposit(voter: Address): Promise<bigint> {
    this.depositCalls.push(voter);
    if (this.failingDeposits.has(voter)) throw new Error(`eth_call: timeout reading deposits(${voter})`);
    return this.deposits.get(voter) ?? 0n;
  }

  async getHat(): Promise<Address> {
    return this.hat;
  }

  async getSpellAction(spell: Address): Promise<SpellAction> {
    const action = this.spells.get(spell);
    if (!action) throw new Error(`execution reverted: ${spell} has no whom()`);
    return action;
  }
}

/**
 * A small chief history: VOTER_A backs P2 with 10 tokens, VOTER_B backs slate
 * [P1, P3] with 5, VOTER_C changed their mind to nothing. P2 holds the hat and
 * P1 is a spell that sets MOM's fee to 5% a year.
 */
export function chiefScenario(): FakeChiefClient {
  const slate = slateHash("p1+p3");
  const client = new FakeChiefClient()
    .etch(slate, [P1, P3], 100n)
    .vote(VOTER_A, [P1], 101n)
    .vote(VOTER_B, slate, 102n)
    .vote(VOTER_C, [P3], 103n)
    .vote(VOTER_A, [P2], 104n)
    .vote(VOTER_C, [], 105n);
  client.deposits.set(VOTER_A, 10n * ETHER);
  client.deposits.set(VOTER_B, 5n * ETHER);
  client.deposits.set(VOTER_C, 7n * ETHER);
  client.hat = P2;
  client.spells.set(P1, {
    whom: MOM,
    data: encodeFunctionData({
      abi: [
        {
          name: "setFee",
          type: "function",
          stateMutability: "nonpayable",
          inputs: [{ name: "ray", type: "uint256" }],
          outputs: [],
        },
      ] as const,
      functionName: "setFee",
      args: [1000000001547125957863212448n],
    }),
  });
  return client;
}
