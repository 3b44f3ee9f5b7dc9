/**
 * RPC seam for everything the tally reads from the chain.
 *
 * Production uses ViemChiefClient; tests use FakeChiefClient from __mocks__.
 * Nothing else in the pipeline calls viem's transport directly.
 */

import {
  BaseError,
  ContractFunctionRevertedError,
  ExecutionRevertedError,
  createPublicClient,
  hexToBigInt,
  hexToNumber,
  http,
  numberToHex,
  type Address,
  type Hash,
  type Hex,
  type PublicClient,
} from "viem";
import { CHIEF_ABI, ETCH_EVENT, SPELL_ABI } from "./abi.js";
import type { EtchEntry } from "./types.js";

export type BlockBound = bigint | "latest";

export interface BlockRange {
  fromBlock: bigint;
  toBlock: BlockBound;
}

/** A log entry as the node returns it, before any decoding. */
export interface RawLog {
  blockNumber: bigint;
  logIndex: number;
  topics: readonly Hex[];
  data: Hex;
}

export interface SpellAction {
  whom: Address;
  data: Hex;
}

export interface ChiefClient {
  readonly address: Address;
  getBlockNumber(): Promise<bigint>;
  getEtchLogs(range: BlockRange): Promise<EtchEntry[]>;
  /** Anonymous ds-note logs whose first topic is one of `sigTopics`. */
  getNoteLogs(range: BlockRange, sigTopics: readonly Hex[]): Promise<RawLog[]>;
  /** Member `index` of a slate, or null once the index is past the end. */
  getSlateMember(slate: Hash, index: bigint): Promise<Address | null>;
  getDeposit(voter: Address): Promise<bigint>;
  getHat(): Promise<Address>;
  getSpellAction(spell: Address): Promise<SpellAction>;
}

function toQuantity(bound: BlockBound): Hex | "latest" {
  return bound === "latest" ? "latest" : numberToHex(bound);
}

/** Array reads past the end revert (or hit INVALID on old compilers). */
export function isOutOfRange(err: unknown): boolean {
  if (!(err instanceof BaseError)) return false;
  const reverted = err.walk(
    (e) => e instanceof ContractFunctionRevertedError || e instanceof ExecutionRevertedError,
  );
  return reverted !== null || /invalid opcode|reverted/i.test(err.details ?? "");
}

export class ViemChiefClient implements ChiefClient {
  constructor(
    public readonly address: Address,
    private readonly client: PublicClient,
  ) {}

  async getBlockNumber(): Promise<bigint> {
    return this.client.getBlockNumber();
  }

  async getEtchLogs(range: BlockRange): Promise<EtchEntry[]> {
    const logs = await this.client.getLogs({
      address: this.address,
      event: ETCH_EVENT,
      fromBlock: range.fromBlock,
      toBlock: range.toBlock,
      strict: true,
    });
    const etches: EtchEntry[] = [];
    for (const log of logs) {
      if (log.blockNumber == null || log.logIndex == null) continue; // pending
      etches.push({ slate: log.args.slate, blockNumber: log.blockNumber, logIndex: log.logIndex });
    }
    return etches;
  }

  async getNoteLogs(range: BlockRange, sigTopics: readonly Hex[]): Promise<RawLog[]> {
    const logs = await this.client.request({
      method: "eth_getLogs",
      params: [
        {
          address: this.address,
          topics: [[...sigTopics]],
          fromBlock: toQuantity(range.fromBlock),
          toBlock: toQuantity(range.toBlock),
        },
      ],
    });
    const raw: RawLog[] = [];
    for (const log of logs) {
      if (log.blockNumber === null || log.logIndex === null) continue; // pending
      raw.push({
        blockNumber: hexToBigInt(log.blockNumber),
        logIndex: hexToNumber(log.logIndex),
        topics: log.topics,
        data: log.data,
      });
    }
    return raw;
  }

  async getSlateMember(slate: Hash, index: bigint): Promise<Address | null> {
    try {
      return await this.client.readContract({
        address: this.address,
        abi: CHIEF_ABI,
        functionName: "slates",
        args: [slate, index],
      });
    } catch (err) {
      if (isOutOfRange(err)) return null;
      throw err;
    }
  }

  async getDeposit(voter: Address): Promise<bigint> {
    return this.client.readContract({
      address: this.address,
      abi: CHIEF_ABI,
      functionName: "deposits",
      args: [voter],
    });
  }

  async getHat(): Promise<Address> {
    return this.client.readContract({
      address: this.address,
      abi: CHIEF_ABI,
      functionName: "hat",
    });
  }

  async getSpellAction(spell: Address): Promise<SpellAction> {
    const [whom, data] = await Promise.all([
      this.client.readContract({ address: spell, abi: SPELL_ABI, functionName: "whom" }),
      this.client.readContract({ address: spell, abi: SPELL_ABI, functionName: "data" }),
    ]);
    return { whom, data };
  }
}

export function createChiefClient(address: Address, rpcUrl: string): ChiefClient {
  return new ViemChiefClient(address, createPublicClient({ transport: http(rpcUrl) }));
}
