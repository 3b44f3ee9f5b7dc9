import type { Address, Hash, Hex } from "viem";

/** Position of a log entry in the chain's total order. */
export interface LogPosition {
  blockNumber: bigint;
  logIndex: number;
}

/** Slate-creation event. */
export interface EtchEntry extends LogPosition {
  slate: Hash;
}

/** Vote-cast ds-note: who called, and the raw calldata of the call. */
export interface VoteNote extends LogPosition {
  guy: Address;
  calldata: Hex;
}

export type VoteChoice =
  | { kind: "yays"; yays: Address[] }
  | { kind: "slate"; slate: Hash }
  | { kind: "undecodable"; reason: string };

export interface Voter {
  /** Choice set of the voter's most recent decodable vote. */
  yays: Address[];
  /** Deposited balance in wei. */
  weight: bigint;
}

export interface TallyEntry {
  proposal: Address;
  total: bigint;
}

export interface VoterWeight {
  voter: Address;
  weight: bigint;
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface Spell {
  name: string;
  args: Record<string, JsonValue>;
  desc: string | null;
}

export interface ChiefReport {
  hat: Address;
  ranking: TallyEntry[];
  voters: Map<Address, Voter>;
  spells: Map<Address, Spell>;
}
