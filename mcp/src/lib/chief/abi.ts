import { pad, toFunctionSelector, type Hex } from "viem";

// ─── ABIs (subset, only what we need for reads and note decoding) ───────────

export const CHIEF_ABI = [
  {
    name: "hat",
    type: "function",
    stateMutability: "view",
    inputs: [],
    outputs: [{ name: "", type: "address" }],
  },
  {
    name: "slates",
    type: "function",
    stateMutability: "view",
    inputs: [
      { name: "", type: "bytes32" },
      { name: "", type: "uint256" },
    ],
    outputs: [{ name: "", type: "address" }],
  },
  {
    name: "deposits",
    type: "function",
    stateMutability: "view",
    inputs: [{ name: "", type: "address" }],
    outputs: [{ name: "", type: "uint256" }],
  },
] as const;

export const ETCH_EVENT = {
  name: "Etch",
  type: "event",
  anonymous: false,
  inputs: [{ name: "slate", type: "bytes32", indexed: true }],
} as const;

export const VOTE_YAYS_ABI = [
  {
    name: "vote",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [{ name: "yays", type: "address[]" }],
    outputs: [{ name: "", type: "bytes32" }],
  },
] as const;

export const VOTE_SLATE_ABI = [
  {
    name: "vote",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [{ name: "slate", type: "bytes32" }],
    outputs: [],
  },
] as const;

export const SPELL_ABI = [
  {
    name: "whom",
    type: "function",
    stateMutability: "view",
    inputs: [],
    outputs: [{ name: "", type: "address" }],
  },
  {
    name: "data",
    type: "function",
    stateMutability: "view",
    inputs: [],
    outputs: [{ name: "", type: "bytes" }],
  },
] as const;

/** ds-note payload: `LogNote(bytes4 indexed sig, address indexed guy, bytes32 indexed foo, bytes32 indexed bar, uint wad, bytes fax) anonymous`. */
export const NOTE_DATA_PARAMS = [
  { name: "wad", type: "uint256" },
  { name: "fax", type: "bytes" },
] as const;

export const VOTE_YAYS_SIGNATURE = "vote(address[])";
export const VOTE_SLATE_SIGNATURE = "vote(bytes32)";

export const VOTE_YAYS_SELECTOR = toFunctionSelector(VOTE_YAYS_SIGNATURE);
export const VOTE_SLATE_SELECTOR = toFunctionSelector(VOTE_SLATE_SIGNATURE);

/** ds-note stores the selector as a bytes4 topic, i.e. left-aligned in 32 bytes. */
export function noteTopic(signature: string): Hex {
  return pad(toFunctionSelector(signature), { dir: "right", size: 32 });
}

export const VOTE_NOTE_TOPICS = [
  noteTopic(VOTE_YAYS_SIGNATURE),
  noteTopic(VOTE_SLATE_SIGNATURE),
] as const;

/** Functions and events the chief's declared interface must expose. */
export const REQUIRED_CHIEF_FUNCTIONS = [
  "hat()",
  "slates(bytes32,uint256)",
  "deposits(address)",
  VOTE_YAYS_SIGNATURE,
  VOTE_SLATE_SIGNATURE,
] as const;

export const REQUIRED_CHIEF_EVENTS = ["Etch(bytes32)"] as const;

