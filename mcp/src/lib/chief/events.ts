/**
 * Event log reader for the chief.
 *
 * Two streams are read from the deployment block onward:
 *   - Etch(bytes32 slate) events, one per slate ever created
 *   - anonymous ds-note logs emitted by vote(address[]) and vote(bytes32)
 *
 * Both come back sorted by (blockNumber, logIndex). A failing query aborts the
 * run; a single note that cannot be parsed is dropped.
 */

import {
  decodeAbiParameters,
  getAddress,
  size,
  slice,
  type Hex,
} from "viem";
import { DecodeError, errorMessage, toChiefError } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  NOTE_DATA_PARAMS,
  VOTE_NOTE_TOPICS,
  VOTE_SLATE_ABI,
  VOTE_SLATE_SELECTOR,
  VOTE_YAYS_ABI,
  VOTE_YAYS_SELECTOR,
} from "./abi.js";
import type { BlockRange, ChiefClient, RawLog } from "./client.js";
import type { EtchEntry, LogPosition, VoteChoice, VoteNote } from "./types.js";

export interface ChiefHistory {
  etches: EtchEntry[];
  notes: VoteNote[];
}

export interface HistoryOptions {
  fromBlock: bigint;
  /** Query at most this many blocks per request; 0 for a single request. */
  chunkSize?: bigint;
  log?: Logger;
}

export function compareLogPosition(a: LogPosition, b: LogPosition): number {
  if (a.blockNumber !== b.blockNumber) return a.blockNumber < b.blockNumber ? -1 : 1;
  return a.logIndex - b.logIndex;
}

export function blockWindows(fromBlock: bigint, toBlock: bigint, chunkSize: bigint): BlockRange[] {
  const windows: BlockRange[] = [];
  for (let start = fromBlock; start <= toBlock; start += chunkSize) {
    const end = start + chunkSize - 1n;
    windows.push({ fromBlock: start, toBlock: end < toBlock ? end : toBlock });
  }
  return windows;
}

/** Pull `guy` and the call's calldata (`fax`) out of a ds-note log. */
export function parseNoteLog(raw: RawLog): VoteNote {
  const guyTopic = raw.topics[1];
  if (!guyTopic || size(guyTopic) !== 32) {
    throw new DecodeError("note has no caller topic");
  }
  try {
    const [, fax] = decodeAbiParameters(NOTE_DATA_PARAMS, raw.data);
    return {
      guy: getAddress(slice(guyTopic, 12)),
      calldata: fax,
      blockNumber: raw.blockNumber,
      logIndex: raw.logIndex,
    };
  } catch (err) {
    throw new DecodeError(`note data is not (uint256,bytes): ${errorMessage(err)}`, { cause: err });
  }
}

/** Map vote calldata onto one of the known vote signatures. */
export function decodeVoteNote(calldata: Hex): VoteChoice {
  if (size(calldata) < 4) return { kind: "undecodable", reason: "calldata shorter than a selector" };
  const selector = slice(calldata, 0, 4);
  const args = size(calldata) > 4 ? slice(calldata, 4) : "0x";
  try {
    switch (selector) {
      case VOTE_YAYS_SELECTOR: {
        const [yays] = decodeAbiParameters(VOTE_YAYS_ABI[0].inputs, args);
        return { kind: "yays", yays: [...yays] };
      }
      case VOTE_SLATE_SELECTOR: {
        const [slate] = decodeAbiParameters(VOTE_SLATE_ABI[0].inputs, args);
        return { kind: "slate", slate };
      }
      default:
        return { kind: "undecodable", reason: `unknown selector ${selector}` };
    }
  } catch (err) {
    return { kind: "undecodable", reason: errorMessage(err) };
  }
}

async function queryRanges(client: ChiefClient, options: HistoryOptions): Promise<BlockRange[]> {
  const chunkSize = options.chunkSize ?? 0n;
  if (chunkSize <= 0n) return [{ fromBlock: options.fromBlock, toBlock: "latest" }];
  const head = await client.getBlockNumber();
  return blockWindows(options.fromBlock, head, chunkSize);
}

export async function readChiefHistory(
  client: ChiefClient,
  options: HistoryOptions,
): Promise<ChiefHistory> {
  const etches: EtchEntry[] = [];
  const rawNotes: RawLog[] = [];

  try {
    for (const range of await queryRanges(client, options)) {
      etches.push(...(await client.getEtchLogs(range)));
      rawNotes.push(...(await client.getNoteLogs(range, VOTE_NOTE_TOPICS)));
    }
  } catch (err) {
    throw toChiefError(err, "Log query failed");
  }

  const notes: VoteNote[] = [];
  for (const raw of rawNotes) {
    try {
      notes.push(parseNoteLog(raw));
    } catch (err) {
      options.log?.warn(
        { blockNumber: raw.blockNumber, logIndex: raw.logIndex, reason: errorMessage(err) },
        "skipping malformed vote note",
      );
    }
  }

  etches.sort(compareLogPosition);
  notes.sort(compareLogPosition);
  return { etches, notes };
}
