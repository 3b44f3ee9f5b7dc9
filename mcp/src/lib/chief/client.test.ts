import { describe, it, expect } from "vitest";
import { createPublicClient, custom, encodeAbiParameters, pad } from "viem";
import { CHIEF, P1, VOTER_A, slateHash } from "../../__mocks__/chief-client.js";
import { VOTE_NOTE_TOPICS } from "./abi.js";
import { ViemChiefClient } from "./client.js";

// ── Transport ─────────────────────────────────────────────────────────────────

/** A JSON-RPC error as a node reports it. */
class RpcFailure extends Error {
  constructor(
    readonly code: number,
    message: string,
  ) {
    super(message);
  }
}

interface RecordedRequest {
  method: string;
  params?: unknown;
}

function chiefOver(respond: (request: RecordedRequest) => unknown) {
  const requests: RecordedRequest[] = [];
  const transport = custom(
    {
      request: async (request: RecordedRequest) => {
        requests.push(request);
        return respond(request);
      },
    },
    { retryCount: 0 },
  );
  return { chief: new ViemChiefClient(CHIEF, createPublicClient({ transport })), requests };
}

function failingCall(error: Error) {
  return chiefOver(({ method }) => {
    if (method === "eth_call") throw error;
    throw new Error(`unexpected ${method}`);
  }).chief;
}

// ── Tests ─────────────────────────────────────────────────────────────────────

describe("ViemChiefClient.getSlateMember", () => {
  const slate = slateHash("s1");

  it("returns the member stored at the index", async () => {
    const { chief, requests } = chiefOver(() => pad(P1));

    expect(await chief.getSlateMember(slate, 0n)).toBe(P1);
    expect(requests.map((request) => request.method)).toEqual(["eth_call"]);
  });

  it("treats an invalid-opcode failure as the end of the slate", async () => {
    const chief = failingCall(new RpcFailure(-32000, "invalid opcode: INVALID"));
    expect(await chief.getSlateMember(slate, 2n)).toBeNull();
  });

  it("treats a revert as the end of the slate", async () => {
    const chief = failingCall(new RpcFailure(3, "execution reverted"));
    expect(await chief.getSlateMember(slate, 2n)).toBeNull();
  });

  it("rethrows a rate-limit error", async () => {
    const chief = failingCall(new RpcFailure(-32005, "rate limit exceeded"));
    await expect(chief.getSlateMember(slate, 0n)).rejects.toThrow(/rate limit exceeded/);
  });

  it("rethrows a transport failure", async () => {
    const chief = failingCall(new Error("socket hang up"));
    await expect(chief.getSlateMember(slate, 0n)).rejects.toThrow(/socket hang up/);
  });
});

describe("ViemChiefClient.getDeposit", () => {
  it("decodes the deposited balance", async () => {
    const { chief } = chiefOver(() => encodeAbiParameters([{ type: "uint256" }], [42n]));
    expect(await chief.getDeposit(VOTER_A)).toBe(42n);
  });

  it("does not hide a reverted deposit read", async () => {
    const chief = failingCall(new RpcFailure(3, "execution reverted"));
    await expect(chief.getDeposit(VOTER_A)).rejects.toThrow();
  });
});

describe("ViemChiefClient.getNoteLogs", () => {
  it("queries the note topics and converts quantities", async () => {
    const topics = [VOTE_NOTE_TOPICS[0], pad(VOTER_A)];
    const { chief, requests } = chiefOver(() => [
      { blockNumber: "0x10", logIndex: "0x2", topics, data: "0x" },
      { blockNumber: null, logIndex: null, topics, data: "0x" },
    ]);

    const logs = await chief.getNoteLogs({ fromBlock: 16n, toBlock: "latest" }, VOTE_NOTE_TOPICS);

    expect(logs).toEqual([{ blockNumber: 16n, logIndex: 2, topics, data: "0x" }]);
    expect(requests).toEqual([
      {
        method: "eth_getLogs",
        params: [{ address: CHIEF, topics: [[...VOTE_NOTE_TOPICS]], fromBlock: "0x10", toBlock: "latest" }],
      },
    ]);
  });
});
