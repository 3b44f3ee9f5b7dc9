import { describe, it, expect, vi } from "vitest";
import type { Address } from "viem";
import {
  CHIEF,
  CHIEF_INTERFACE,
  MOM,
  MOM_INTERFACE,
  P1,
  P2,
  P3,
  VOTER_A,
  VOTER_B,
  chiefScenario,
} from "../__mocks__/chief-client.js";
import { loadConfig } from "../config.js";
import { AbiCache, MemoryAbiStore } from "../lib/explorer/abi-cache.js";
import type { ContractAbi } from "../lib/explorer/etherscan.js";
import { makeNoopLogger } from "../lib/logger.js";
import {
  formatSpell,
  handleChiefDecodeSpell,
  handleChiefProposalVoters,
  handleChiefTally,
  renderText,
  reportToJson,
  runTally,
  type ChiefContext,
} from "./chief.js";

// ── Fixtures ──────────────────────────────────────────────────────────────────

function testContext(): ChiefContext {
  const interfaces: Record<string, ContractAbi> = { [CHIEF]: CHIEF_INTERFACE, [MOM]: MOM_INTERFACE };
  return {
    config: { ...loadConfig({ HOME: "/home/tester" }), chiefAddress: CHIEF, fromBlock: 0n },
    client: chiefScenario(),
    abis: new AbiCache(
      new MemoryAbiStore(),
      vi.fn(async (address: Address): Promise<ContractAbi> => interfaces[address]),
    ),
    log: makeNoopLogger(),
  };
}

const SPELL_LINE = 'spell: setFee 5.00% {"ray":"1000000001547125957863212448"}';

// ── Tests ─────────────────────────────────────────────────────────────────────

describe("renderText", () => {
  it("prints each proposal with its spell and supporters", async () => {
    const report = await runTally(testContext());

    expect(renderText(report).split("\n")).toEqual([
      `1. ${P2} 10`,
      `  ${VOTER_A} 10`,
      "",
      `2. ${P1} 5`,
      SPELL_LINE,
      `  ${VOTER_B} 5`,
      "",
      `3. ${P3} 5`,
      `  ${VOTER_B} 5`,
      "",
    ]);
  });
});

describe("formatSpell", () => {
  it("uses a dash when there is no description", () => {
    expect(formatSpell({ name: "setCap", args: { wad: "7" }, desc: null })).toBe('spell: setCap - {"wad":"7"}');
  });
});

describe("reportToJson", () => {
  it("keys proposals by address with decimal totals", async () => {
    const json = reportToJson(await runTally(testContext()));

    expect(json.hat).toBe(P2);
    expect(Object.keys(json.proposals)).toEqual([P2, P1, P3]);
    expect(json.proposals[P1]).toEqual({
      total: "5",
      voters: { [VOTER_B]: "5" },
      spell: { name: "setFee", args: { ray: "1000000001547125957863212448" }, desc: "5.00%" },
    });
    expect(json.proposals[P3].spell).toBeNull();
  });
});

describe("handleChiefTally", () => {
  it("returns text by default", async () => {
    const text = await handleChiefTally({}, testContext());
    expect(text.split("\n")[0]).toBe(`1. ${P2} 10`);
  });

  it("returns parseable JSON when asked", async () => {
    const parsed: unknown = JSON.parse(await handleChiefTally({ format: "json" }, testContext()));
    expect(parsed).toMatchObject({ hat: P2, proposals: { [P2]: { total: "10", voters: { [VOTER_A]: "10" } } } });
  });
});

describe("handleChiefProposalVoters", () => {
  it("lists supporters of a proposal given in any case", async () => {
    const result: unknown = JSON.parse(
      await handleChiefProposalVoters({ proposal: P1.toLowerCase() }, testContext()),
    );

    expect(result).toEqual({
      proposal: P1,
      isHat: false,
      total: "5",
      voters: [{ voter: VOTER_B, weight: "5" }],
    });
  });

  it("reports zero for a proposal nobody backs", async () => {
    const nobody = "0x4000000000000000000000000000000000000004";
    const result: unknown = JSON.parse(await handleChiefProposalVoters({ proposal: nobody }, testContext()));

    expect(result).toEqual({ proposal: nobody, isHat: false, total: "0", voters: [] });
  });

  it("rejects input that is not an address", async () => {
    await expect(handleChiefProposalVoters({ proposal: "P1" }, testContext())).rejects.toThrow(
      "proposal must be an address (0x...)",
    );
  });
});

describe("handleChiefDecodeSpell", () => {
  it("decodes a spell's pending action", async () => {
    const result: unknown = JSON.parse(await handleChiefDecodeSpell({ spell: P1 }, testContext()));

    expect(result).toEqual({
      address: P1,
      spell: { name: "setFee", args: { ray: "1000000001547125957863212448" }, desc: "5.00%" },
    });
  });

  it("returns a null spell for a plain address", async () => {
    const result: unknown = JSON.parse(await handleChiefDecodeSpell({ spell: P2 }, testContext()));
    expect(result).toEqual({ address: P2, spell: null });
  });

  it("rejects input that is not an address", async () => {
    await expect(handleChiefDecodeSpell({ spell: "0x12" }, testContext())).rejects.toThrow(
      "spell must be an address (0x...)",
    );
  });
});
