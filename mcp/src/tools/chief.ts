/**
 * Chief Tally Tools
 *
 * Handlers behind the `chief_*` MCP tools and the `chief-tally` CLI.
 * Each one runs the tally against the configured chief and renders the result
 * as text or JSON. Weights are shown in whole tokens (18 decimals).
 */

import pc from "picocolors";
import { formatEther, getAddress, isAddress, type Address } from "viem";
import { loadConfig, type ChiefConfig } from "../config.js";
import { createChiefClient, type ChiefClient } from "../lib/chief/client.js";
import { runChiefTally } from "../lib/chief/pipeline.js";
import { decodeSpell } from "../lib/chief/spell.js";
import { votersFor } from "../lib/chief/tally.js";
import type { ChiefReport, Spell } from "../lib/chief/types.js";
import { AbiCache, FileAbiStore } from "../lib/explorer/abi-cache.js";
import { fetchContractAbi } from "../lib/explorer/etherscan.js";
import { logger, type Logger } from "../lib/logger.js";

export type Colors = ReturnType<typeof pc.createColors>;

const PLAIN = pc.createColors(false);

// ─── Context ─────────────────────────────────────────────────────────────────

export interface ChiefContext {
  config: ChiefConfig;
  client: ChiefClient;
  abis: AbiCache;
  log: Logger;
}

export function createChiefContext(config: ChiefConfig = loadConfig(), log: Logger = logger): ChiefContext {
  const explorer = { ...config.explorer, chainId: config.chainId };
  return {
    config,
    client: createChiefClient(config.chiefAddress, config.rpcUrl),
    abis: new AbiCache(
      new FileAbiStore(config.cacheDir, log.child({ module: "abi-cache" })),
      (address) => fetchContractAbi(address, explorer),
    ),
    log,
  };
}

let defaultContext: ChiefContext | undefined;

function getContext(ctx?: ChiefContext): ChiefContext {
  if (ctx) return ctx;
  defaultContext ??= createChiefContext();
  return defaultContext;
}

export function runTally(ctx: ChiefContext): Promise<ChiefReport> {
  return runChiefTally({
    client: ctx.client,
    abis: ctx.abis,
    fromBlock: ctx.config.fromBlock,
    concurrency: ctx.config.concurrency,
    logChunkSize: ctx.config.logChunkSize,
    log: ctx.log,
  });
}

// ─── Rendering ───────────────────────────────────────────────────────────────

export interface ProposalJson {
  total: string;
  voters: Record<string, string>;
  spell: Spell | null;
}

export interface ReportJson {
  hat: Address;
  proposals: Record<string, ProposalJson>;
}

export function reportToJson(report: ChiefReport): ReportJson {
  const proposals: Record<string, ProposalJson> = {};
  for (const { proposal, total } of report.ranking) {
    const voters: Record<string, string> = {};
    for (const { voter, weight } of votersFor(proposal, report.voters)) {
      voters[voter] = formatEther(weight);
    }
    proposals[proposal] = {
      total: formatEther(total),
      voters,
      spell: report.spells.get(proposal) ?? null,
    };
  }
  return { hat: report.hat, proposals };
}

export function renderJson(report: ChiefReport): string {
  return JSON.stringify(reportToJson(report), null, 2);
}

export function formatSpell(spell: Spell): string {
  return `spell: ${spell.name} ${spell.desc ?? "-"} ${JSON.stringify(spell.args)}`;
}

export function renderText(report: ChiefReport, colors: Colors = PLAIN): string {
  const lines: string[] = [];
  report.ranking.forEach(({ proposal, total }, i) => {
    const heading = `${i + 1}. ${proposal} ${formatEther(total)}`;
    const isHat = proposal.toLowerCase() === report.hat.toLowerCase();
    lines.push(colors.bold(isHat ? colors.green(heading) : colors.yellow(heading)));

    const spell = report.spells.get(proposal);
    if (spell) lines.push(colors.magenta(formatSpell(spell)));

    for (const { voter, weight } of votersFor(proposal, report.voters)) {
      lines.push(`  ${voter} ${formatEther(weight)}`);
    }
    lines.push("");
  });
  return lines.join("\n");
}

// ═══════════════════════════════════════════════════════════════════════════════
// 1. chief_tally: Ranked proposals with supporters and spells
// ═══════════════════════════════════════════════════════════════════════════════

export interface ChiefTallyParams {
  format?: "text" | "json";
}

export async function handleChiefTally(params: ChiefTallyParams, ctx?: ChiefContext): Promise<string> {
  const report = await runTally(getContext(ctx));
  return params.format === "json" ? renderJson(report) : renderText(report);
}

// ═══════════════════════════════════════════════════════════════════════════════
// 2. chief_proposal_voters: Supporters of one proposal
// ═══════════════════════════════════════════════════════════════════════════════

export interface ChiefProposalVotersParams {
  proposal: string;
}

export async function handleChiefProposalVoters(
  params: ChiefProposalVotersParams,
  ctx?: ChiefContext,
): Promise<string> {
  if (!isAddress(params.proposal, { strict: false })) {
    throw new Error("proposal must be an address (0x...)");
  }
  const proposal = getAddress(params.proposal);
  const report = await runTally(getContext(ctx));
  const supporters = votersFor(proposal, report.voters);
  const total = report.ranking.find((entry) => entry.proposal.toLowerCase() === proposal.toLowerCase())?.total ?? 0n;

  return JSON.stringify(
    {
      proposal,
      isHat: proposal.toLowerCase() === report.hat.toLowerCase(),
      total: formatEther(total),
      voters: supporters.map(({ voter, weight }) => ({ voter, weight: formatEther(weight) })),
    },
    null,
    2,
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// 3. chief_decode_spell: Decode one proposal's pending action
// ═══════════════════════════════════════════════════════════════════════════════

export interface ChiefDecodeSpellParams {
  spell: string;
}

export async function handleChiefDecodeSpell(params: ChiefDecodeSpellParams, ctx?: ChiefContext): Promise<string> {
  if (!isAddress(params.spell, { strict: false })) {
    throw new Error("spell must be an address (0x...)");
  }
  const context = getContext(ctx);
  const spell = await decodeSpell(
    { client: context.client, abis: context.abis, log: context.log },
    getAddress(params.spell),
  );
  return JSON.stringify({ address: getAddress(params.spell), spell }, null, 2);
}
