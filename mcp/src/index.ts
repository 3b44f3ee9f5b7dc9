#!/usr/bin/env node
/**
 * Chief Tally MCP Server
 *
 * Exposes the chief tally over MCP (stdio): the ranked proposals, the
 * supporters of a single proposal, and spell decoding.
 *
 * Environment variables: see src/config.ts (CHIEF_RPC_URL, ETHERSCAN_API_KEY, ...)
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";

import {
  handleChiefTally,
  handleChiefProposalVoters,
  handleChiefDecodeSpell,
} from "./tools/chief.js";
import { logger } from "./lib/logger.js";

const server = new McpServer({
  name: "chief-tally-mcp",
  version: "0.1.0",
});

// ─── Tally Tools ───────────────────────────────────────────────────────────────

server.tool(
  "chief_tally",
  [
    "Rebuild the chief's voting state from its on-chain event history and rank every proposal by deposited weight.",
    "Each proposal lists its supporters and, when it is a spell, the decoded action.",
    "The proposal the chief currently recognizes (the hat) is reported separately.",
  ].join(" "),
  {
    format: z.enum(["text", "json"]).optional()
      .describe("Output format: text (ranked list) or json (machine-readable). Default: text"),
  },
  async ({ format }) => ({
    content: [{ type: "text" as const, text: await handleChiefTally({ format }) }],
  })
);

server.tool(
  "chief_proposal_voters",
  "List the voters currently supporting one proposal, heaviest first, with their deposited weight.",
  { proposal: z.string().describe("Proposal (spell) address, 0x-prefixed") },
  async ({ proposal }) => ({
    content: [{ type: "text" as const, text: await handleChiefProposalVoters({ proposal }) }],
  })
);

server.tool(
  "chief_decode_spell",
  "Decode the pending action of a spell contract against its target's verified interface. Returns spell=null when it cannot be decoded.",
  { spell: z.string().describe("Spell contract address, 0x-prefixed") },
  async ({ spell }) => ({
    content: [{ type: "text" as const, text: await handleChiefDecodeSpell({ spell }) }],
  })
);

// ─── Start ─────────────────────────────────────────────────────────────────────

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Chief tally MCP server running on stdio");
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
