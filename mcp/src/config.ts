/**
 * Runtime configuration, read from the environment and validated with zod.
 *
 * Environment variables:
 *   CHIEF_RPC_URL         : Ethereum JSON-RPC endpoint
 *   CHIEF_ADDRESS         : governance contract (default: mainnet DSChief)
 *   CHIEF_FROM_BLOCK      : first block to scan (default: the chief's deployment block)
 *   CHIEF_CHAIN_ID        : chain id passed to the explorer API
 *   CHIEF_CONCURRENCY     : max outstanding lookups per fan-out phase
 *   CHIEF_LOG_CHUNK_SIZE  : split log queries into windows of N blocks (0 = one query)
 *   CHIEF_CACHE_DIR       : where fetched contract interfaces are kept
 *   ETHERSCAN_API_URL     : explorer endpoint
 *   ETHERSCAN_API_KEY     : explorer key (optional)
 *
 * There is no retry or timeout setting: a failed lookup fails its phase and a
 * stalled one stalls it. Wrap the collaborators if you need either.
 */

import { homedir } from "os";
import { join } from "path";
import { getAddress, isAddress, type Address } from "viem";
import { z } from "zod";
import { ConfigError } from "./lib/errors.js";

export const DEFAULT_CHIEF_ADDRESS = "0x9eF05f7F6deB616fd37aC3c959a2dDD25A54E4F5";
export const DEFAULT_CHIEF_BLOCK = 7_705_361n;

function defaultCacheDir(env: NodeJS.ProcessEnv): string {
  const base = env.XDG_CACHE_HOME ?? join(env.HOME ?? homedir(), ".cache");
  return join(base, "chief");
}

const addressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), "not an address")
  .transform((value): Address => getAddress(value));

const envSchema = z.object({
  CHIEF_RPC_URL: z.string().url().default("https://ethereum-rpc.publicnode.com"),
  CHIEF_ADDRESS: addressSchema.default(DEFAULT_CHIEF_ADDRESS),
  CHIEF_FROM_BLOCK: z.coerce.bigint().nonnegative().default(DEFAULT_CHIEF_BLOCK),
  CHIEF_CHAIN_ID: z.coerce.number().int().positive().default(1),
  CHIEF_CONCURRENCY: z.coerce.number().int().positive().default(10),
  CHIEF_LOG_CHUNK_SIZE: z.coerce.bigint().nonnegative().default(0n),
  CHIEF_CACHE_DIR: z.string().min(1).optional(),
  ETHERSCAN_API_URL: z.string().url().default("https://api.etherscan.io/v2/api"),
  ETHERSCAN_API_KEY: z.string().min(1).optional(),
});

export interface ChiefConfig {
  rpcUrl: string;
  chiefAddress: Address;
  fromBlock: bigint;
  chainId: number;
  concurrency: number;
  logChunkSize: bigint;
  cacheDir: string;
  explorer: {
    apiUrl: string;
    apiKey?: string;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ChiefConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => issue.path.join(".")));
  }
  const e = parsed.data;
  return {
    rpcUrl: e.CHIEF_RPC_URL,
    chiefAddress: e.CHIEF_ADDRESS,
    fromBlock: e.CHIEF_FROM_BLOCK,
    chainId: e.CHIEF_CHAIN_ID,
    concurrency: e.CHIEF_CONCURRENCY,
    logChunkSize: e.CHIEF_LOG_CHUNK_SIZE,
    cacheDir: e.CHIEF_CACHE_DIR ?? defaultCacheDir(env),
    explorer: {
      apiUrl: e.ETHERSCAN_API_URL,
      ...(e.ETHERSCAN_API_KEY ? { apiKey: e.ETHERSCAN_API_KEY } : {}),
    },
  };
}
