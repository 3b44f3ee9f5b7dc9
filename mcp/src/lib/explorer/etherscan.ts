/**
 * Etherscan contract-interface client.
 *
 * Uses the v2 multichain endpoint: `module=contract&action=getabi&chainid=…`.
 * The ABI comes back JSON-encoded inside `result` and is validated with
 * abitype's zod schema before anyone sees it.
 */

import type { AbiParameter } from "abitype";
import { Abi } from "abitype/zod";
import type { Address } from "viem";
import { z } from "zod";
import { InterfaceMismatchError, NetworkError, errorMessage } from "../errors.js";

export type ContractAbi = z.infer<typeof Abi>;

export interface ExplorerOptions {
  apiUrl: string;
  apiKey?: string;
  chainId: number;
}

function formatType(param: AbiParameter): string {
  const components = "components" in param ? param.components : undefined;
  if (param.type.startsWith("tuple") && components) {
    return `(${components.map(formatType).join(",")})${param.type.slice("tuple".length)}`;
  }
  return param.type;
}

/** Canonical `name(type,…)` form used for selectors and topics. */
export function formatSignature(item: { name: string; inputs: readonly AbiParameter[] }): string {
  return `${item.name}(${item.inputs.map(formatType).join(",")})`;
}

/** Signatures of every function and event an interface declares. */
export function declaredSignatures(abi: ContractAbi): Set<string> {
  const signatures = new Set<string>();
  for (const item of abi) {
    if (item.type === "function" || item.type === "event") signatures.add(formatSignature(item));
  }
  return signatures;
}

/** The one refusal that says something about the contract rather than the explorer. */
const UNVERIFIED = /not verified/i;

const envelopeSchema = z.object({
  status: z.string(),
  message: z.string(),
  result: z.string(),
});

export function parseAbiJson(address: Address, json: string): ContractAbi {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new NetworkError(`Malformed ABI for ${address}: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = Abi.safeParse(raw);
  if (!parsed.success) {
    throw new NetworkError(`Malformed ABI for ${address}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

export async function fetchContractAbi(
  address: Address,
  options: ExplorerOptions,
  fetchImpl: typeof fetch = fetch,
): Promise<ContractAbi> {
  const url = new URL(options.apiUrl);
  url.searchParams.set("chainid", String(options.chainId));
  url.searchParams.set("module", "contract");
  url.searchParams.set("action", "getabi");
  url.searchParams.set("address", address);
  if (options.apiKey) url.searchParams.set("apikey", options.apiKey);

  let res: Response;
  try {
    res = await fetchImpl(url);
  } catch (err) {
    throw new NetworkError(`Explorer unreachable: ${errorMessage(err)}`, { cause: err });
  }
  if (!res.ok) {
    throw new NetworkError(`Explorer API error: ${res.status}`);
  }

  const envelope = envelopeSchema.safeParse(await res.json().catch(() => null));
  if (!envelope.success) {
    throw new NetworkError(`Explorer returned an unexpected payload for ${address}`);
  }
  if (envelope.data.status !== "1") {
    const reason = envelope.data.result;
    if (UNVERIFIED.test(reason)) {
      throw new InterfaceMismatchError(address, `No interface for ${address}: ${reason}`);
    }
    // Rate limits, missing or invalid keys: the explorer is unavailable to us.
    throw new NetworkError(`Explorer refused the request for ${address}: ${reason}`);
  }
  return parseAbiJson(address, envelope.data.result);
}
