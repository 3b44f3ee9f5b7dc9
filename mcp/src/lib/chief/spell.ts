/**
 * Spell decoder.
 *
 * A proposal is usually a DSSpell: it stores a target (`whom`) and the calldata
 * it will send there (`data`). The calldata is decoded against the target's
 * published interface. Anything that goes wrong along the way means "no spell"
 * for that proposal, never an error for the batch.
 */

import { decodeAbiParameters, size, slice, toFunctionSelector, type Address, type Hex } from "viem";
import { InterfaceMismatchError, errorMessage, toChiefError } from "../errors.js";
import type { AbiCache } from "../explorer/abi-cache.js";
import { formatSignature, type ContractAbi } from "../explorer/etherscan.js";
import type { Logger } from "../logger.js";
import type { Pool } from "../pool.js";
import type { ChiefClient } from "./client.js";
import type { JsonValue, Spell } from "./types.js";

export const RAY = 10n ** 27n;
export const SECONDS_PER_YEAR = 60n * 60n * 24n * 365n;

export interface SpellDeps {
  client: ChiefClient;
  abis: AbiCache;
  log?: Logger;
}

// ─── Ray math ────────────────────────────────────────────────────────────────

function rmul(x: bigint, y: bigint): bigint {
  return (x * y + RAY / 2n) / RAY;
}

/** x^n for a 27-decimal fixed-point x, by repeated squaring. */
export function rpow(x: bigint, n: bigint): bigint {
  let z = n % 2n === 1n ? x : RAY;
  for (n /= 2n; n > 0n; n /= 2n) {
    x = rmul(x, x);
    if (n % 2n === 1n) z = rmul(z, x);
  }
  return z;
}

/** Per-second rate (ray) → annualized percentage, two decimals, rounded half up. */
export function annualPercent(ray: bigint): string {
  const delta = rpow(ray, SECONDS_PER_YEAR) - RAY;
  const magnitude = delta < 0n ? -delta : delta;
  const hundredths = (magnitude * 20_000n + RAY) / (2n * RAY);
  const sign = delta < 0n && hundredths > 0n ? "-" : "";
  return `${sign}${hundredths / 100n}.${(hundredths % 100n).toString().padStart(2, "0")}%`;
}

// ─── Calldata decoding ───────────────────────────────────────────────────────

export function toJsonValue(value: unknown): JsonValue {
  if (typeof value === "bigint") return value.toString();
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return value;
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === "object") {
    const record: Record<string, JsonValue> = {};
    for (const [key, inner] of Object.entries(value)) record[key] = toJsonValue(inner);
    return record;
  }
  return String(value);
}

function describe(name: string, args: readonly unknown[]): string | null {
  if (name === "setFee" && typeof args[0] === "bigint") return annualPercent(args[0]);
  return null;
}

/** Decode `data` against `abi`, the interface of `target`. */
export function decodeCall(target: Address, abi: ContractAbi, data: Hex): Spell {
  if (size(data) < 4) throw new InterfaceMismatchError(target, "spell data shorter than a selector");
  const selector = slice(data, 0, 4);

  for (const item of abi) {
    if (item.type !== "function") continue;
    if (toFunctionSelector(formatSignature(item)) !== selector) continue;

    const encodedArgs = size(data) > 4 ? slice(data, 4) : "0x";
    const values: readonly unknown[] = decodeAbiParameters(item.inputs, encodedArgs);
    const args: Record<string, JsonValue> = {};
    item.inputs.forEach((input, i) => {
      args[input.name || `arg${i}`] = toJsonValue(values[i]);
    });
    return { name: item.name, args, desc: describe(item.name, values) };
  }

  throw new InterfaceMismatchError(target, `no function with selector ${selector} on ${target}`);
}

export async function decodeSpell(deps: SpellDeps, proposal: Address): Promise<Spell | null> {
  try {
    const { whom, data } = await deps.client.getSpellAction(proposal);
    const abi = await deps.abis.get(whom);
    return decodeCall(whom, abi, data);
  } catch (err) {
    const reason = toChiefError(err, "spell lookup");
    deps.log?.debug({ proposal, code: reason.code, reason: errorMessage(err) }, "no spell");
    return null;
  }
}

export async function decodeSpells(
  deps: SpellDeps,
  proposals: readonly Address[],
  pool: Pool,
): Promise<Map<Address, Spell>> {
  const decoded = await pool.map(proposals, (proposal) => decodeSpell(deps, proposal));
  const spells = new Map<Address, Spell>();
  proposals.forEach((proposal, i) => {
    const spell = decoded[i];
    if (spell) spells.set(proposal, spell);
  });
  return spells;
}
