/**
 * Contract interface cache.
 *
 * Keyed by checksummed address. On a miss the fetcher is called once (even if
 * several callers ask concurrently) and the result is written to the store.
 * Interfaces of deployed contracts do not change, so entries never expire.
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { join } from "path";
import { getAddress, type Address } from "viem";
import type { Logger } from "../logger.js";
import { parseAbiJson, type ContractAbi } from "./etherscan.js";

export interface AbiStore {
  read(address: Address): Promise<ContractAbi | null>;
  write(address: Address, abi: ContractAbi): Promise<void>;
}

export class MemoryAbiStore implements AbiStore {
  private readonly entries = new Map<Address, ContractAbi>();

  async read(address: Address): Promise<ContractAbi | null> {
    return this.entries.get(address) ?? null;
  }

  async write(address: Address, abi: ContractAbi): Promise<void> {
    this.entries.set(address, abi);
  }

  get size(): number {
    return this.entries.size;
  }
}

/** One `<address>.json` file per contract. */
export class FileAbiStore implements AbiStore {
  constructor(
    private readonly dir: string,
    private readonly log?: Logger,
  ) {}

  private pathFor(address: Address): string {
    return join(this.dir, `${address}.json`);
  }

  async read(address: Address): Promise<ContractAbi | null> {
    let json: string;
    try {
      json = await readFile(this.pathFor(address), "utf8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    try {
      return parseAbiJson(address, json);
    } catch (err) {
      // A truncated write from an earlier run; fetch it again.
      this.log?.warn({ address, err }, "discarding unreadable cached ABI");
      return null;
    }
  }

  async write(address: Address, abi: ContractAbi): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.pathFor(address), JSON.stringify(abi));
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export type AbiFetcher = (address: Address) => Promise<ContractAbi>;

export class AbiCache {
  private readonly inflight = new Map<Address, Promise<ContractAbi>>();

  constructor(
    private readonly store: AbiStore,
    private readonly fetcher: AbiFetcher,
  ) {}

  get(address: Address): Promise<ContractAbi> {
    const key = getAddress(address);
    const pending = this.inflight.get(key);
    if (pending) return pending;

    const lookup = this.load(key).finally(() => this.inflight.delete(key));
    this.inflight.set(key, lookup);
    return lookup;
  }

  private async load(address: Address): Promise<ContractAbi> {
    const cached = await this.store.read(address);
    if (cached) return cached;
    const abi = await this.fetcher(address);
    await this.store.write(address, abi);
    return abi;
  }
}
