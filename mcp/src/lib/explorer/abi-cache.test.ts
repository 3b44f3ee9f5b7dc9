import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { getAddress, type Address } from "viem";
import { CHIEF, CHIEF_INTERFACE, MOM, MOM_INTERFACE } from "../../__mocks__/chief-client.js";
import { NetworkError } from "../errors.js";
import { AbiCache, FileAbiStore, MemoryAbiStore } from "./abi-cache.js";
import type { ContractAbi } from "./etherscan.js";

function fetcherFor(entries: Record<string, ContractAbi>) {
  return vi.fn(async (address: Address): Promise<ContractAbi> => {
    const abi = entries[address];
    if (!abi) throw new NetworkError(`no interface stubbed for ${address}`);
    return abi;
  });
}

describe("AbiCache", () => {
  it("fetches once and serves later lookups from the store", async () => {
    const store = new MemoryAbiStore();
    const fetcher = fetcherFor({ [CHIEF]: CHIEF_INTERFACE });
    const cache = new AbiCache(store, fetcher);

    expect(await cache.get(CHIEF)).toEqual(CHIEF_INTERFACE);
    expect(await cache.get(CHIEF)).toEqual(CHIEF_INTERFACE);

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(store.size).toBe(1);
  });

  it("normalizes the address before looking it up", async () => {
    const lower: Address = "0xabc0000000000000000000000000000000000001";
    const fetcher = fetcherFor({ [getAddress(lower)]: MOM_INTERFACE });
    const cache = new AbiCache(new MemoryAbiStore(), fetcher);

    await cache.get(lower);

    expect(fetcher).toHaveBeenCalledWith(getAddress(lower));
  });

  it("shares one fetch between concurrent callers", async () => {
    const fetcher = fetcherFor({ [MOM]: MOM_INTERFACE });
    const cache = new AbiCache(new MemoryAbiStore(), fetcher);

    await Promise.all([cache.get(MOM), cache.get(MOM), cache.get(MOM)]);

    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it("does not store a failed fetch", async () => {
    const store = new MemoryAbiStore();
    const cache = new AbiCache(store, fetcherFor({}));

    await expect(cache.get(MOM)).rejects.toThrow(`no interface stubbed for ${MOM}`);
    expect(store.size).toBe(0);
  });
});

describe("FileAbiStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "abi-cache-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns null for an address it has never seen", async () => {
    expect(await new FileAbiStore(dir).read(CHIEF)).toBeNull();
  });

  it("writes one file per address and reads it back", async () => {
    const nested = join(dir, "nested");
    const store = new FileAbiStore(nested);

    await store.write(CHIEF, CHIEF_INTERFACE);

    expect(JSON.parse(await readFile(join(nested, `${CHIEF}.json`), "utf8"))).toEqual(CHIEF_INTERFACE);
    expect(await store.read(CHIEF)).toEqual(CHIEF_INTERFACE);
  });

  it("treats an unreadable file as a miss", async () => {
    await writeFile(join(dir, `${CHIEF}.json`), "[{");
    expect(await new FileAbiStore(dir).read(CHIEF)).toBeNull();
  });
});
