/**
 * Slate resolver: content hash → ordered proposal list.
 *
 * A slate is read member by member with `slates(hash, i)` until the chief
 * reports the index out of range or returns the zero address. Slates are
 * immutable, so one lookup per hash serves the whole run.
 */

import { zeroAddress, type Address, type Hash } from "viem";
import { NetworkError, toChiefError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Pool } from "../pool.js";
import type { ChiefClient } from "./client.js";

/** Resolved slates for the lifetime of one run; also dedupes in-flight lookups. */
export class SlateCache {
  private readonly entries = new Map<Hash, Promise<Address[]>>();

  getOrLoad(slate: Hash, load: () => Promise<Address[]>): Promise<Address[]> {
    const existing = this.entries.get(slate);
    if (existing) return existing;
    const lookup = load();
    this.entries.set(slate, lookup);
    // A failed lookup is not cached, so a later call retries it.
    void lookup.catch(() => this.entries.delete(slate));
    return lookup;
  }

  get size(): number {
    return this.entries.size;
  }
}

export class SlateResolver {
  constructor(
    private readonly client: ChiefClient,
    private readonly cache: SlateCache = new SlateCache(),
    private readonly log?: Logger,
  ) {}

  resolve(slate: Hash): Promise<Address[]> {
    return this.cache.getOrLoad(slate, () => this.readMembers(slate));
  }

  private async readMembers(slate: Hash): Promise<Address[]> {
    const members: Address[] = [];
    for (let i = 0n; ; i++) {
      let member: Address | null;
      try {
        member = await this.client.getSlateMember(slate, i);
      } catch (err) {
        throw toChiefError(err, `slates(${slate}, ${i})`);
      }
      if (member === null || member === zeroAddress) break;
      members.push(member);
    }
    return members;
  }

  /**
   * Resolve distinct slates concurrently. A slate that fails resolves to `[]`;
   * the batch fails only if every slate in it did.
   */
  async resolveAll(slates: Iterable<Hash>, pool: Pool): Promise<Map<Hash, Address[]>> {
    const distinct = [...new Set(slates)];
    const outcomes = await pool.settle(distinct, (slate) => this.resolve(slate));

    const resolved = new Map<Hash, Address[]>();
    let failures = 0;
    outcomes.forEach((outcome, i) => {
      const slate = distinct[i];
      if (outcome.ok) {
        resolved.set(slate, outcome.value);
        return;
      }
      failures++;
      this.log?.warn({ slate, err: outcome.error.message }, "slate unresolved, treating as empty");
      resolved.set(slate, []);
    });

    if (distinct.length > 0 && failures === distinct.length) {
      throw new NetworkError(`All ${failures} slate lookups failed`);
    }
    return resolved;
  }
}
