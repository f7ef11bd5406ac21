import { similarityAbove } from "../utils/similarity.js";
import { CacheObject } from "./cacheObject.js";

export interface FuzzyOptions {
  /** Maximum number of matches, a positive integer. Defaults to 3. */
  limit?: number;
  /** Minimum similarity in `[0, 1]`. Defaults to 0.6. */
  cutoff?: number;
}

export interface FuzzySearchOptions extends FuzzyOptions {
  /** Also search names of the stand-in objects created by `cacheObject`. */
  withCached?: boolean;
  withScores?: boolean;
}

export interface ScoredMatch<V> {
  match: V;
  score: number;
}

function validateFuzzyOptions(limit: number, cutoff: number): void {
  if (typeof limit !== "number" || !Number.isInteger(limit)) {
    throw new TypeError(`limit must be an integer, got ${String(limit)}`);
  }
  if (limit <= 0) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }
  if (typeof cutoff !== "number" || Number.isNaN(cutoff)) {
    throw new TypeError(`cutoff must be a number, got ${String(cutoff)}`);
  }
  if (cutoff < 0 || cutoff > 1) {
    throw new RangeError(`cutoff must be within [0, 1], got ${cutoff}`);
  }
}

/**
 * Ordered collection indexed by id and by case-insensitive name, where `K` is the identity
 * each element is filed under and `V` is what a key resolves to.
 */
abstract class LookupBase<K extends CacheObject, T, V> implements Iterable<T> {
  protected readonly items: T[] = [];
  protected readonly byId = new Map<number, V>();
  protected readonly byName = new Map<string, V>();
  protected readonly keysById = new Map<number, K>();
  protected readonly keysByName = new Map<string, K>();
  private readonly cachedById = new Map<number, CacheObject>();
  private readonly cachedByName = new Map<string, CacheObject>();

  constructor(
    items: Iterable<T>,
    protected readonly keyOf: (item: T) => K
  ) {
    for (const item of items) this.add(item);
  }

  /** Appends `item` and files it under its key's id and name. */
  add(item: T): void {
    this.items.push(item);
    const key = this.keyOf(item);
    if (key.hasId) {
      if (!this.keysById.has(key.id)) this.keysById.set(key.id, key);
      this.byId.set(key.id, this.indexValue(this.byId.get(key.id), item));
    }
    if (key.hasName) {
      const nameKey = key.name.toLowerCase();
      if (!this.keysByName.has(nameKey)) this.keysByName.set(nameKey, key);
      this.byName.set(nameKey, this.indexValue(this.byName.get(nameKey), item));
    }
  }

  /** Merges `item` into whatever is already filed under the same key. */
  protected abstract indexValue(existing: V | undefined, item: T): V;

  get size(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  at(index: number): T | undefined {
    return this.items.at(index);
  }

  toArray(): T[] {
    return [...this.items];
  }

  get(key: number | string, options?: { withCached?: false }): V | undefined;
  get(key: number | string, options: { withCached: boolean }): V | CacheObject | undefined;
  get(key: number | string, options?: { withCached?: boolean }): V | CacheObject | undefined {
    const found = typeof key === "number" ? this.byId.get(key) : this.byName.get(key.toLowerCase());
    if (found !== undefined || !options?.withCached) return found;
    return typeof key === "number" ? this.cachedById.get(key) : this.cachedByName.get(key.toLowerCase());
  }

  getFuzzyMatches(name: string, options?: FuzzyOptions & { withCached?: false; withScores?: false }): V[];
  getFuzzyMatches(name: string, options: FuzzyOptions & { withCached?: false; withScores: true }): Array<ScoredMatch<V>>;
  getFuzzyMatches(name: string, options: FuzzyOptions & { withCached: true; withScores?: false }): Array<V | CacheObject>;
  getFuzzyMatches(
    name: string,
    options: FuzzyOptions & { withCached: true; withScores: true }
  ): Array<ScoredMatch<V | CacheObject>>;
  getFuzzyMatches(
    name: string,
    options: FuzzySearchOptions = {}
  ): Array<V | CacheObject> | Array<ScoredMatch<V | CacheObject>> {
    const { limit = 3, cutoff = 0.6, withCached = false, withScores = false } = options;
    validateFuzzyOptions(limit, cutoff);

    const query = name.toLowerCase();
    const scored: Array<ScoredMatch<V | CacheObject>> = [];
    for (const [candidate, value] of this.byName) {
      const score = similarityAbove(candidate, query, cutoff);
      if (score !== null) scored.push({ match: value, score });
    }
    if (withCached) {
      for (const [candidate, value] of this.cachedByName) {
        if (this.byName.has(candidate)) continue;
        const score = similarityAbove(candidate, query, cutoff);
        if (score !== null) scored.push({ match: value, score });
      }
    }

    scored.sort((left, right) => right.score - left.score);
    const top = scored.slice(0, limit);
    return withScores ? top : top.map((entry) => entry.match);
  }

  getFuzzy(name: string, cutoff = 0.6): V | undefined {
    return this.getFuzzyMatches(name, { limit: 1, cutoff })[0];
  }

  /**
   * Resolves an id or name against the index, falling back to a stand-in `CacheObject`.
   * Stand-ins are remembered, so asking again for the same id or name returns the same
   * instance; a stand-in known only by id is replaced once its name shows up, and vice
   * versa. The index itself is never touched.
   */
  cacheObject(id: number = CacheObject.DEFAULT_ID, name: string = CacheObject.DEFAULT_NAME): K | CacheObject {
    const hasId = id !== CacheObject.DEFAULT_ID;
    const hasName = name !== CacheObject.DEFAULT_NAME;
    const nameKey = name.toLowerCase();

    const known = (hasId ? this.keysById.get(id) : undefined) ?? (hasName ? this.keysByName.get(nameKey) : undefined);
    if (known) return known;

    const cachedById = hasId ? this.cachedById.get(id) : undefined;
    if (cachedById && (cachedById.hasName || !hasName)) return cachedById;
    if (!cachedById && hasName) {
      const cachedByName = this.cachedByName.get(nameKey);
      if (cachedByName && (cachedByName.hasId || !hasId)) return cachedByName;
    }

    const created = new CacheObject(id, name);
    if (hasId) this.cachedById.set(id, created);
    if (hasName) this.cachedByName.set(nameKey, created);
    return created;
  }
}

/** One element per key. */
export class Lookup<K extends CacheObject, T> extends LookupBase<K, T, T> {
  static from<T extends CacheObject>(items: Iterable<T>): Lookup<T, T> {
    return new Lookup(items, (item) => item);
  }

  protected indexValue(existing: T | undefined, item: T): T {
    return existing ?? item;
  }
}

/** Any number of elements per key, e.g. several loadouts for one champion. */
export class LookupGroup<K extends CacheObject, T> extends LookupBase<K, T, T[]> {
  protected indexValue(existing: T[] | undefined, item: T): T[] {
    if (!existing) return [item];
    existing.push(item);
    return existing;
  }

  keys(): K[] {
    const seen = new Set<K>();
    for (const item of this.items) seen.add(this.keyOf(item));
    return [...seen];
  }
}
