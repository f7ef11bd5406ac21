import { Language, Languages } from "../data/enums.js";
import type { ApiRequester, CacheClient, RequestParam } from "../models/cacheClient.js";
import { CacheEntry, type ReferenceSnapshot } from "../models/cacheEntry.js";
import { errorMessage, NotFound } from "../utils/errors.js";
import { Mutex } from "../utils/mutex.js";
import type { SnapshotStore, StoredSnapshot } from "./snapshotStore.js";

export const DEFAULT_CACHE_TTL_MS = 12 * 60 * 60 * 1000;

export interface DataCacheOptions {
  enabled?: boolean;
  defaultLanguage?: Language;
  ttlMs?: number;
  snapshotStore?: SnapshotStore;
  now?: () => number;
}

export interface FetchEntryOptions {
  /** Skip the freshness check and any persisted snapshot. */
  forceRefresh?: boolean;
  /** Store the resulting entry; defaults to whether the cache is enabled. */
  cache?: boolean;
}

function languageLabel(language: Language): string {
  return Languages.nameOf(language) ?? String(language);
}

/**
 * Owns the per-language reference data entries. Refreshes for one language are serialized,
 * so callers arriving during a refresh wait for it and then read its result.
 */
export class DataCache implements CacheClient {
  enabled: boolean;
  private language: Language;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly entries = new Map<Language, CacheEntry>();
  private readonly fallbacks = new Map<Language, CacheEntry>();
  private readonly locks = new Map<Language, Mutex>();

  constructor(
    private readonly requester: ApiRequester,
    private readonly options: DataCacheOptions = {}
  ) {
    this.enabled = options.enabled ?? true;
    this.language = options.defaultLanguage ?? Language.English;
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  get defaultLanguage(): Language {
    return this.language;
  }

  setDefaultLanguage(language: Language): void {
    this.language = language;
  }

  request(method: string, ...params: RequestParam[]): Promise<unknown> {
    return this.requester.request(method, ...params);
  }

  /** The stored entry for `language` without fetching, fresh or not. */
  peekEntry(language: Language = this.language): CacheEntry | undefined {
    return this.entries.get(language);
  }

  /** Downloads and stores the entry for `language`. Resolves to whether it succeeded. */
  async initialize(language: Language = this.language): Promise<boolean> {
    const entry = await this.fetchEntry(language, { forceRefresh: true, cache: true });
    return entry !== null;
  }

  async fetchEntry(language: Language = this.language, options: FetchEntryOptions = {}): Promise<CacheEntry | null> {
    const { forceRefresh = false, cache = this.enabled } = options;

    return this.lockFor(language).runExclusive(async () => {
      const nowMs = this.now();
      const existing = this.entries.get(language);
      if (!forceRefresh && existing?.isFresh(nowMs)) return existing;

      try {
        const stored = forceRefresh ? null : await this.loadStoredSnapshot(language, nowMs);
        const snapshot = stored?.snapshot ?? (await this.downloadSnapshot(language));
        const expiresAt = stored?.expiresAtMs ?? snapshot.fetchedAt + this.ttlMs;
        const entry = new CacheEntry(this, language, snapshot, { createdAt: snapshot.fetchedAt, expiresAt });

        if (cache) {
          this.entries.set(language, entry);
          if (!stored) await this.persistSnapshot(snapshot, expiresAt);
        }
        console.log(
          `[data-cache] Loaded ${languageLabel(language)} reference data (${entry.champions.size} champions, ${entry.devices.size} devices).`
        );
        return entry;
      } catch (error) {
        if (existing) {
          console.warn(
            `[data-cache] Refresh of ${languageLabel(language)} reference data failed, serving the previous entry:`,
            errorMessage(error)
          );
          return existing;
        }
        console.error(`[data-cache] Failed to fetch ${languageLabel(language)} reference data:`, error);
        return null;
      }
    });
  }

  /**
   * The entry entities should resolve references against. Falls back to an empty entry, so
   * references become stand-in objects, when the cache is disabled or nothing could be fetched.
   */
  async resolveEntry(language: Language = this.language): Promise<CacheEntry> {
    if (!this.enabled) return this.fallbackFor(language);
    return (await this.fetchEntry(language)) ?? this.fallbackFor(language);
  }

  clear(): void {
    this.entries.clear();
    this.fallbacks.clear();
  }

  private lockFor(language: Language): Mutex {
    let lock = this.locks.get(language);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(language, lock);
    }
    return lock;
  }

  private fallbackFor(language: Language): CacheEntry {
    let entry = this.fallbacks.get(language);
    if (!entry) {
      entry = CacheEntry.empty(this, language);
      this.fallbacks.set(language, entry);
    }
    return entry;
  }

  private async downloadSnapshot(language: Language): Promise<ReferenceSnapshot> {
    const [champions, items] = await Promise.all([
      this.requester.request("getchampions", language),
      this.requester.request("getitems", language)
    ]);
    if (!Array.isArray(champions) || champions.length === 0 || !Array.isArray(items) || items.length === 0) {
      throw new NotFound("Reference data");
    }

    let skins: unknown[] = [];
    try {
      const response = await this.requester.request("getchampionskins", -1, language);
      if (Array.isArray(response)) skins = response;
    } catch (error) {
      console.warn(`[data-cache] Skins for ${languageLabel(language)} unavailable:`, errorMessage(error));
    }

    return { language, champions, items, skins, fetchedAt: this.now() };
  }

  private async loadStoredSnapshot(language: Language, nowMs: number): Promise<StoredSnapshot | null> {
    if (!this.options.snapshotStore) return null;
    try {
      return await this.options.snapshotStore.get(language, nowMs);
    } catch (error) {
      console.warn("[snapshot-store] Failed to read snapshot:", errorMessage(error));
      return null;
    }
  }

  private async persistSnapshot(snapshot: ReferenceSnapshot, expiresAtMs: number): Promise<void> {
    if (!this.options.snapshotStore) return;
    try {
      await this.options.snapshotStore.upsert(snapshot, expiresAtMs);
    } catch (error) {
      console.warn("[snapshot-store] Failed to persist snapshot:", errorMessage(error));
    }
  }
}
