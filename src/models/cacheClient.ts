import type { Language } from "../data/enums.js";
import type { CacheEntry } from "./cacheEntry.js";

export type RequestParam = string | number;

export interface ApiRequester {
  request(method: string, ...params: RequestParam[]): Promise<unknown>;
}

/**
 * What entities receive instead of importing each other: a way to issue requests and to
 * resolve the reference data entry for a language.
 */
export interface CacheClient extends ApiRequester {
  readonly defaultLanguage: Language;
  resolveEntry(language?: Language): Promise<CacheEntry>;
}
