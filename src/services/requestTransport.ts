import { createHash } from "node:crypto";
import type { ApiRequester, RequestParam } from "../models/cacheClient.js";
import { retMessage, sessionResponseSchema } from "../schemas/responses.js";
import { HTTPException, LimitReached, StatsApiError, Unauthorized, Unavailable } from "../utils/errors.js";
import { Mutex } from "../utils/mutex.js";
import { formatSignatureTimestamp } from "../utils/timestamp.js";

export const DEFAULT_SESSION_LIFETIME_MS = 15 * 60 * 1000;
export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_RETRY_BASE_MS = 500;
const RETRY_JITTER = 0.1;

const INVALID_SESSION = "Invalid session id.";
const LIMIT_REACHED = "Daily request limit reached";

/** Methods that are called without a session. */
const UNAUTHENTICATED_METHODS = new Set(["ping", "createsession"]);

const DEFAULT_TIMEOUT_MS = 5_000;
const METHOD_TIMEOUTS_MS: ReadonlyMap<string, number> = new Map<string, number>([
  ...[
    "getgods",
    "getitems",
    "getchampions",
    "searchplayers",
    "getqueuestats",
    "getbountyitems",
    "getmatchdetails",
    "getmatchhistory",
    "getplayeridbyname",
    "getplayerloadouts",
    "getmatchplayerdetails",
    "getplayeridsbygamertag",
    "getplayeridbyportaluserid"
  ].map((method): [string, number] => [method, 10_000]),
  ...["getfriends", "getplayerbatch", "getmatchidsbyqueue", "getmatchdetailsbatch"].map(
    (method): [string, number] => [method, 20_000]
  ),
  ["getchampionskins", 30_000]
]);

export function timeoutFor(method: string): number {
  return METHOD_TIMEOUTS_MS.get(method.toLowerCase()) ?? DEFAULT_TIMEOUT_MS;
}

export interface RequestTransportConfig {
  baseUrl: string;
  devId: number;
  authKey: string;
  sessionLifetimeMs?: number;
  maxAttempts?: number;
  retryBaseMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

async function defaultSleep(ms: number): Promise<void> {
  if (ms <= 0) return;
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/** Network failures and timeouts; anything else is not worth retrying. */
function isTransient(error: unknown): boolean {
  if (error instanceof StatsApiError) return false;
  if (error instanceof TypeError) return true;
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/** Commas stay literal: batch ids and `h,mm` hour windows are comma separated. */
function encodeSegment(segment: string | number): string {
  return encodeURIComponent(String(segment)).replace(/%2C/gi, ",");
}

/**
 * Signs and sends API calls. Session creation and renewal happen transparently: the session
 * check runs under a lock, so concurrent callers holding an expired session wait for a
 * single `createsession` call and then all use its result.
 */
export class RequestTransport implements ApiRequester {
  private readonly sessionLock = new Mutex();
  private readonly baseUrl: string;
  private readonly authKey: string;
  private sessionId = "";
  private sessionExpiresAtMs = 0;
  private closed = false;

  constructor(private readonly config: RequestTransportConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.authKey = config.authKey.toUpperCase();
  }

  private get now(): number {
    return (this.config.now ?? Date.now)();
  }

  private signature(method: string, timestamp: string): string {
    return createHash("md5").update(`${this.config.devId}${method}${this.authKey}${timestamp}`).digest("hex");
  }

  private getRetryDelayMs(attempt: number): number {
    const base = this.config.retryBaseMs ?? DEFAULT_RETRY_BASE_MS;
    const random = this.config.random ?? Math.random;
    const jitter = 1 + (random() * 2 - 1) * RETRY_JITTER;
    return Math.round(base * attempt * jitter);
  }

  private async sleep(ms: number): Promise<void> {
    await (this.config.sleep ?? defaultSleep)(ms);
  }

  /** Session id to sign the next call with, creating a new session when the current one expired. */
  private ensureSession(): Promise<string> {
    return this.sessionLock.runExclusive(async () => {
      if (this.now >= this.sessionExpiresAtMs) {
        const response = await this.request("createsession");
        const parsed = sessionResponseSchema.safeParse(Array.isArray(response) ? response[0] : response);
        const sessionId = parsed.success ? parsed.data.session_id : undefined;
        if (!sessionId) {
          throw new Unauthorized(parsed.success && parsed.data.ret_msg ? parsed.data.ret_msg : undefined);
        }
        this.sessionId = sessionId;
        console.log("[transport] Created a new session.");
      }
      this.sessionExpiresAtMs = this.now + (this.config.sessionLifetimeMs ?? DEFAULT_SESSION_LIFETIME_MS);
      return this.sessionId;
    });
  }

  private async buildUrl(method: string, params: RequestParam[]): Promise<string> {
    if (method === "ping") return `${this.baseUrl}/pingjson`;

    // The session call may wait on the lock or on retries, so the clock is read after it.
    const sessionId = UNAUTHENTICATED_METHODS.has(method) ? null : await this.ensureSession();
    const timestamp = formatSignatureTimestamp(new Date(this.now));
    const segments: Array<string | number> = [`${method}json`, this.config.devId, this.signature(method, timestamp)];
    if (sessionId !== null) segments.push(sessionId);
    segments.push(timestamp, ...params);
    return `${this.baseUrl}/${segments.map(encodeSegment).join("/")}`;
  }

  async request(method: string, ...params: RequestParam[]): Promise<unknown> {
    if (this.closed) {
      throw new HTTPException("The transport has been closed.");
    }

    const normalizedMethod = method.toLowerCase();
    const fetchImpl = this.config.fetchImpl ?? fetch;
    const maxAttempts = this.config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (attempt > 1) await this.sleep(this.getRetryDelayMs(attempt - 1));

      try {
        const url = await this.buildUrl(normalizedMethod, params);
        const response = await fetchImpl(url, {
          method: "GET",
          signal: AbortSignal.timeout(timeoutFor(normalizedMethod))
        });

        if (response.status === 503) throw new Unavailable();
        if (!response.ok) {
          const text = await response.text();
          throw new HTTPException(`Stats API ${response.status} ${response.statusText}: ${text.slice(0, 200)}`, {
            status: response.status
          });
        }

        const body: unknown = await response.json();
        const message = retMessage(body);
        if (message === INVALID_SESSION) {
          this.sessionExpiresAtMs = 0;
          lastError = new HTTPException(`${normalizedMethod}: ${INVALID_SESSION}`);
          console.warn(`[transport] Session rejected during ${normalizedMethod}, renewing (attempt ${attempt}).`);
          continue;
        }
        if (message?.startsWith(LIMIT_REACHED)) throw new LimitReached(message);
        return body;
      } catch (error) {
        if (error instanceof StatsApiError) throw error;
        if (!isTransient(error)) {
          throw new HTTPException(`Stats API request ${normalizedMethod} failed.`, { cause: error });
        }
        lastError = error;
        console.warn(`[transport] ${normalizedMethod} attempt ${attempt}/${maxAttempts} failed:`, String(error));
      }
    }

    throw new HTTPException(`Stats API request ${normalizedMethod} failed after ${maxAttempts} attempts.`, {
      cause: lastError
    });
  }

  /** Rejects any further requests. In-flight requests are left to finish. */
  async close(): Promise<void> {
    this.closed = true;
    this.sessionId = "";
    this.sessionExpiresAtMs = 0;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
