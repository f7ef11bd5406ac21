import type { ServerStatus } from "../models/serverStatus.js";
import { errorMessage, NotFound } from "../utils/errors.js";

export const DEFAULT_CHECK_INTERVAL_MS = 3 * 60 * 1000;
export const DEFAULT_RECHECK_INTERVAL_MS = 60 * 1000;

/** Called with the new status, or with the previous and the new one. Sync or async. */
export type StatusCallback =
  | ((after: ServerStatus) => unknown)
  | ((before: ServerStatus, after: ServerStatus) => unknown);

type AfterOnlyCallback = (after: ServerStatus) => unknown;

export interface StatusMonitorOptions {
  /** Delay between checks while every platform is operational. */
  checkIntervalMs?: number;
  /** Delay between checks while something is down, limited, or the last check failed. */
  recheckIntervalMs?: number;
}

export interface StatusSource {
  /** The last fetched status, if any. */
  readonly cachedStatus: ServerStatus | null;
  getServerStatus(options: { forceRefresh: boolean }): Promise<ServerStatus>;
}

function takesAfterOnly(callback: StatusCallback): callback is AfterOnlyCallback {
  return callback.length === 1;
}

export function validateStatusCallback(callback: unknown): asserts callback is StatusCallback {
  if (typeof callback !== "function") {
    throw new TypeError("The status callback has to be a function.");
  }
  if (callback.length !== 1 && callback.length !== 2) {
    throw new RangeError("The status callback has to accept either 1 or 2 positional arguments.");
  }
}

function validateInterval(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} has to be a positive number of milliseconds, got ${value}.`);
  }
  return value;
}

/**
 * Polls the server status in the background and reports changes. Each registration starts a
 * new loop; a generation counter makes ticks of a replaced loop stop scheduling themselves.
 */
export class StatusMonitor {
  private generation = 0;
  private timer: NodeJS.Timeout | null = null;
  private callback: StatusCallback | null = null;
  private checkIntervalMs = DEFAULT_CHECK_INTERVAL_MS;
  private recheckIntervalMs = DEFAULT_RECHECK_INTERVAL_MS;

  constructor(private readonly source: StatusSource) {}

  get running(): boolean {
    return this.callback !== null;
  }

  /** Starts monitoring with `callback`, replacing any running loop. `null` stops monitoring. */
  register(callback: StatusCallback | null, options: StatusMonitorOptions = {}): void {
    if (callback === null) {
      this.stop();
      return;
    }
    validateStatusCallback(callback);
    const checkIntervalMs = validateInterval("checkIntervalMs", options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS);
    const recheckIntervalMs = validateInterval(
      "recheckIntervalMs",
      options.recheckIntervalMs ?? DEFAULT_RECHECK_INTERVAL_MS
    );

    this.stop();
    this.callback = callback;
    this.checkIntervalMs = checkIntervalMs;
    this.recheckIntervalMs = recheckIntervalMs;
    this.scheduleNext(this.generation, 0);
    console.log(
      `[status-monitor] started checkIntervalMs=${checkIntervalMs} recheckIntervalMs=${recheckIntervalMs}`
    );
  }

  stop(): void {
    this.generation += 1;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.callback = null;
  }

  private scheduleNext(generation: number, waitMs: number): void {
    this.timer = setTimeout(async () => {
      let delayMs = this.checkIntervalMs;
      try {
        delayMs = await this.tick();
      } catch (error) {
        if (!(error instanceof NotFound)) {
          console.error("[status-monitor] Exception in the server status loop:", error);
        }
        delayMs = this.recheckIntervalMs;
      } finally {
        if (generation === this.generation) this.scheduleNext(generation, delayMs);
      }
    }, waitMs);
  }

  /** One check. Resolves to the delay before the next one. */
  private async tick(): Promise<number> {
    const before = this.source.cachedStatus;
    const after = await this.source.getServerStatus({ forceRefresh: true });
    const callback = this.callback;
    if (before && callback && !before.equals(after)) {
      this.dispatch(callback, before, after);
    }
    return after.allUp && !after.limitedAccess ? this.checkIntervalMs : this.recheckIntervalMs;
  }

  private dispatch(callback: StatusCallback, before: ServerStatus, after: ServerStatus): void {
    void Promise.resolve()
      .then(() => (takesAfterOnly(callback) ? callback(after) : callback(before, after)))
      .catch((error: unknown) => {
        console.error("[status-monitor] Exception in the server status callback:", errorMessage(error));
      });
  }
}
