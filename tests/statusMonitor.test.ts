import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ServerStatus } from "../src/models/serverStatus.js";
import type { ServerStatusRecord } from "../src/schemas/responses.js";
import { StatusMonitor, validateStatusCallback, type StatusSource } from "../src/services/statusMonitor.js";
import { NotFound } from "../src/utils/errors.js";

function status(xbox: "UP" | "DOWN"): ServerStatus {
  const record = (platform: string, state: string): ServerStatusRecord => ({
    environment: "live",
    platform,
    status: state,
    limited_access: false,
    version: "6.4",
    entry_datetime: "",
    ret_msg: null
  });
  return new ServerStatus([record("pc", "UP"), record("xbox", xbox)], null);
}

/** Answers each check with the next queued outcome, repeating the last one. */
class QueuedSource implements StatusSource {
  cachedStatus: ServerStatus | null = null;
  calls = 0;

  constructor(private readonly outcomes: Array<ServerStatus | Error>) {}

  async getServerStatus(): Promise<ServerStatus> {
    const outcome = this.outcomes[Math.min(this.calls, this.outcomes.length - 1)];
    this.calls += 1;
    if (outcome instanceof Error) throw outcome;
    if (outcome === undefined) throw new NotFound("Server status");
    this.cachedStatus = outcome;
    return outcome;
  }
}

describe("StatusMonitor", () => {
  let monitor: StatusMonitor | null = null;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    monitor?.stop();
    monitor = null;
    vi.useRealTimers();
  });

  it("checks rarely while everything is up and more often while something is down", async () => {
    const source = new QueuedSource([status("UP"), status("DOWN")]);
    monitor = new StatusMonitor(source);
    monitor.register((after: ServerStatus) => after);

    await vi.advanceTimersByTimeAsync(0);
    expect(source.calls).toBe(1);

    await vi.advanceTimersByTimeAsync(179_999);
    expect(source.calls).toBe(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(source.calls).toBe(2);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(source.calls).toBe(3);
  });

  it("reports changes to a two-argument callback", async () => {
    const seen: Array<[string, string]> = [];
    const source = new QueuedSource([status("UP"), status("UP"), status("DOWN"), status("DOWN")]);
    monitor = new StatusMonitor(source);
    monitor.register(
      (before: ServerStatus, after: ServerStatus) => {
        seen.push([before.status, after.status]);
      },
      { checkIntervalMs: 1_000, recheckIntervalMs: 500 }
    );

    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(1_000);
    expect(seen).toEqual([]);

    await vi.advanceTimersByTimeAsync(1_000);
    await vi.advanceTimersByTimeAsync(500);
    expect(source.calls).toBe(4);
    expect(seen).toEqual([["Operational", "Outage"]]);
  });

  it("passes only the new status to a one-argument callback", async () => {
    const seen: string[] = [];
    const source = new QueuedSource([status("DOWN"), status("UP")]);
    monitor = new StatusMonitor(source);
    monitor.register((after: ServerStatus) => {
      seen.push(after.status);
    });

    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(60_000);
    await vi.advanceTimersByTimeAsync(0);

    expect(seen).toEqual(["Operational"]);
  });

  it("does not report the first status it sees", async () => {
    const seen: string[] = [];
    const source = new QueuedSource([status("DOWN")]);
    monitor = new StatusMonitor(source);
    monitor.register((after: ServerStatus) => {
      seen.push(after.status);
    });

    await vi.advanceTimersByTimeAsync(0);

    expect(source.calls).toBe(1);
    expect(seen).toEqual([]);
  });

  it("keeps polling after failed checks and failing callbacks", async () => {
    const source = new QueuedSource([status("UP"), new Error("network down"), status("DOWN")]);
    monitor = new StatusMonitor(source);
    monitor.register((_after: ServerStatus) => {
      throw new Error("boom");
    });

    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(180_000);
    expect(console.error).toHaveBeenCalledWith("[status-monitor] Exception in the server status loop:", expect.any(Error));

    await vi.advanceTimersByTimeAsync(60_000);
    await vi.advanceTimersByTimeAsync(0);
    expect(source.calls).toBe(3);
    expect(console.error).toHaveBeenCalledWith("[status-monitor] Exception in the server status callback:", "boom");
    expect(monitor.running).toBe(true);
  });

  it("retries quietly while no status is available", async () => {
    const source = new QueuedSource([new NotFound("Server status")]);
    monitor = new StatusMonitor(source);
    monitor.register((_after: ServerStatus) => undefined);

    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(60_000);

    expect(source.calls).toBe(2);
    expect(console.error).not.toHaveBeenCalled();
  });

  it("stops when the callback is cleared", async () => {
    const source = new QueuedSource([status("UP")]);
    monitor = new StatusMonitor(source);
    monitor.register((_after: ServerStatus) => undefined);
    await vi.advanceTimersByTimeAsync(0);

    monitor.register(null);
    await vi.advanceTimersByTimeAsync(600_000);

    expect(monitor.running).toBe(false);
    expect(source.calls).toBe(1);
  });

  it("validates callbacks and intervals", () => {
    monitor = new StatusMonitor(new QueuedSource([status("UP")]));

    expect(() => validateStatusCallback("not a function")).toThrow(TypeError);
    expect(() => validateStatusCallback(() => undefined)).toThrow(RangeError);
    expect(() => validateStatusCallback((a: number, b: number, c: number) => a + b + c)).toThrow(RangeError);
    expect(() => monitor?.register((_after: ServerStatus) => undefined, { checkIntervalMs: 0 })).toThrow(RangeError);
    expect(monitor.running).toBe(false);
  });
});
