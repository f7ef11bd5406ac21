import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RequestTransport, timeoutFor } from "../src/services/requestTransport.js";
import { HTTPException, LimitReached, Unavailable } from "../src/utils/errors.js";
import { jsonResponse } from "./fixtures.js";

const NOW = Date.UTC(2024, 0, 2, 3, 4, 5);
const BASE_URL = "https://api.test/stats.svc";

function createTransport(fetchImpl: typeof fetch) {
  const sleep = vi.fn(async (_ms: number) => {});
  const transport = new RequestTransport({
    baseUrl: `${BASE_URL}/`,
    devId: 1004,
    authKey: "test-secret",
    fetchImpl,
    sleep,
    random: () => 0.5,
    now: () => NOW
  });
  return { transport, sleep };
}

/** Answers `createsession` with s1, s2, ... and every other method through `handler`. */
function sessionFetch(handler: (url: string) => Response) {
  let sessions = 0;
  return vi.fn<typeof fetch>(async (input) => {
    const url = String(input);
    if (url.includes("/createsessionjson/")) {
      sessions += 1;
      return jsonResponse({ ret_msg: "Approved", session_id: `s${sessions}` });
    }
    return handler(url);
  });
}

describe("RequestTransport", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("signs requests and opens a session first", async () => {
    const fetchImpl = sessionFetch(() => jsonResponse([{ Id: 1, ret_msg: null }]));
    const { transport } = createTransport(fetchImpl);

    await expect(transport.request("getPlayer", "Some Name")).resolves.toEqual([{ Id: 1, ret_msg: null }]);

    const urls = fetchImpl.mock.calls.map(([input]) => String(input));
    expect(urls).toEqual([
      `${BASE_URL}/createsessionjson/1004/512549ae13e1241c0d239f7683a843ed/20240102030405`,
      `${BASE_URL}/getplayerjson/1004/28b3b1e79e3b1df8c0549c8b8c5f435a/s1/20240102030405/Some%20Name`
    ]);
  });

  it("signs with the time after the session is ready", async () => {
    let now = NOW;
    const fetchImpl = vi.fn<typeof fetch>(async (input) => {
      if (String(input).includes("/createsessionjson/")) {
        now += 90_000;
        return jsonResponse({ ret_msg: "Approved", session_id: "s1" });
      }
      return jsonResponse([]);
    });
    const transport = new RequestTransport({
      baseUrl: BASE_URL,
      devId: 1004,
      authKey: "test-secret",
      fetchImpl,
      now: () => now
    });

    await transport.request("getplayer", "Seven");

    expect(String(fetchImpl.mock.calls.at(-1)?.[0])).toBe(
      `${BASE_URL}/getplayerjson/1004/03a7864559ff310089ff38cfd6b42600/s1/20240102030535/Seven`
    );
  });

  it("keeps commas of batch parameters literal", async () => {
    const fetchImpl = sessionFetch(() => jsonResponse([]));
    const { transport } = createTransport(fetchImpl);

    await transport.request("getmatchdetailsbatch", "1,2,3");

    const last = String(fetchImpl.mock.calls.at(-1)?.[0]);
    expect(last.endsWith("/20240102030405/1,2,3")).toBe(true);
  });

  it("pings without a session", async () => {
    const fetchImpl = sessionFetch(() => jsonResponse("Ping successful."));
    const { transport } = createTransport(fetchImpl);

    await expect(transport.request("ping")).resolves.toBe("Ping successful.");
    expect(fetchImpl.mock.calls.map(([input]) => String(input))).toEqual([`${BASE_URL}/pingjson`]);
  });

  it("retries transient failures with a growing delay", async () => {
    let failures = 2;
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      if (failures > 0) {
        failures -= 1;
        throw new TypeError("fetch failed");
      }
      return jsonResponse("Ping successful.");
    });
    const { transport, sleep } = createTransport(fetchImpl);

    await expect(transport.request("ping")).resolves.toBe("Ping successful.");
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[500], [1000]]);
  });

  it("gives up after five attempts", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });
    const { transport, sleep } = createTransport(fetchImpl);

    await expect(transport.request("ping")).rejects.toBeInstanceOf(HTTPException);
    expect(fetchImpl).toHaveBeenCalledTimes(5);
    expect(sleep).toHaveBeenCalledTimes(4);
  });

  it("maps a 503 to Unavailable without retrying", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("down", { status: 503 }));
    const { transport } = createTransport(fetchImpl);

    await expect(transport.request("ping")).rejects.toBeInstanceOf(Unavailable);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("reports other status codes as HTTPException", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("missing", { status: 404 }));
    const { transport } = createTransport(fetchImpl);

    const error = await transport.request("ping").catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(HTTPException);
    expect(error instanceof HTTPException ? error.status : undefined).toBe(404);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("raises LimitReached when the daily limit is hit", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse([{ ret_msg: "Daily request limit reached. Try again tomorrow." }])
    );
    const { transport } = createTransport(fetchImpl);

    await expect(transport.request("ping")).rejects.toBeInstanceOf(LimitReached);
  });

  it("renews a rejected session and repeats the call", async () => {
    let rejected = false;
    const fetchImpl = sessionFetch((url) => {
      if (!rejected) {
        rejected = true;
        return jsonResponse([{ ret_msg: "Invalid session id." }]);
      }
      return jsonResponse([{ Id: 7, ret_msg: null, url }]);
    });
    const { transport } = createTransport(fetchImpl);

    const body = await transport.request("getplayer", "Seven");

    const urls = fetchImpl.mock.calls.map(([input]) => String(input));
    expect(urls.filter((url) => url.includes("/createsessionjson/"))).toHaveLength(2);
    expect(body).toEqual([
      {
        Id: 7,
        ret_msg: null,
        url: `${BASE_URL}/getplayerjson/1004/28b3b1e79e3b1df8c0549c8b8c5f435a/s2/20240102030405/Seven`
      }
    ]);
  });

  it("shares one new session between concurrent callers", async () => {
    const fetchImpl = sessionFetch(() => jsonResponse([]));
    const { transport } = createTransport(fetchImpl);

    await Promise.all([
      transport.request("getplayer", "a"),
      transport.request("getplayer", "b"),
      transport.request("getplayer", "c")
    ]);

    const urls = fetchImpl.mock.calls.map(([input]) => String(input));
    expect(urls.filter((url) => url.includes("/createsessionjson/"))).toHaveLength(1);
    expect(urls.filter((url) => url.includes("/s1/"))).toHaveLength(3);
  });

  it("rejects requests once closed", async () => {
    const fetchImpl = sessionFetch(() => jsonResponse([]));
    const { transport } = createTransport(fetchImpl);

    await transport.close();

    expect(transport.isClosed).toBe(true);
    await expect(transport.request("ping")).rejects.toBeInstanceOf(HTTPException);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe("timeoutFor", () => {
  it("uses longer timeouts for heavy methods", () => {
    expect(timeoutFor("getplayer")).toBe(5_000);
    expect(timeoutFor("getChampions")).toBe(10_000);
    expect(timeoutFor("getmatchdetailsbatch")).toBe(20_000);
    expect(timeoutFor("getchampionskins")).toBe(30_000);
  });
});
