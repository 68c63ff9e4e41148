import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock("@/lib/logger", () => ({
  logger: mockLogger,
  wfsLogger: mockLogger,
}));

import { createHttpGet, httpGetBytes } from "../http";
import { WfsHttpError, WfsTransportError } from "../types";

const URL_A = "https://wfs.example.test/ows?request=GetFeature";

const mockFetch = vi.fn<typeof fetch>();

function okResponse(body: string): Response {
  return new Response(body, { status: 200 });
}

describe("httpGetBytes", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the body bytes and sends the WFS headers", async () => {
    mockFetch.mockResolvedValue(okResponse("<ok/>"));

    const body = await httpGetBytes(URL_A, { retryDelayMs: 0 });

    expect(new TextDecoder().decode(body)).toBe("<ok/>");
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const init = mockFetch.mock.calls[0][1];
    expect(init?.headers).toEqual({
      "User-Agent": "cadastre-wfs-export/0.1 (+WFS 2.0 client)",
      Accept: "application/xml,*/*;q=0.5",
    });
  });

  it("retries failures and returns the first success", async () => {
    mockFetch
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockResolvedValueOnce(okResponse("done"));

    const body = await httpGetBytes(URL_A, { retries: 3, retryDelayMs: 0 });

    expect(new TextDecoder().decode(body)).toBe("done");
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(mockLogger.warn).toHaveBeenCalledTimes(2);
  });

  it("throws WfsHttpError with status and body after the last attempt", async () => {
    mockFetch.mockImplementation(async () => new Response("bad filter", { status: 400 }));

    const error = await httpGetBytes(URL_A, { retries: 3, retryDelayMs: 0 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WfsHttpError);
    expect(error).toMatchObject({ statusCode: 400, url: URL_A, body: "bad filter" });
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it("wraps network failures in WfsTransportError", async () => {
    mockFetch.mockRejectedValue(new TypeError("fetch failed"));

    const error = await httpGetBytes(URL_A, { retries: 2, retryDelayMs: 0 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WfsTransportError);
    expect(error).toMatchObject({ message: "Request failed: fetch failed", url: URL_A });
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("backs off linearly between attempts", async () => {
    mockFetch.mockRejectedValue(new TypeError("fetch failed"));

    await httpGetBytes(URL_A, { retries: 3, retryDelayMs: 5 }).catch(() => undefined);

    expect(mockLogger.warn.mock.calls.map((call) => call[1])).toEqual([
      "WFS request failed (attempt 1/3), retrying in 5ms",
      "WFS request failed (attempt 2/3), retrying in 10ms",
    ]);
  });

  it("aborts a request that gets no response within the connect timeout", async () => {
    mockFetch.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(init?.signal?.reason));
        }),
    );

    const error = await httpGetBytes(URL_A, { retries: 1, connectTimeoutMs: 5 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WfsTransportError);
    expect(error).toMatchObject({ message: "Request failed: connect timeout after 5ms" });
  });
});

describe("createHttpGet", () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("uses the retry budget from settings", async () => {
    mockFetch.mockRejectedValue(new TypeError("fetch failed"));
    const httpGet = createHttpGet({ retries: 2, retryDelayMs: 0, connectTimeoutMs: 1000, readTimeoutMs: 1000 });

    await expect(httpGet(URL_A)).rejects.toBeInstanceOf(WfsTransportError);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });
});
