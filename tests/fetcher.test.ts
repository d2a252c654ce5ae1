import { describe, it, expect, vi, afterEach } from "vitest";
import { fetchSnapshot } from "../server/diagnosis/fetcher";
import { FetchError } from "../server/diagnosis/errors";
import { DiagnosisConfigSchema, type DiagnosisConfigInput } from "../server/diagnosis/types";

const PAGE = "<html><head><title>Fetched page</title></head><body><h1>日本</h1></body></html>";

function config(overrides: Partial<DiagnosisConfigInput> = {}) {
  return DiagnosisConfigSchema.parse({ url: "https://example.com/", allowPrivateHosts: true, ...overrides });
}

function stubFetch() {
  const fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("fetchSnapshot", () => {
  it("captures the page, headers and byte size", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(
      new Response(PAGE, { status: 200, headers: { "Content-Type": "text/html", "Cache-Control": "max-age=60" } })
    );

    const snapshot = await fetchSnapshot(config({ userAgent: "test-agent" }));

    expect(snapshot.url).toBe("https://example.com/");
    expect(snapshot.finalUrl).toBe("https://example.com/");
    expect(snapshot.statusCode).toBe(200);
    expect(snapshot.byteSize).toBe(Buffer.byteLength(PAGE, "utf8"));
    expect(snapshot.headers["cache-control"]).toBe("max-age=60");
    expect(snapshot.document.title).toBe("Fetched page");
    expect(snapshot.durationSeconds).toBeGreaterThanOrEqual(0);
    expect(fetchMock.mock.calls[0][0]).toBe("https://example.com/");
    expect(fetchMock.mock.calls[0][1]).toMatchObject({
      redirect: "manual",
      headers: { "User-Agent": "test-agent" },
    });
  });

  it("follows redirects and records the final URL", async () => {
    const fetchMock = stubFetch();
    fetchMock
      .mockResolvedValueOnce(new Response(null, { status: 301, headers: { Location: "/welcome" } }))
      .mockResolvedValueOnce(new Response(PAGE, { status: 200 }));

    const snapshot = await fetchSnapshot(config());

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1][0]).toBe("https://example.com/welcome");
    expect(snapshot.url).toBe("https://example.com/");
    expect(snapshot.finalUrl).toBe("https://example.com/welcome");
  });

  it("gives up after the redirect limit", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockImplementation(async () => new Response(null, { status: 302, headers: { Location: "/loop" } }));

    const error = await fetchSnapshot(config({ maxRedirects: 2 })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ kind: "redirect", message: "Too many redirects" });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("rejects non-success status codes", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(new Response("missing", { status: 404 }));

    const error = await fetchSnapshot(config()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ kind: "status", statusCode: 404, message: "Unexpected HTTP status 404" });
  });

  it("reports network failures with their cause", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockRejectedValueOnce(
      new TypeError("fetch failed", { cause: new Error("getaddrinfo ENOTFOUND example.invalid") })
    );

    const error = await fetchSnapshot(config()).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: "network", message: "fetch failed: getaddrinfo ENOTFOUND example.invalid" });
  });

  it("aborts the request after the timeout", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            const aborted = new Error("This operation was aborted");
            aborted.name = "AbortError";
            reject(aborted);
          });
        })
    );

    const error = await fetchSnapshot(config({ timeoutMs: 20 })).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: "timeout", message: "Request timeout after 20ms" });
  });

  it("refuses loopback targets unless private hosts are allowed", async () => {
    const fetchMock = stubFetch();

    const error = await fetchSnapshot(config({ url: "http://127.0.0.1/", allowPrivateHosts: false })).catch(
      (e: unknown) => e
    );

    expect(error).toMatchObject({ kind: "blocked", message: "SSRF protection: Blocked host: 127.0.0.1" });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
