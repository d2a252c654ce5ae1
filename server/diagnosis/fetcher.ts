import type { DiagnosisConfig, PageSnapshot } from "./types";
import { buildSnapshot } from "./extractor";
import { FetchError, errorMessage } from "./errors";
import { isSSRFSafe } from "./url-utils";

export type SnapshotFetcher = (config: DiagnosisConfig) => Promise<PageSnapshot>;

interface RawPage {
  finalUrl: string;
  statusCode: number;
  headers: Headers;
  body: Uint8Array;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

// Node's fetch reports network failures as "fetch failed" with the real reason in `cause`.
function describeNetworkFailure(error: unknown): string {
  const message = errorMessage(error);
  if (error instanceof Error && error.cause instanceof Error) {
    return `${message}: ${error.cause.message}`;
  }
  return message;
}

async function assertAllowed(url: string, config: DiagnosisConfig): Promise<void> {
  if (config.allowPrivateHosts) return;
  const check = await isSSRFSafe(url);
  if (!check.safe) {
    throw new FetchError(url, "blocked", `SSRF protection: ${check.reason ?? "blocked target"}`);
  }
}

async function fetchWithRedirects(config: DiagnosisConfig, signal: AbortSignal): Promise<RawPage> {
  let currentUrl = config.url;

  for (let redirectCount = 0; redirectCount <= config.maxRedirects; redirectCount++) {
    await assertAllowed(currentUrl, config);

    const response = await fetch(currentUrl, {
      signal,
      headers: {
        "User-Agent": config.userAgent,
        Accept: "text/html,application/xhtml+xml,*/*;q=0.8",
      },
      redirect: "manual",
    });

    if (response.status >= 300 && response.status < 400) {
      const location = response.headers.get("location");
      if (!location) {
        throw new FetchError(config.url, "redirect", "Redirect without location header", {
          statusCode: response.status,
        });
      }
      currentUrl = new URL(location, currentUrl).toString();
      continue;
    }

    if (!response.ok) {
      throw new FetchError(config.url, "status", `Unexpected HTTP status ${response.status}`, {
        statusCode: response.status,
      });
    }

    const body = new Uint8Array(await response.arrayBuffer());
    return { finalUrl: currentUrl, statusCode: response.status, headers: response.headers, body };
  }

  throw new FetchError(config.url, "redirect", "Too many redirects");
}

/**
 * Fetches the page once and captures it as a snapshot. The elapsed time covers
 * the whole exchange including the body download.
 */
export const fetchSnapshot: SnapshotFetcher = async (config) => {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), config.timeoutMs);
  const startTime = Date.now();

  let page: RawPage;
  try {
    page = await fetchWithRedirects(config, controller.signal);
  } catch (error) {
    if (error instanceof FetchError) throw error;
    if (isAbortError(error)) {
      throw new FetchError(config.url, "timeout", `Request timeout after ${config.timeoutMs}ms`, { cause: error });
    }
    throw new FetchError(config.url, "network", describeNetworkFailure(error), { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }

  const durationSeconds = (Date.now() - startTime) / 1000;

  return buildSnapshot({
    url: config.url,
    finalUrl: page.finalUrl,
    html: new TextDecoder().decode(page.body),
    headers: page.headers,
    durationSeconds,
    byteSize: page.body.byteLength,
    statusCode: page.statusCode,
    fetchedAt: new Date(startTime).toISOString(),
  });
};
