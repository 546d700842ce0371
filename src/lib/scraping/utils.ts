import { config } from "../config";
import { ProxyAgent, fetch as undiciFetch } from "undici";
import { NetworkError, errorMessage } from "../errors";

/** Anything that turns a URL into a page body, throwing NetworkError on failure. */
export type PageFetcher = (url: string) => Promise<string>;

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

let proxyAgent: ProxyAgent | null | undefined;

// One agent per process, created on first use
function getProxyDispatcher(): ProxyAgent | undefined {
  if (proxyAgent !== undefined) return proxyAgent ?? undefined;
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  proxyAgent = proxyUrl ? new ProxyAgent(proxyUrl) : null;
  return proxyAgent ?? undefined;
}

export interface FetchPageOptions {
  politeDelayMs?: number;
  timeoutMs?: number;
}

/**
 * GET a page with the crawler's identifying User-Agent. Waits the polite
 * delay first; any failure, timeout included, is raised as NetworkError.
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<string> {
  const { politeDelayMs = config.crawlDelayMs, timeoutMs = config.fetchTimeoutMs } = options;

  if (politeDelayMs > 0) await delay(politeDelayMs);

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await undiciFetch(url, {
      headers: {
        "User-Agent": config.userAgent,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      },
      signal: controller.signal,
      dispatcher: getProxyDispatcher(),
    });

    if (!response.ok) {
      throw new NetworkError(url, `HTTP ${response.status} for ${url}`, response.status);
    }

    return await response.text();
  } catch (error: unknown) {
    if (error instanceof NetworkError) throw error;
    if (error instanceof Error && error.name === "AbortError") {
      throw new NetworkError(url, `Timed out after ${timeoutMs}ms: ${url}`, undefined, { cause: error });
    }
    throw new NetworkError(url, `Request failed for ${url}: ${errorMessage(error)}`, undefined, {
      cause: error,
    });
  } finally {
    clearTimeout(timeout);
  }
}

export function buildUrl(path: string, query?: Record<string, string | number>): string {
  const url = new URL(path, config.baseUrl);
  for (const [key, value] of Object.entries(query ?? {})) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}
