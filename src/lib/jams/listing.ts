import * as cheerio from "cheerio";
import { config } from "../config";
import { NetworkError } from "../errors";
import { buildUrl, type PageFetcher } from "../scraping/utils";
import { ListingKind } from "../types";

export const ALL_LISTING_KINDS: ListingKind[] = [ListingKind.IN_PROGRESS, ListingKind.UPCOMING];

/**
 * Why a walk ended. An empty page and a failed fetch both end discovery; the
 * two are kept apart here so callers can tell a real end from a cut-short one.
 */
export interface WalkOutcome {
  pages: number; // pages that yielded at least one jam
  stoppedBy: "empty-page" | "network-error" | null;
  error?: NetworkError;
}

export function newWalkOutcome(): WalkOutcome {
  return { pages: 0, stoppedBy: null };
}

export function listingUrl(kind: ListingKind, page: number): string {
  return buildUrl(`/jams/${kind}`, { page });
}

/** `/jam/<id>` → id; "" for links to anything else, null when the link cannot be read. */
function jamIdFromHref(href: string): string | null {
  try {
    const [, section, id] = new URL(href, config.baseUrl).pathname.split("/");
    return section === "jam" && id ? decodeURIComponent(id) : "";
  } catch (err) {
    if (err instanceof URIError || err instanceof TypeError) return null;
    throw err;
  }
}

/** Jam identifiers on one listing page, taken from `/jam/<id>` title links. */
export function parseListingPage(html: string): string[] {
  const $ = cheerio.load(html);
  const ids: string[] = [];

  $("div.jam").each((_, el) => {
    const href = $(el).find("h3 a").first().attr("href");
    if (!href) return;
    const id = jamIdFromHref(href);
    if (id === null) {
      console.warn(`[listing] Skipping card with unreadable link ${href}`);
      return;
    }
    if (id) ids.push(id);
  });

  return ids;
}

/**
 * Lazily yields jam identifiers from page 1, 2, 3, ... of a listing until a
 * page comes back empty. Each call starts over at page 1.
 */
export async function* walkListing(
  kind: ListingKind,
  fetcher: PageFetcher,
  outcome: WalkOutcome = newWalkOutcome()
): AsyncGenerator<string, void, undefined> {
  for (let page = 1; ; page++) {
    const url = listingUrl(kind, page);

    let html: string;
    try {
      html = await fetcher(url);
    } catch (err) {
      if (!(err instanceof NetworkError)) throw err;
      outcome.stoppedBy = "network-error";
      outcome.error = err;
      return;
    }

    const ids = parseListingPage(html);
    if (ids.length === 0) {
      outcome.stoppedBy = "empty-page";
      return;
    }

    outcome.pages = page;
    yield* ids;
  }
}
