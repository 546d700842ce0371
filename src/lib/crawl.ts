import type { JamStore } from "./db";
import { classify } from "./classifier";
import { JamCrawlerError, errorMessage } from "./errors";
import { fetchJamDetail, jamUrl } from "./jams/detail";
import { ALL_LISTING_KINDS, newWalkOutcome, walkListing } from "./jams/listing";
import type { KeywordSets } from "./keywords";
import { fetchPage, type PageFetcher } from "./scraping/utils";
import {
  pendingJam,
  type CrawledJam,
  type CrawlProgress,
  type CrawlSummary,
  type ListingKind,
  type PendingJam,
} from "./types";

export interface CrawlOptions {
  keywords: KeywordSets;
  force?: boolean;
  fetcher?: PageFetcher;
  onProgress?: (event: CrawlProgress) => void;
}

export interface ListingCrawlOptions extends CrawlOptions {
  kinds?: ListingKind[];
}

/**
 * Walk every listing kind to the end and return the union of identifiers,
 * first-seen order. All pages are fetched before anything is processed.
 */
export async function discoverJams(
  kinds: ListingKind[],
  fetcher: PageFetcher = fetchPage
): Promise<PendingJam[]> {
  const seen = new Map<string, PendingJam>();

  for (const kind of kinds) {
    const outcome = newWalkOutcome();
    let found = 0;
    for await (const id of walkListing(kind, fetcher, outcome)) {
      found++;
      if (!seen.has(id)) seen.set(id, pendingJam(id));
    }

    if (outcome.stoppedBy === "network-error") {
      console.warn(
        `[listing] ${kind}: stopped after page ${outcome.pages} on a failed fetch, results may be incomplete (${outcome.error?.message})`
      );
    }
    console.log(`[listing] ${kind}: ${found} jams on ${outcome.pages} pages`);
  }

  return [...seen.values()];
}

/**
 * Fetch, classify and store each identifier that needs it. An identifier
 * needs fetching when `force` is set or the store does not know it yet.
 * A failure on one identifier is logged and the loop moves on.
 */
export async function crawlJams(
  store: JamStore,
  ids: string[],
  options: CrawlOptions
): Promise<CrawlSummary> {
  const { keywords, force = false, fetcher = fetchPage, onProgress } = options;

  const unique = [...new Set(ids)];
  const known = store.listAllKnownIds();
  const todo = unique.filter((id) => force || !known.has(id));

  const summary: CrawlSummary = {
    discovered: unique.length,
    processed: 0,
    skipped: unique.length - todo.length,
    failed: [],
  };

  for (let i = 0; i < todo.length; i++) {
    const id = todo[i];
    try {
      const fetched = await fetchJamDetail(id, fetcher);
      const category = classify(fetched.description, fetched.name, store.getCategory(id), keywords);
      const jam: CrawledJam = { ...fetched, category };
      store.upsertJam(jam);

      summary.processed++;
      onProgress?.({
        id,
        name: jam.name,
        category,
        url: jamUrl(id),
        index: i + 1,
        total: todo.length,
      });
    } catch (err) {
      if (!(err instanceof JamCrawlerError)) throw err;
      console.error(`[crawl] Skipping ${id}: ${errorMessage(err)}`);
      summary.failed.push({ id, error: errorMessage(err) });
    }
  }

  return summary;
}

/** Discovery followed by processing of everything new (or everything, with `force`). */
export async function crawlListings(store: JamStore, options: ListingCrawlOptions): Promise<CrawlSummary> {
  const { kinds = ALL_LISTING_KINDS, fetcher = fetchPage } = options;

  const discovered = await discoverJams(kinds, fetcher);
  console.log(`[crawl] Discovered ${discovered.length} jams`);

  return crawlJams(
    store,
    discovered.map((j) => j.id),
    { ...options, fetcher }
  );
}
