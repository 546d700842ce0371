import * as cheerio from "cheerio";
import { MalformedPageError } from "../errors";
import { buildUrl, type PageFetcher } from "../scraping/utils";
import { Category, crawledJam, daysBetween, type CrawledJam, type OwnerMap } from "../types";

// Profile links look like https://someone.itch.io or https://someone.itch.io/
const OWNER_HREF = /^https?:\/\/([a-z0-9_-]+)\.itch\.io\/?$/i;
const HASHTAG_HREF = /(?:twitter|x)\.com\/hashtag\//i;
// Dates are rendered as "2024-05-01 12:00:00" in UTC
const DATE_TEXT = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?$/;

export function jamUrl(id: string): string {
  return buildUrl(`/jam/${encodeURIComponent(id)}`);
}

export function parseUtcDate(text: string): Date | null {
  const m = text.trim().match(DATE_TEXT);
  if (!m) return null;
  const [year, month, day, hour, minute, second] = m.slice(1).map((part) => Number(part ?? "0"));
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls out-of-range fields over (Feb 30 becomes Mar 2)
  const roundTrips =
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hour &&
    date.getUTCMinutes() === minute &&
    date.getUTCSeconds() === second;
  return roundTrips ? date : null;
}

function parseOwners($: cheerio.CheerioAPI): OwnerMap {
  const owners: OwnerMap = {};
  $("div.jam_host_header").first().find("a[href]").each((_, el) => {
    const href = $(el).attr("href") ?? "";
    const match = href.match(OWNER_HREF);
    if (!match) return;
    owners[match[1]] = $(el).text().trim();
  });
  return owners;
}

/**
 * Extract a jam from its detail page. Title, host header and exactly two
 * date markers are required; anything less is a MalformedPageError.
 */
export function parseJamDetail(
  id: string,
  html: string,
  category: Category = Category.UNCLASSIFIED
): CrawledJam {
  const $ = cheerio.load(html);

  const title = $("h1.jam_title_header").first();
  if (title.length === 0) throw new MalformedPageError(id, "missing title");
  const name = title.text().trim();
  if (!name) throw new MalformedPageError(id, "empty title");

  const hostHeader = $("div.jam_host_header").first();
  if (hostHeader.length === 0) throw new MalformedPageError(id, "missing host header");

  const dateSpans = $("span.date_format");
  if (dateSpans.length !== 2) {
    throw new MalformedPageError(id, `expected 2 date markers, found ${dateSpans.length}`);
  }
  const start = parseUtcDate(dateSpans.eq(0).text());
  const end = parseUtcDate(dateSpans.eq(1).text());
  if (!start || !end) throw new MalformedPageError(id, "unparseable date marker");

  const duration = daysBetween(start, end);
  if (duration < 0) throw new MalformedPageError(id, "end date precedes start date");

  const content = $("div.jam_content").first();
  const description = content.length > 0 ? $.html(content) : "";

  const hashtagLink = hostHeader
    .find("a[href]")
    .filter((_, el) => HASHTAG_HREF.test($(el).attr("href") ?? ""))
    .first();
  const hashtag = hashtagLink.length > 0 ? hashtagLink.text().trim() || null : null;

  return crawledJam({
    id,
    name,
    start,
    duration,
    category,
    hashtag,
    description,
    owners: parseOwners($),
  });
}

export async function fetchJamDetail(id: string, fetcher: PageFetcher): Promise<CrawledJam> {
  const html = await fetcher(jamUrl(id));
  return parseJamDetail(id, html);
}
