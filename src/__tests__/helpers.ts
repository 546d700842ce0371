import { NetworkError } from "../lib/errors";
import type { PageFetcher } from "../lib/scraping/utils";

export function listingHtml(ids: string[]): string {
  const cards = ids
    .map((id) => `<div class="jam"><h3><a href="/jam/${id}">Jam ${id}</a></h3><div class="jam_stats">12 joined</div></div>`)
    .join("\n");
  return `<html><body><div class="jam_grid">${cards}</div></body></html>`;
}

export function detailHtml(opts: {
  name: string;
  owners?: Record<string, string>;
  description?: string;
  start?: string;
  end?: string;
}): string {
  const owners = Object.entries(opts.owners ?? { host: "Host" })
    .map(([id, name]) => `<a href="https://${id}.itch.io">${name}</a>`)
    .join(" and ");
  return `<html><body>
    <h1 class="jam_title_header">${opts.name}</h1>
    <div class="jam_host_header">Hosted by ${owners}</div>
    <span class="date_format">${opts.start ?? "2031-06-01 00:00:00"}</span>
    <span class="date_format">${opts.end ?? "2031-06-08 00:00:00"}</span>
    <div class="jam_content">${opts.description ?? "<p>Make something.</p>"}</div>
  </body></html>`;
}

/**
 * In-process stand-in for the network: serves pages from a URL map, records
 * every request, and fails URLs that have no page.
 */
export function fakeFetcher(pages: Record<string, string>): PageFetcher & { requests: string[] } {
  const requests: string[] = [];
  const fetcher = async (url: string): Promise<string> => {
    requests.push(url);
    const body = pages[url];
    if (body === undefined) throw new NetworkError(url, `HTTP 404 for ${url}`, 404);
    return body;
  };
  return Object.assign(fetcher, { requests });
}
