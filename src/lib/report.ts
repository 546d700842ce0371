import * as cheerio from "cheerio";
import { jamUrl } from "./jams/detail";
import { categoryName, jamEnd, type CrawledJam } from "./types";

const BLOCK_TAGS = "p, div, h1, h2, h3, h4, h5, h6, ul, ol, li, blockquote, pre, table, tr, hr";

export function ownerIds(jam: CrawledJam): string {
  return Object.keys(jam.owners).join(", ");
}

export function formatUtc(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

/** Plain text for a description block; links and images are dropped, paragraphs kept. */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $("script, style, img").remove();
  $("br").replaceWith("\n");
  $("li").prepend("* ");
  $(BLOCK_TAGS).append("\n\n");

  return $.root()
    .text()
    .replace(/[ \t]+\n/g, "\n")
    .replace(/(\n\s*)+\n+/g, "\n\n")
    .trim();
}

export function formatJamDetail(jam: CrawledJam): string {
  return [
    `Jam: ${jam.name} (${jam.id})`,
    `Owner(s): ${ownerIds(jam)}`,
    `URL: ${jamUrl(jam.id)}`,
    `Type: ${categoryName(jam.category)}`,
    `Hashtag: ${jam.hashtag ?? ""}`,
    `Start: ${formatUtc(jam.start)}`,
    `End: ${formatUtc(jamEnd(jam))}`,
    `Duration: ${jam.duration} days`,
    "",
    htmlToText(jam.description),
  ].join("\n");
}

/** Aligned text table of Name / ID / URL / Owner(s) under a title line. */
export function formatJamList(jams: CrawledJam[], title: string): string {
  const header = ["Name", "ID", "URL", "Owner(s)"];
  const rows = jams.map((j) => [j.name, j.id, jamUrl(j.id), ownerIds(j)]);

  const widths = header.map((h, col) => Math.max(h.length, ...rows.map((r) => r[col].length)));
  const line = (cells: string[]) =>
    cells
      .map((c, col) => c.padEnd(widths[col]))
      .join("  ")
      .trimEnd();

  return [title, line(header), line(widths.map((w) => "-".repeat(w))), ...rows.map(line)].join("\n");
}
