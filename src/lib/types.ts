import { InvalidJamError } from "./errors";

// ===== Enums =====

/** Stored as the `gametype` integer column. */
export enum Category {
  UNCLASSIFIED = 0,
  TABLETOP = 1,
  DIGITAL = 2,
}

export enum ListingKind {
  IN_PROGRESS = "in-progress",
  UPCOMING = "upcoming",
}

const CATEGORY_NAMES: Record<Category, string> = {
  [Category.UNCLASSIFIED]: "unclassified",
  [Category.TABLETOP]: "tabletop",
  [Category.DIGITAL]: "digital",
};

// "ttrpg" is accepted on input only; it is never a separate state
const CATEGORY_ALIASES: Record<string, Category> = {
  unclassified: Category.UNCLASSIFIED,
  tabletop: Category.TABLETOP,
  ttrpg: Category.TABLETOP,
  digital: Category.DIGITAL,
};

export const CATEGORY_CHOICES = ["tabletop", "digital", "unclassified"] as const;

export function categoryName(category: Category): string {
  return CATEGORY_NAMES[category];
}

export function parseCategory(raw: string): Category | null {
  return CATEGORY_ALIASES[raw.trim().toLowerCase()] ?? null;
}

export function categoryFromValue(value: number): Category {
  switch (value) {
    case Category.UNCLASSIFIED:
      return Category.UNCLASSIFIED;
    case Category.TABLETOP:
      return Category.TABLETOP;
    case Category.DIGITAL:
      return Category.DIGITAL;
    default:
      throw new InvalidJamError(`Unknown gametype value ${value}`);
  }
}

// ===== Jam records =====

/** owner id → display name */
export type OwnerMap = Record<string, string>;

export interface Owner {
  id: string;
  name: string;
}

/** Identifier known from a listing or the command line, detail page not fetched yet. */
export interface PendingJam {
  crawled: false;
  id: string;
  category: Category;
}

export interface CrawledJam {
  crawled: true;
  id: string;
  name: string;
  start: Date;
  duration: number; // whole days
  category: Category;
  hashtag: string | null;
  description: string;
  owners: OwnerMap;
}

export type Jam = PendingJam | CrawledJam;

export type CrawledJamFields = Omit<CrawledJam, "crawled">;

export function pendingJam(id: string): PendingJam {
  return { crawled: false, id, category: Category.UNCLASSIFIED };
}

/**
 * The only way to obtain a CrawledJam. Rejects records that are missing
 * the fields a fully fetched jam must carry.
 */
export function crawledJam(fields: CrawledJamFields): CrawledJam {
  if (!fields.id) throw new InvalidJamError("Jam id is required");
  if (!fields.name.trim()) throw new InvalidJamError(`Jam ${fields.id} has no name`);
  if (Number.isNaN(fields.start.getTime())) {
    throw new InvalidJamError(`Jam ${fields.id} has an invalid start date`);
  }
  if (!Number.isInteger(fields.duration) || fields.duration < 0) {
    throw new InvalidJamError(`Jam ${fields.id} has invalid duration ${fields.duration}`);
  }
  return { ...fields, owners: { ...fields.owners }, crawled: true };
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function jamEnd(jam: Pick<CrawledJam, "start" | "duration">): Date {
  return new Date(jam.start.getTime() + jam.duration * DAY_MS);
}

/** Whole days between two instants, rounded down. */
export function daysBetween(start: Date, end: Date): number {
  return Math.floor((end.getTime() - start.getTime()) / DAY_MS);
}

// ===== Queries =====

export type JamFilter =
  | { kind: "category"; category: Category }
  | { kind: "owner"; ownerId: string }
  | { kind: "id"; jamId: string }
  | { kind: "all" };

export interface TemporalFilter {
  current: boolean; // end in the future
  past: boolean; // end in the past
}

// ===== Crawl reporting =====

export interface CrawlProgress {
  id: string;
  name: string;
  category: Category;
  url: string;
  index: number; // 1-based position among identifiers being processed
  total: number;
}

export interface CrawlFailure {
  id: string;
  error: string;
}

export interface CrawlSummary {
  discovered: number;
  processed: number;
  skipped: number;
  failed: CrawlFailure[];
}
