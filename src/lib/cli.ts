import { config } from "./config";
import { crawlJams, crawlListings } from "./crawl";
import type { JamStore } from "./db";
import { NotFoundError } from "./errors";
import { loadKeywords, type KeywordSets } from "./keywords";
import { formatJamDetail, formatJamList } from "./report";
import type { PageFetcher } from "./scraping/utils";
import {
  CATEGORY_CHOICES,
  Category,
  categoryName,
  parseCategory,
  type CrawledJam,
  type CrawlProgress,
  type JamFilter,
  type TemporalFilter,
} from "./types";

export const COMMANDS = ["crawl", "list", "show", "classify", "delete"] as const;
export type Command = (typeof COMMANDS)[number];

const VALUE_FLAGS = new Set(["--type", "--owner", "--id"]);
const BOOLEAN_FLAGS = new Set(["--force", "--old", "--all"]);

export class UsageError extends Error {}

export interface ParsedArgs {
  command: Command;
  ids: string[];
  flags: Record<string, string | true>;
}

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseCommandLine(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command "${command ?? ""}". Expected one of: ${COMMANDS.join(", ")}`);
  }

  const ids: string[] = [];
  const flags: Record<string, string | true> = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (VALUE_FLAGS.has(arg)) {
      const value = rest[i + 1];
      if (value === undefined || value.startsWith("--")) throw new UsageError(`${arg} needs a value`);
      flags[arg] = value;
      i++;
    } else if (BOOLEAN_FLAGS.has(arg)) {
      flags[arg] = true;
    } else if (arg.startsWith("--")) {
      throw new UsageError(`Unknown option ${arg}`);
    } else {
      ids.push(arg);
    }
  }

  return { command, ids, flags };
}

function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags[name];
  return typeof value === "string" ? value : undefined;
}

function typeFlag(args: ParsedArgs): Category | undefined {
  const raw = stringFlag(args, "--type");
  if (raw === undefined) return undefined;
  const category = parseCategory(raw);
  if (category === null) {
    throw new UsageError(`--type must be one of: ${CATEGORY_CHOICES.join(", ")}`);
  }
  return category;
}

/** Everything a command needs from the outside world. */
export interface CliContext {
  store: JamStore;
  out: (line: string) => void;
  fetcher?: PageFetcher;
  keywords?: () => KeywordSets;
  prompt?: (question: string, choices: readonly string[]) => Promise<string>;
  now?: Date;
}

export function listQuery(args: ParsedArgs): { filter: JamFilter; temporal: TemporalFilter; title: string } {
  const type = typeFlag(args);
  const owner = stringFlag(args, "--owner");
  const id = stringFlag(args, "--id");

  const temporal: TemporalFilter = args.flags["--all"]
    ? { current: true, past: true }
    : args.flags["--old"]
      ? { current: false, past: true }
      : { current: true, past: false };

  if (type !== undefined) {
    return { filter: { kind: "category", category: type }, temporal, title: `Jam Type = ${categoryName(type)}` };
  }
  if (id !== undefined) {
    return { filter: { kind: "id", jamId: id }, temporal, title: `Jam ID = ${id}` };
  }
  if (owner !== undefined) {
    return { filter: { kind: "owner", ownerId: owner }, temporal, title: `Jam Owner = ${owner}` };
  }
  return {
    filter: { kind: "category", category: Category.TABLETOP },
    temporal,
    title: `Jam Type = ${categoryName(Category.TABLETOP)}`,
  };
}

function progressLine(event: CrawlProgress): string {
  return `[crawl] (${event.index}/${event.total}) ${event.name} <${event.url}>: ${categoryName(event.category)}`;
}

function loadAll(store: JamStore, ids: string[]): CrawledJam[] {
  const jams: CrawledJam[] = [];
  for (const id of ids) {
    const jam = store.loadJam(id);
    if (jam) jams.push(jam);
  }
  return jams;
}

export async function runCommand(args: ParsedArgs, ctx: CliContext): Promise<void> {
  const { store, out } = ctx;
  const keywords = ctx.keywords ?? (() => loadKeywords(config.keywordsPath));

  switch (args.command) {
    case "crawl": {
      const options = {
        keywords: keywords(),
        fetcher: ctx.fetcher,
        onProgress: (event: CrawlProgress) => out(progressLine(event)),
      };
      const summary =
        args.ids.length > 0
          ? await crawlJams(store, args.ids, { ...options, force: true })
          : await crawlListings(store, { ...options, force: args.flags["--force"] === true });
      out(
        `[crawl] ${summary.processed} crawled, ${summary.skipped} already known, ${summary.failed.length} failed`
      );
      return;
    }

    case "list": {
      const { filter, temporal, title } = listQuery(args);
      const jams = loadAll(store, store.queryJams(filter, temporal, ctx.now));
      if (jams.length > 0) out(formatJamList(jams, title));
      return;
    }

    case "show": {
      for (const id of args.ids) {
        const jam = store.loadJam(id);
        out(jam ? formatJamDetail(jam) : `${id} not found`);
      }
      return;
    }

    case "classify": {
      const type = typeFlag(args);
      const ids =
        args.ids.length > 0
          ? args.ids
          : store.queryJams(
              { kind: "category", category: Category.UNCLASSIFIED },
              { current: true, past: false },
              ctx.now
            );

      for (const id of ids) {
        const jam = store.loadJam(id);
        if (!jam) {
          out(`${id} not found`);
          continue;
        }

        let category = type;
        if (category === undefined) {
          if (!ctx.prompt) throw new UsageError("classify needs --type when not running interactively");
          out(formatJamDetail(jam));
          const answer = await ctx.prompt("Game type", CATEGORY_CHOICES);
          category = parseCategory(answer) ?? Category.UNCLASSIFIED;
        }

        store.setCategory(id, category);
        out(`Classifying ${id} as ${categoryName(category)}`);
      }
      return;
    }

    case "delete": {
      for (const id of args.ids) {
        try {
          store.deleteJam(id);
          out(`Deleting ${id}`);
        } catch (err) {
          if (!(err instanceof NotFoundError)) throw err;
          out(`${id} not found`);
        }
      }
      return;
    }
  }
}
