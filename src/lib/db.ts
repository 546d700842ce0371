import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { NotFoundError, StorageError } from "./errors";
import {
  Category,
  categoryFromValue,
  crawledJam,
  type CrawledJam,
  type JamFilter,
  type OwnerMap,
  type TemporalFilter,
} from "./types";

const DAY_SECONDS = 24 * 60 * 60;

interface JamRow {
  jam_id: string;
  name: string;
  start_ts: number;
  duration: number;
  gametype: number;
  hashtag: string | null;
  description: string | null;
}

interface OwnerRow {
  owner_id: string;
  name: string;
}

/** Shape of the JSON blob kept by the pre-normalization `itch_jams` table. */
interface LegacyJamData {
  jam_name?: string;
  jam_owners?: OwnerMap | null;
  jam_start?: number;
  jam_duration?: number;
  jam_gametype?: number;
  jam_hashtag?: string | null;
  jam_description?: string | null;
}

/**
 * Persistence for jams, owners and their associations. One instance owns one
 * connection; the caller that opens it closes it.
 */
export class JamStore {
  constructor(private readonly db: Database.Database) {
    db.pragma("foreign_keys = ON");
    initSchema(db);
  }

  upsertJam(jam: CrawledJam): void {
    const write = this.db.transaction((j: CrawledJam) => {
      this.db
        .prepare(
          `INSERT INTO jams (jam_id, name, start_ts, duration, gametype, hashtag, description)
           VALUES (?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(jam_id) DO UPDATE SET
             name = excluded.name,
             start_ts = excluded.start_ts,
             duration = excluded.duration,
             gametype = excluded.gametype,
             hashtag = excluded.hashtag,
             description = excluded.description`
        )
        .run(
          j.id,
          j.name,
          Math.floor(j.start.getTime() / 1000),
          j.duration,
          j.category,
          j.hashtag,
          j.description
        );

      // Association set always mirrors the latest crawl
      this.db.prepare("DELETE FROM jam_owners WHERE jam_id = ?").run(j.id);
      const insertOwner = this.db.prepare(
        "INSERT INTO owners (owner_id, name) VALUES (?, ?) ON CONFLICT(owner_id) DO UPDATE SET name = excluded.name"
      );
      const insertLink = this.db.prepare("INSERT INTO jam_owners (jam_id, owner_id) VALUES (?, ?)");
      for (const [ownerId, ownerName] of Object.entries(j.owners)) {
        insertOwner.run(ownerId, ownerName);
        insertLink.run(j.id, ownerId);
      }
    });

    this.guard(`upsertJam(${jam.id})`, () => write(jam));
  }

  loadJam(id: string): CrawledJam | null {
    return this.guard(`loadJam(${id})`, () => {
      const row = this.db
        .prepare(
          "SELECT jam_id, name, start_ts, duration, gametype, hashtag, description FROM jams WHERE jam_id = ?"
        )
        .get(id) as JamRow | undefined;
      if (!row) return null;

      const ownerRows = this.db
        .prepare(
          `SELECT o.owner_id, o.name
             FROM owners o
             JOIN jam_owners jo ON o.owner_id = jo.owner_id
            WHERE jo.jam_id = ?
            ORDER BY o.owner_id`
        )
        .all(id) as OwnerRow[];

      return mapRowToJam(row, ownerRows);
    });
  }

  /** Removes the jam and its associations; owners stay, they may be shared. */
  deleteJam(id: string): void {
    const result = this.guard(`deleteJam(${id})`, () =>
      this.db.prepare("DELETE FROM jams WHERE jam_id = ?").run(id)
    );
    if (result.changes === 0) throw new NotFoundError(id);
  }

  /** Identifiers matching `filter`, restricted by end date, soonest end first. */
  queryJams(filter: JamFilter, temporal: TemporalFilter, now: Date = new Date()): string[] {
    if (!temporal.current && !temporal.past) return [];

    const where: string[] = [];
    const params: (string | number)[] = [];

    switch (filter.kind) {
      case "category":
        where.push("j.gametype = ?");
        params.push(filter.category);
        break;
      case "owner":
        where.push("j.jam_id IN (SELECT jam_id FROM jam_owners WHERE owner_id = ?)");
        params.push(filter.ownerId);
        break;
      case "id":
        where.push("j.jam_id = ?");
        params.push(filter.jamId);
        break;
      case "all":
        break;
    }

    const nowTs = Math.floor(now.getTime() / 1000);
    const end = `(j.start_ts + j.duration * ${DAY_SECONDS})`;
    if (temporal.current && !temporal.past) {
      where.push(`${end} > ?`);
      params.push(nowTs);
    } else if (temporal.past && !temporal.current) {
      where.push(`${end} < ?`);
      params.push(nowTs);
    }

    const clause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
    const sql = `SELECT j.jam_id FROM jams j ${clause} ORDER BY ${end} ASC, j.jam_id ASC`;
    return this.guard("queryJams", () => {
      const rows = this.db.prepare(sql).all(...params) as { jam_id: string }[];
      return rows.map((r) => r.jam_id);
    });
  }

  listAllKnownIds(): Set<string> {
    return this.guard("listAllKnownIds", () => {
      const rows = this.db.prepare("SELECT jam_id FROM jams").all() as { jam_id: string }[];
      return new Set(rows.map((r) => r.jam_id));
    });
  }

  getCategory(id: string): Category | null {
    const row = this.guard(`getCategory(${id})`, () =>
      this.db.prepare("SELECT gametype FROM jams WHERE jam_id = ?").get(id) as
        | { gametype: number }
        | undefined
    );
    return row ? categoryFromValue(row.gametype) : null;
  }

  /** Explicit user reclassification; the only path that may replace a classified category. */
  setCategory(id: string, category: Category): void {
    const result = this.guard(`setCategory(${id})`, () =>
      this.db.prepare("UPDATE jams SET gametype = ? WHERE jam_id = ?").run(category, id)
    );
    if (result.changes === 0) throw new NotFoundError(id);
  }

  close(): void {
    this.db.close();
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StorageError(operation, err);
    }
  }
}

export function openJamStore(dbPath: string): JamStore {
  if (dbPath === ":memory:") return new JamStore(new Database(dbPath));

  const resolved = path.resolve(process.cwd(), dbPath);
  const dir = path.dirname(resolved);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(resolved);
  db.pragma("journal_mode = WAL");
  return new JamStore(db);
}

/** Opens a store for the duration of `fn` and closes it afterwards, even on failure. */
export async function withJamStore<T>(dbPath: string, fn: (store: JamStore) => Promise<T> | T): Promise<T> {
  const store = openJamStore(dbPath);
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}

function mapRowToJam(row: JamRow, ownerRows: OwnerRow[]): CrawledJam {
  const owners: OwnerMap = {};
  for (const o of ownerRows) owners[o.owner_id] = o.name;

  return crawledJam({
    id: row.jam_id,
    name: row.name,
    start: new Date(row.start_ts * 1000),
    duration: row.duration,
    category: categoryFromValue(row.gametype),
    hashtag: row.hashtag,
    description: row.description ?? "",
    owners,
  });
}

// ===== Schema =====

function initSchema(db: Database.Database): void {
  migrateLegacyTable(db);

  db.exec(`
    CREATE TABLE IF NOT EXISTS jam_gametypes (
      id   INTEGER PRIMARY KEY,
      name TEXT NOT NULL UNIQUE
    );
    INSERT OR IGNORE INTO jam_gametypes (id, name) VALUES
      (0, 'unclassified'),
      (1, 'tabletop'),
      (2, 'digital');

    CREATE TABLE IF NOT EXISTS jams (
      jam_id      TEXT PRIMARY KEY,
      name        TEXT NOT NULL,
      start_ts    INTEGER NOT NULL,
      duration    INTEGER NOT NULL CHECK (duration >= 0),
      gametype    INTEGER NOT NULL DEFAULT 0 REFERENCES jam_gametypes(id),
      hashtag     TEXT,
      description TEXT
    );

    CREATE TABLE IF NOT EXISTS owners (
      owner_id TEXT PRIMARY KEY,
      name     TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS jam_owners (
      jam_id   TEXT NOT NULL REFERENCES jams(jam_id) ON DELETE CASCADE,
      owner_id TEXT NOT NULL REFERENCES owners(owner_id) ON DELETE CASCADE,
      PRIMARY KEY (jam_id, owner_id)
    );
    CREATE INDEX IF NOT EXISTS idx_jam_owners_owner ON jam_owners(owner_id);
  `);

  migrateLegacyRows(db);
}

function tableColumns(db: Database.Database, table: string): Set<string> {
  const cols = db.pragma(`table_info(${table})`) as { name: string }[];
  return new Set(cols.map((c) => c.name));
}

/**
 * A normalized `itch_jams` table only needs renaming. A JSON-blob one is set
 * aside as `itch_jams_legacy` and copied over once the new tables exist.
 */
function migrateLegacyTable(db: Database.Database): void {
  const cols = tableColumns(db, "itch_jams");
  if (cols.size === 0) return;

  if (cols.has("jam_data")) {
    console.log("[db] Found JSON-blob itch_jams table, migrating to normalized schema...");
    db.exec("ALTER TABLE itch_jams RENAME TO itch_jams_legacy");
  } else if (tableColumns(db, "jams").size === 0) {
    console.log("[db] Renaming itch_jams to jams");
    db.exec("ALTER TABLE itch_jams RENAME TO jams");
  }
}

function migrateLegacyRows(db: Database.Database): void {
  if (!tableColumns(db, "itch_jams_legacy").has("jam_data")) return;

  const rows = db.prepare("SELECT jam_id, jam_data FROM itch_jams_legacy").all() as {
    jam_id: string;
    jam_data: string;
  }[];

  const insertJam = db.prepare(
    `INSERT OR REPLACE INTO jams (jam_id, name, start_ts, duration, gametype, hashtag, description)
     VALUES (?, ?, ?, ?, ?, ?, ?)`
  );
  const insertOwner = db.prepare("INSERT OR IGNORE INTO owners (owner_id, name) VALUES (?, ?)");
  const insertLink = db.prepare("INSERT OR IGNORE INTO jam_owners (jam_id, owner_id) VALUES (?, ?)");

  const migrate = db.transaction(() => {
    for (const row of rows) {
      const data = JSON.parse(row.jam_data) as LegacyJamData;
      insertJam.run(
        row.jam_id,
        data.jam_name ?? row.jam_id,
        Math.floor(data.jam_start ?? 0),
        Math.max(0, Math.floor(data.jam_duration ?? 0)),
        categoryFromValue(data.jam_gametype ?? Category.UNCLASSIFIED),
        data.jam_hashtag ?? null,
        data.jam_description ?? null
      );
      for (const [ownerId, ownerName] of Object.entries(data.jam_owners ?? {})) {
        insertOwner.run(ownerId, ownerName);
        insertLink.run(row.jam_id, ownerId);
      }
    }
    db.exec("DROP TABLE itch_jams_legacy");
  });

  // Rolled back as a whole; the legacy table stays for another attempt
  try {
    migrate();
  } catch (err) {
    throw new StorageError("migrateLegacyRows", err);
  }

  console.log(`[db] Migrated ${rows.length} jams from the JSON-blob schema`);
}
