import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { JamStore, openJamStore, withJamStore } from "../lib/db";
import { NotFoundError, StorageError } from "../lib/errors";
import { Category, crawledJam, type CrawledJam, type OwnerMap } from "../lib/types";

function makeJam(overrides: Partial<Omit<CrawledJam, "crawled">> = {}): CrawledJam {
  return crawledJam({
    id: "pocket-dungeon",
    name: "Pocket Dungeon Jam",
    start: new Date(Date.UTC(2031, 2, 1, 12)),
    duration: 14,
    category: Category.TABLETOP,
    hashtag: "#PocketDungeonJam",
    description: '<div class="jam_content"><p>Dungeons.</p></div>',
    owners: { lanternworks: "Lantern Works", "mossy-die": "Mossy Die" },
    ...overrides,
  });
}

function ownersOf(db: Database.Database, jamId: string): string[] {
  const rows = db
    .prepare("SELECT owner_id FROM jam_owners WHERE jam_id = ? ORDER BY owner_id")
    .all(jamId) as { owner_id: string }[];
  return rows.map((r) => r.owner_id);
}

describe("JamStore", () => {
  let db: Database.Database;
  let store: JamStore;

  beforeEach(() => {
    db = new Database(":memory:");
    store = new JamStore(db);
  });

  afterEach(() => {
    if (db.open) store.close();
  });

  describe("upsertJam / loadJam", () => {
    it("round-trips scalar fields and the owner map", () => {
      const jam = makeJam();
      store.upsertJam(jam);
      expect(store.loadJam(jam.id)).toEqual(jam);
    });

    it("round-trips a jam without hashtag or owners", () => {
      const jam = makeJam({ hashtag: null, owners: {}, category: Category.UNCLASSIFIED });
      store.upsertJam(jam);
      expect(store.loadJam(jam.id)).toEqual(jam);
    });

    it("returns null for an unknown id", () => {
      expect(store.loadJam("nope")).toBeNull();
    });

    it("updates in place instead of duplicating", () => {
      store.upsertJam(makeJam());
      store.upsertJam(makeJam({ name: "Renamed Jam", duration: 7, hashtag: null }));

      const count = db.prepare("SELECT COUNT(*) AS c FROM jams").get() as { c: number };
      expect(count.c).toBe(1);
      const loaded = store.loadJam("pocket-dungeon");
      expect(loaded?.name).toBe("Renamed Jam");
      expect(loaded?.duration).toBe(7);
      expect(loaded?.hashtag).toBeNull();
    });

    it("replaces the owner set on every save", () => {
      store.upsertJam(makeJam({ owners: { a: "A", b: "B" } }));
      store.upsertJam(makeJam({ owners: { b: "B", c: "C" } }));

      expect(ownersOf(db, "pocket-dungeon")).toEqual(["b", "c"]);
      expect(store.loadJam("pocket-dungeon")?.owners).toEqual({ b: "B", c: "C" });
    });

    it("keeps owner rows shared with other jams", () => {
      store.upsertJam(makeJam({ id: "one", owners: { shared: "Shared Host" } }));
      store.upsertJam(makeJam({ id: "two", owners: { shared: "Shared Host" } }));

      const owners = db.prepare("SELECT COUNT(*) AS c FROM owners").get() as { c: number };
      expect(owners.c).toBe(1);
      expect(ownersOf(db, "one")).toEqual(["shared"]);
      expect(ownersOf(db, "two")).toEqual(["shared"]);
    });

    it("refreshes an owner's display name", () => {
      store.upsertJam(makeJam({ owners: { host: "Old Name" } }));
      store.upsertJam(makeJam({ owners: { host: "New Name" } }));
      expect(store.loadJam("pocket-dungeon")?.owners).toEqual({ host: "New Name" });
    });

    it("every association references an existing owner", () => {
      store.upsertJam(makeJam({ id: "one", owners: { a: "A", b: "B" } }));
      store.upsertJam(makeJam({ id: "two", owners: { c: "C" } }));
      store.upsertJam(makeJam({ id: "one", owners: { c: "C" } }));

      const dangling = db
        .prepare("SELECT COUNT(*) AS c FROM jam_owners jo LEFT JOIN owners o ON o.owner_id = jo.owner_id WHERE o.owner_id IS NULL")
        .get() as { c: number };
      expect(dangling.c).toBe(0);
    });

    it("rolls back the whole save when part of it fails", () => {
      store.upsertJam(makeJam({ owners: { a: "A" } }));
      db.exec(`
        CREATE TRIGGER reject_owner BEFORE INSERT ON jam_owners
        WHEN NEW.owner_id = 'bad'
        BEGIN SELECT RAISE(ABORT, 'owner rejected'); END;
      `);

      expect(() => store.upsertJam(makeJam({ name: "Half Written", owners: { b: "B", bad: "Bad" } }))).toThrow(
        StorageError
      );

      const loaded = store.loadJam("pocket-dungeon");
      expect(loaded?.name).toBe("Pocket Dungeon Jam");
      expect(loaded?.owners).toEqual({ a: "A" });
    });
  });

  describe("deleteJam", () => {
    it("removes the jam and its associations but keeps owners", () => {
      store.upsertJam(makeJam({ owners: { a: "A" } }));
      store.deleteJam("pocket-dungeon");

      expect(store.loadJam("pocket-dungeon")).toBeNull();
      expect(ownersOf(db, "pocket-dungeon")).toEqual([]);
      const owners = db.prepare("SELECT owner_id FROM owners").all();
      expect(owners).toEqual([{ owner_id: "a" }]);
    });

    it("throws NotFoundError and changes nothing for an unknown id", () => {
      store.upsertJam(makeJam());
      expect(() => store.deleteJam("never-crawled")).toThrow(NotFoundError);
      expect(store.listAllKnownIds()).toEqual(new Set(["pocket-dungeon"]));
    });
  });

  describe("queryJams", () => {
    const NOW = new Date(Date.UTC(2031, 5, 15));

    beforeEach(() => {
      const owners = (ids: string[]): OwnerMap => Object.fromEntries(ids.map((id) => [id, id.toUpperCase()]));
      // ends 2031-06-20: current
      store.upsertJam(makeJam({ id: "current-tt", start: new Date(Date.UTC(2031, 5, 10)), duration: 10, category: Category.TABLETOP, owners: owners(["ann"]) }));
      // ends 2031-06-30: current
      store.upsertJam(makeJam({ id: "current-dig", start: new Date(Date.UTC(2031, 5, 20)), duration: 10, category: Category.DIGITAL, owners: owners(["bob"]) }));
      // ends 2031-06-05: past
      store.upsertJam(makeJam({ id: "past-tt", start: new Date(Date.UTC(2031, 5, 1)), duration: 4, category: Category.TABLETOP, owners: owners(["ann", "bob"]) }));
    });

    it("filters by category and keeps current jams", () => {
      expect(store.queryJams({ kind: "category", category: Category.TABLETOP }, { current: true, past: false }, NOW)).toEqual(["current-tt"]);
    });

    it("returns past jams only", () => {
      expect(store.queryJams({ kind: "category", category: Category.TABLETOP }, { current: false, past: true }, NOW)).toEqual(["past-tt"]);
    });

    it("returns both, ordered by end date", () => {
      expect(store.queryJams({ kind: "all" }, { current: true, past: true }, NOW)).toEqual([
        "past-tt",
        "current-tt",
        "current-dig",
      ]);
    });

    it("filters by owner", () => {
      expect(store.queryJams({ kind: "owner", ownerId: "bob" }, { current: true, past: true }, NOW)).toEqual([
        "past-tt",
        "current-dig",
      ]);
    });

    it("filters by id", () => {
      expect(store.queryJams({ kind: "id", jamId: "past-tt" }, { current: true, past: false }, NOW)).toEqual([]);
      expect(store.queryJams({ kind: "id", jamId: "past-tt" }, { current: false, past: true }, NOW)).toEqual(["past-tt"]);
    });

    it("returns nothing when neither temporal side is selected", () => {
      expect(store.queryJams({ kind: "all" }, { current: false, past: false }, NOW)).toEqual([]);
    });
  });

  describe("categories", () => {
    it("reads the stored category", () => {
      store.upsertJam(makeJam({ category: Category.DIGITAL }));
      expect(store.getCategory("pocket-dungeon")).toBe(Category.DIGITAL);
      expect(store.getCategory("missing")).toBeNull();
    });

    it("setCategory changes a classified jam explicitly", () => {
      store.upsertJam(makeJam({ category: Category.TABLETOP }));
      store.setCategory("pocket-dungeon", Category.DIGITAL);
      expect(store.loadJam("pocket-dungeon")?.category).toBe(Category.DIGITAL);
    });

    it("setCategory on an unknown id throws NotFoundError", () => {
      expect(() => store.setCategory("missing", Category.TABLETOP)).toThrow(NotFoundError);
    });
  });

  it("lists every known id", () => {
    store.upsertJam(makeJam({ id: "a" }));
    store.upsertJam(makeJam({ id: "b" }));
    expect(store.listAllKnownIds()).toEqual(new Set(["a", "b"]));
  });

  it("seeds the gametype lookup table", () => {
    const rows = db.prepare("SELECT id, name FROM jam_gametypes ORDER BY id").all();
    expect(rows).toEqual([
      { id: 0, name: "unclassified" },
      { id: 1, name: "tabletop" },
      { id: 2, name: "digital" },
    ]);
  });
});

describe("withJamStore", () => {
  it("closes the store after the callback, even when it throws", async () => {
    const opened: JamStore[] = [];
    await expect(
      withJamStore(":memory:", (store) => {
        opened.push(store);
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(opened).toHaveLength(1);
    expect(() => opened[0].loadJam("pocket-dungeon")).toThrow(StorageError);
  });

  it("returns the callback's value", async () => {
    const ids = await withJamStore(":memory:", (store) => {
      store.upsertJam(makeJam());
      return [...store.listAllKnownIds()];
    });
    expect(ids).toEqual(["pocket-dungeon"]);
  });
});

describe("openJamStore", () => {
  it("opens an in-memory store", () => {
    const store = openJamStore(":memory:");
    expect(store.listAllKnownIds().size).toBe(0);
    store.close();
  });
});
