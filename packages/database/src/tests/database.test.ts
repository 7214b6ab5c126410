import { CoreDatabase, MigrationRunner, migrationIds } from "../index";

describe("CoreDatabase without a connection string", () => {
  it("stays unready and answers queries with no rows", async () => {
    const messages: string[] = [];
    const db = new CoreDatabase({ log: (message) => messages.push(message) });

    await db.init();

    expect(db.isReady()).toBe(false);
    expect(await db.query("select 1")).toEqual([]);
    await expect(db.transaction([{ sql: "delete from carts" }])).resolves.toBeUndefined();
    expect(messages).toEqual([]);
  });
});

describe("MigrationRunner", () => {
  it("does nothing against an unready database", async () => {
    const runner = new MigrationRunner(new CoreDatabase({}));

    expect(await runner.up()).toEqual([]);
    expect(await runner.down()).toBeNull();
  });

  it("reports every migration as pending", async () => {
    const runner = new MigrationRunner(new CoreDatabase({}));

    expect(await runner.status()).toEqual([
      { id: "001_core_tables", applied: false },
      { id: "002_indexes", applied: false },
    ]);
    expect(migrationIds()).toEqual(["001_core_tables", "002_indexes"]);
  });

  it("takes a custom migration list", async () => {
    const runner = new MigrationRunner(new CoreDatabase({}), [
      { id: "900_scratch", up: ["create table scratch (id text)"], down: ["drop table scratch"] },
    ]);

    expect(await runner.status()).toEqual([{ id: "900_scratch", applied: false }]);
  });
});
