import type { CoreDatabase } from "../core-database";
import { Migration, MIGRATIONS } from "./definitions";

export interface MigrationStatus {
  id: string;
  applied: boolean;
}

const CREATE_LEDGER = `
  create table if not exists schema_migrations (
    migration_id text primary key,
    applied_at timestamptz not null
  )
`;

/** Applies and reverts {@link MIGRATIONS}, recording each id in `schema_migrations`. */
export class MigrationRunner {
  constructor(
    private readonly db: CoreDatabase,
    private readonly migrations: readonly Migration[] = MIGRATIONS,
  ) {}

  async up(): Promise<string[]> {
    if (!this.db.isReady()) return [];
    const applied = await this.appliedIds();
    const pending = this.migrations.filter((migration) => !applied.has(migration.id));

    for (const migration of pending) {
      await this.db.transaction([
        ...migration.up.map((sql) => ({ sql })),
        { sql: "insert into schema_migrations (migration_id, applied_at) values ($1, now())", params: [migration.id] },
      ]);
    }
    return pending.map((migration) => migration.id);
  }

  /** Reverts the most recently applied migration; null when none is applied. */
  async down(): Promise<string | null> {
    if (!this.db.isReady()) return null;
    await this.db.query(CREATE_LEDGER);

    const [latest] = await this.db.query(
      "select migration_id from schema_migrations order by applied_at desc, migration_id desc limit 1",
    );
    if (!latest) return null;

    const id = String(latest.migration_id);
    const migration = this.migrations.find((candidate) => candidate.id === id);
    if (!migration) throw new Error(`Unknown migration id ${id}`);

    await this.db.transaction([
      ...migration.down.map((sql) => ({ sql })),
      { sql: "delete from schema_migrations where migration_id = $1", params: [id] },
    ]);
    return id;
  }

  async status(): Promise<MigrationStatus[]> {
    const applied = this.db.isReady() ? await this.appliedIds() : new Set<string>();
    return this.migrations.map((migration) => ({ id: migration.id, applied: applied.has(migration.id) }));
  }

  private async appliedIds(): Promise<Set<string>> {
    await this.db.query(CREATE_LEDGER);
    const rows = await this.db.query("select migration_id from schema_migrations");
    return new Set(rows.map((row) => String(row.migration_id)));
  }
}

export function migrationIds(): string[] {
  return MIGRATIONS.map((migration) => migration.id);
}
