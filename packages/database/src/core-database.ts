import { Pool } from "pg";
import { MigrationRunner } from "./migrations/runner";

export type DbRow = Record<string, unknown>;

export interface DbStatement {
  sql: string;
  params?: unknown[];
}

export interface DatabaseOptions {
  connectionString?: string;
  log?: (message: string) => void;
  /** Apply pending migrations on first connect. Defaults to true. */
  autoMigrate?: boolean;
}

/**
 * Thin wrapper over a pg pool. Without a connection string (or when the
 * server cannot be reached) it stays unready: reads return no rows and
 * writes do nothing, so callers keep serving from memory.
 */
export class CoreDatabase {
  private readonly log: (message: string) => void;
  private pool?: Pool;
  private connecting?: Promise<void>;

  constructor(private readonly options: DatabaseOptions) {
    this.log = options.log || (() => undefined);
  }

  init(): Promise<void> {
    if (!this.connecting) this.connecting = this.connect();
    return this.connecting;
  }

  isReady(): boolean {
    return this.pool !== undefined;
  }

  async query(sql: string, params: unknown[] = []): Promise<DbRow[]> {
    if (!this.pool) return [];
    const { rows } = await this.pool.query<DbRow>(sql, params);
    return rows;
  }

  /** Runs the statements on one pooled client inside begin/commit. */
  async transaction(statements: DbStatement[]): Promise<void> {
    if (!this.pool) return;
    const client = await this.pool.connect();
    try {
      await client.query("begin");
      for (const { sql, params } of statements) await client.query(sql, params || []);
      await client.query("commit");
    } catch (error) {
      await client.query("rollback");
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    const pool = this.pool;
    this.pool = undefined;
    this.connecting = undefined;
    if (pool) await pool.end();
  }

  private async connect(): Promise<void> {
    if (!this.options.connectionString) return;

    const pool = new Pool({ connectionString: this.options.connectionString });
    try {
      await pool.query("select 1");
      this.pool = pool;
      if (this.options.autoMigrate ?? true) {
        const applied = await new MigrationRunner(this).up();
        if (applied.length > 0) this.log(`applied migrations ${applied.join(", ")}`);
      }
      this.log("postgres connected");
    } catch (error) {
      this.pool = undefined;
      await pool.end().catch((closeError: unknown) => this.log(`closing failed pool: ${String(closeError)}`));
      this.log(`postgres unavailable, serving from memory: ${String(error)}`);
    }
  }
}
