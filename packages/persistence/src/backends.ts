import Redis from "ioredis";
import { Pool } from "pg";

/** Durable key/value store for JSON documents. */
export interface StateBackend {
  read(namespace: string, key: string): Promise<string | null>;
  write(namespace: string, key: string, value: string): Promise<void>;
  remove(namespace: string, key: string): Promise<void>;
}

/** Expiring key/value store for serialized responses. */
export interface CacheBackend {
  read(key: string): Promise<string | null>;
  write(key: string, value: string, ttlSeconds: number): Promise<void>;
  remove(key: string): Promise<void>;
}

export class MemoryStateBackend implements StateBackend {
  private readonly values = new Map<string, string>();

  async read(namespace: string, key: string): Promise<string | null> {
    return this.values.get(`${namespace}:${key}`) ?? null;
  }

  async write(namespace: string, key: string, value: string): Promise<void> {
    this.values.set(`${namespace}:${key}`, value);
  }

  async remove(namespace: string, key: string): Promise<void> {
    this.values.delete(`${namespace}:${key}`);
  }
}

export class MemoryCacheBackend implements CacheBackend {
  private readonly entries = new Map<string, { value: string; expiresAtUnixMs: number }>();

  async read(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAtUnixMs <= Date.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async write(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAtUnixMs: Date.now() + ttlSeconds * 1000 });
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }
}

export class PostgresStateBackend implements StateBackend {
  private constructor(private readonly pool: Pool) {}

  /** Connects and creates `app_state`; rejects when the server is unreachable. */
  static async connect(connectionString: string): Promise<PostgresStateBackend> {
    const pool = new Pool({ connectionString });
    await pool.query(
      "create table if not exists app_state (namespace text not null, key text not null, value_json text not null, updated_at timestamptz not null default now(), primary key(namespace, key))",
    );
    return new PostgresStateBackend(pool);
  }

  async read(namespace: string, key: string): Promise<string | null> {
    const { rows } = await this.pool.query<{ value_json: string }>(
      "select value_json from app_state where namespace = $1 and key = $2 limit 1",
      [namespace, key],
    );
    return rows[0]?.value_json ?? null;
  }

  async write(namespace: string, key: string, value: string): Promise<void> {
    await this.pool.query(
      "insert into app_state (namespace, key, value_json, updated_at) values ($1, $2, $3, now()) on conflict (namespace, key) do update set value_json = excluded.value_json, updated_at = now()",
      [namespace, key, value],
    );
  }

  async remove(namespace: string, key: string): Promise<void> {
    await this.pool.query("delete from app_state where namespace = $1 and key = $2", [namespace, key]);
  }
}

export class RedisCacheBackend implements CacheBackend {
  private constructor(private readonly redis: Redis) {}

  static async connect(url: string): Promise<RedisCacheBackend> {
    const redis = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 1 });
    await redis.connect();
    return new RedisCacheBackend(redis);
  }

  async read(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async write(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, "EX", ttlSeconds);
  }

  async remove(key: string): Promise<void> {
    await this.redis.del(key);
  }
}
