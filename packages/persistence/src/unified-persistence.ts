import {
  CacheBackend,
  MemoryCacheBackend,
  MemoryStateBackend,
  PostgresStateBackend,
  RedisCacheBackend,
  StateBackend,
} from "./backends";

export interface PersistenceOptions {
  namespace: string;
  postgresUrl?: string;
  redisUrl?: string;
  log?: (message: string) => void;
}

/**
 * Namespaced JSON state (Postgres `app_state`) plus a TTL cache (Redis).
 * Memory always holds a copy; a remote backend that fails is logged and
 * the memory copy answers instead.
 */
export class UnifiedPersistence {
  private readonly memoryState = new MemoryStateBackend();
  private readonly memoryCache = new MemoryCacheBackend();
  private readonly log: (message: string) => void;
  private remoteState?: StateBackend;
  private remoteCache?: CacheBackend;
  private ready?: Promise<void>;

  constructor(private readonly options: PersistenceOptions) {
    this.log = options.log || (() => undefined);
  }

  init(): Promise<void> {
    if (!this.ready) this.ready = this.connect();
    return this.ready;
  }

  async getState<T>(key: string): Promise<T | null> {
    await this.init();
    const raw = await this.attempt("getState", (backend: StateBackend) => backend.read(this.namespace, key), this.remoteState);
    const value = raw ?? await this.memoryState.read(this.namespace, key);
    return value === null ? null : (JSON.parse(value) as T);
  }

  async setState<T>(key: string, value: T): Promise<void> {
    await this.init();
    const encoded = JSON.stringify(value);
    await this.memoryState.write(this.namespace, key, encoded);
    await this.attempt("setState", (backend: StateBackend) => backend.write(this.namespace, key, encoded), this.remoteState);
  }

  async deleteState(key: string): Promise<void> {
    await this.init();
    await this.memoryState.remove(this.namespace, key);
    await this.attempt("deleteState", (backend: StateBackend) => backend.remove(this.namespace, key), this.remoteState);
  }

  async getCache(key: string): Promise<string | null> {
    await this.init();
    const scoped = this.cacheKey(key);
    if (this.remoteCache) {
      try {
        return await this.remoteCache.read(scoped);
      } catch (error) {
        this.log(`redis getCache fallback to memory: ${String(error)}`);
      }
    }
    return this.memoryCache.read(scoped);
  }

  async setCache(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.init();
    const scoped = this.cacheKey(key);
    await this.memoryCache.write(scoped, value, ttlSeconds);
    await this.attempt("setCache", (backend: CacheBackend) => backend.write(scoped, value, ttlSeconds), this.remoteCache);
  }

  async deleteCache(key: string): Promise<void> {
    await this.init();
    const scoped = this.cacheKey(key);
    await this.memoryCache.remove(scoped);
    await this.attempt("deleteCache", (backend: CacheBackend) => backend.remove(scoped), this.remoteCache);
  }

  /** Cached JSON value for `key`, produced by `load` on a miss. */
  async remember<T>(key: string, ttlSeconds: number, load: () => Promise<T> | T): Promise<T> {
    const cached = await this.getCache(key);
    if (cached !== null) return JSON.parse(cached) as T;

    const value = await load();
    await this.setCache(key, JSON.stringify(value), ttlSeconds);
    return value;
  }

  private get namespace(): string {
    return this.options.namespace;
  }

  private cacheKey(key: string): string {
    return `${this.namespace}:cache:${key}`;
  }

  private async attempt<B, R>(
    operation: string,
    run: (backend: B) => Promise<R>,
    backend: B | undefined,
  ): Promise<R | null> {
    if (!backend) return null;
    try {
      return await run(backend);
    } catch (error) {
      this.log(`${operation} on remote backend failed: ${String(error)}`);
      return null;
    }
  }

  private async connect(): Promise<void> {
    const { postgresUrl, redisUrl } = this.options;

    if (postgresUrl) {
      try {
        this.remoteState = await PostgresStateBackend.connect(postgresUrl);
        this.log(`postgres enabled for ${this.namespace}`);
      } catch (error) {
        this.log(`postgres unavailable for ${this.namespace}; using memory: ${String(error)}`);
      }
    }

    if (redisUrl) {
      try {
        this.remoteCache = await RedisCacheBackend.connect(redisUrl);
        this.log(`redis enabled for ${this.namespace}`);
      } catch (error) {
        this.log(`redis unavailable for ${this.namespace}; using memory: ${String(error)}`);
      }
    }
  }
}
