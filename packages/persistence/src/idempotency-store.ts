import { UnifiedPersistence } from "./unified-persistence";

export interface IdempotencyStoreOptions {
  namespace: string;
  ttlSeconds?: number;
  postgresUrl?: string;
  redisUrl?: string;
  log?: (message: string) => void;
}

export interface IdempotencyRecord<TResponse> {
  key: string;
  response: TResponse;
  createdAtIso: string;
  expiresAtUnixMs: number;
}

/**
 * Replays the first successful response stored under a key until it expires.
 * Keys are compared trimmed and case-insensitively. Callers that arrive while
 * a run is in progress wait for it and then read its record.
 */
export class IdempotencyStore {
  private readonly ttlSeconds: number;
  private readonly persistence: UnifiedPersistence;
  private readonly running = new Map<string, Promise<void>>();

  constructor(options: IdempotencyStoreOptions) {
    this.ttlSeconds = options.ttlSeconds ?? 300;
    this.persistence = new UnifiedPersistence({
      namespace: `${options.namespace}:idempotency`,
      postgresUrl: options.postgresUrl,
      redisUrl: options.redisUrl,
      log: options.log,
    });
  }

  async execute<TResponse>(key: string, handler: () => Promise<TResponse> | TResponse): Promise<TResponse> {
    const normalized = normalizeKey(key);

    const pending = this.running.get(normalized);
    if (pending) {
      await pending;
      return this.execute(normalized, handler);
    }

    const run = this.runOnce(normalized, handler);
    // settles either way; the caller of `run` sees the failure
    this.running.set(normalized, run.then(() => undefined, () => undefined));
    try {
      return await run;
    } finally {
      this.running.delete(normalized);
    }
  }

  async get<TResponse>(key: string): Promise<IdempotencyRecord<TResponse> | null> {
    const record = await this.persistence.getState<IdempotencyRecord<TResponse>>(recordKey(normalizeKey(key)));
    if (!record || record.expiresAtUnixMs <= Date.now()) return null;
    return record;
  }

  private async runOnce<TResponse>(key: string, handler: () => Promise<TResponse> | TResponse): Promise<TResponse> {
    const existing = await this.get<TResponse>(key);
    if (existing) return existing.response;

    const response = await handler();
    const now = Date.now();
    await this.persistence.setState<IdempotencyRecord<TResponse>>(recordKey(key), {
      key,
      response,
      createdAtIso: new Date(now).toISOString(),
      expiresAtUnixMs: now + this.ttlSeconds * 1000,
    });
    return response;
  }
}

function normalizeKey(raw: string): string {
  return raw.trim().toLowerCase();
}

function recordKey(normalized: string): string {
  return `key:${normalized}`;
}
