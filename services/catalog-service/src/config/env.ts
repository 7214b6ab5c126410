export interface CatalogEnv {
  port: number;
  databaseUrl?: string;
  redisUrl?: string;
  importPreviewTtlSeconds: number;
  importMaxRows: number;
}

function asNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function getCatalogEnv(): CatalogEnv {
  return {
    port: asNumber(process.env.CATALOG_SERVICE_PORT, 4002),
    databaseUrl: process.env.CATALOG_DATABASE_URL || process.env.DATABASE_URL,
    redisUrl: process.env.REDIS_URL,
    importPreviewTtlSeconds: asNumber(process.env.CATALOG_IMPORT_PREVIEW_TTL_SEC, 1800),
    importMaxRows: asNumber(process.env.CATALOG_IMPORT_MAX_ROWS, 500),
  };
}
