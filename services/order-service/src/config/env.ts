export interface OrderEnv {
  port: number;
  databaseUrl?: string;
  redisUrl?: string;
  catalogServiceUrl: string;
  taxRateBps: number;
  minSubtotalCents: number;
  scheduleLeadMinutes: number;
  businessOpenHour: number;
  businessCloseHour: number;
  timezoneOffsetMinutes: number;
  deliveryFeeCacheTtlSeconds: number;
  menuCacheTtlSeconds: number;
  idempotencyTtlSeconds: number;
}

function asNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function getOrderEnv(): OrderEnv {
  return {
    port: asNumber(process.env.ORDER_SERVICE_PORT, 4003),
    databaseUrl: process.env.ORDER_DATABASE_URL || process.env.DATABASE_URL,
    redisUrl: process.env.REDIS_URL,
    catalogServiceUrl: process.env.CATALOG_SERVICE_URL || "http://127.0.0.1:4002",
    taxRateBps: asNumber(process.env.ORDER_TAX_RATE_BPS, 600),
    minSubtotalCents: asNumber(process.env.ORDER_MIN_SUBTOTAL_CENTS, 500),
    scheduleLeadMinutes: asNumber(process.env.ORDER_SCHEDULE_LEAD_MINUTES, 120),
    businessOpenHour: asNumber(process.env.ORDER_BUSINESS_OPEN_HOUR, 8),
    businessCloseHour: asNumber(process.env.ORDER_BUSINESS_CLOSE_HOUR, 22),
    timezoneOffsetMinutes: asNumber(process.env.ORDER_TZ_OFFSET_MINUTES, 480),
    deliveryFeeCacheTtlSeconds: asNumber(process.env.ORDER_DELIVERY_FEE_CACHE_TTL_SEC, 300),
    menuCacheTtlSeconds: asNumber(process.env.ORDER_MENU_CACHE_TTL_SEC, 30),
    idempotencyTtlSeconds: asNumber(process.env.ORDER_IDEMPOTENCY_TTL_SEC, 900),
  };
}
