import { Inject, Injectable } from "@nestjs/common";
import { SERVICE_NAME } from "./tokens";

export interface RequestMetric {
  method: string;
  route: string;
  status: number;
  durationMs: number;
  atUnixMs: number;
}

export interface LatencySummary {
  requests: number;
  /** 5xx responses */
  errors: number;
  /** 4xx responses, mostly rejected carts, checkouts and imports */
  rejections: number;
  errorRate: number;
  p50Ms: number;
  p95Ms: number;
}

export interface RouteSnapshot extends LatencySummary {
  key: string;
}

export interface MetricsSnapshot {
  service: string;
  windowSeconds: number;
  totalRequests: number;
  errorRequests: number;
  rejectedRequests: number;
  errorRate: number;
  p50Ms: number;
  p95Ms: number;
  routes: RouteSnapshot[];
  alerts: string[];
  generatedAtIso: string;
}

const MAX_POINTS = 20_000;
const MAX_ROUTES = 20;
// alerts stay quiet below this many requests in the window
const ALERT_MIN_REQUESTS = 20;
const ALERT_ERROR_RATE = 0.05;
const ALERT_P95_MS = 800;

/** Nearest-rank percentile. */
export function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.ceil((p / 100) * sorted.length);
  return sorted[Math.min(sorted.length, Math.max(rank, 1)) - 1];
}

function ratio(part: number, whole: number): number {
  return whole === 0 ? 0 : Number((part / whole).toFixed(4));
}

export function summarize(points: RequestMetric[]): LatencySummary {
  const durations = points.map((point) => point.durationMs);
  const errors = points.filter((point) => point.status >= 500).length;
  return {
    requests: points.length,
    errors,
    rejections: points.filter((point) => point.status >= 400 && point.status < 500).length,
    errorRate: ratio(errors, points.length),
    p50Ms: percentile(durations, 50),
    p95Ms: percentile(durations, 95),
  };
}

/** In-process request log, summarized over a sliding window on demand. */
@Injectable()
export class MetricsService {
  private points: RequestMetric[] = [];

  constructor(@Inject(SERVICE_NAME) private readonly serviceName: string) {}

  record(metric: RequestMetric): void {
    this.points.push(metric);
    if (this.points.length > MAX_POINTS) this.points = this.points.slice(-MAX_POINTS);
  }

  snapshot(windowSeconds = 300, now = Date.now()): MetricsSnapshot {
    const since = now - windowSeconds * 1000;
    const recent = this.points.filter((point) => point.atUnixMs >= since);
    const overall = summarize(recent);

    const byRoute = new Map<string, RequestMetric[]>();
    for (const point of recent) {
      const key = `${point.method} ${point.route}`;
      byRoute.set(key, [...(byRoute.get(key) ?? []), point]);
    }
    const routes = [...byRoute]
      .map(([key, points]) => ({ key, ...summarize(points) }))
      .sort((a, b) => b.requests - a.requests)
      .slice(0, MAX_ROUTES);

    const alerts: string[] = [];
    if (overall.requests >= ALERT_MIN_REQUESTS) {
      if (overall.errorRate >= ALERT_ERROR_RATE) alerts.push("HIGH_ERROR_RATE");
      if (overall.p95Ms >= ALERT_P95_MS) alerts.push("HIGH_P95_LATENCY");
    }

    return {
      service: this.serviceName,
      windowSeconds,
      totalRequests: overall.requests,
      errorRequests: overall.errors,
      rejectedRequests: overall.rejections,
      errorRate: overall.errorRate,
      p50Ms: overall.p50Ms,
      p95Ms: overall.p95Ms,
      routes,
      alerts,
      generatedAtIso: new Date(now).toISOString(),
    };
  }
}
