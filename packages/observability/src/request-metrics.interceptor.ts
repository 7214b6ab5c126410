import { CallHandler, ExecutionContext, HttpException, Injectable, NestInterceptor } from "@nestjs/common";
import { Observable, tap } from "rxjs";
import { MetricsService } from "./metrics.service";

interface FastifyRequestShape {
  method?: string;
  url?: string;
  routeOptions?: { url?: string };
}

interface FastifyReplyShape {
  statusCode?: number;
}

/** Route template when Fastify matched one, else the path without its query. */
export function routeOf(request: FastifyRequestShape): string {
  return (request.routeOptions?.url || request.url || "/").split("?")[0];
}

export function statusOfError(error: unknown): number {
  return error instanceof HttpException ? error.getStatus() : 500;
}

@Injectable()
export class RequestMetricsInterceptor implements NestInterceptor {
  constructor(private readonly metrics: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== "http") return next.handle();

    const http = context.switchToHttp();
    const request = http.getRequest<FastifyRequestShape>();
    const reply = http.getResponse<FastifyReplyShape>();
    const startedAt = Date.now();
    const done = (status: number): void => {
      const now = Date.now();
      this.metrics.record({
        method: (request.method || "UNKNOWN").toUpperCase(),
        route: routeOf(request),
        status,
        durationMs: now - startedAt,
        atUnixMs: now,
      });
    };

    // the exception filter sets the reply status later, so errors carry their own
    return next.handle().pipe(
      tap({
        complete: () => done(reply.statusCode || 200),
        error: (error: unknown) => done(statusOfError(error)),
      }),
    );
  }
}
