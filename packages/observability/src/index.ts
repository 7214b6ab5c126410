export * from "./health.controller";
export * from "./metrics.controller";
export * from "./metrics.service";
export * from "./observability.module";
export * from "./request-metrics.interceptor";
export * from "./sentry";
export * from "./tokens";
