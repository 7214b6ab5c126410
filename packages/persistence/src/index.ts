export * from "./backends";
export * from "./unified-persistence";
export * from "./idempotency-store";
export * from "./keyed-queue";
