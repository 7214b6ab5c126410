export * from "./core-database";
export * from "./migrations/definitions";
export * from "./migrations/runner";
