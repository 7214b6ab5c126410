export * from "./audit";
export * from "./catalog";
export * from "./customer";
export * from "./order";
export * from "./realtime";
