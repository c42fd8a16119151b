export * from "./logger";
export * from "./config";
export * from "./catalog";
export * from "./reachability";
export * from "./exchange";
