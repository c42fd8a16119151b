export * from "./logger";
export * from "./catalog";
export * from "./reachability";
export * from "./exchange";
export * from "./merge";
export * from "./commands";
