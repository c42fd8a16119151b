export * from "./catalog";
export * from "./catalogIO";
export * from "./errors";
export * from "./occurrences";
export * from "./paths";
export * from "./compile";
