export * from "./extractTranslatables";
export * from "./exchangeFile";
