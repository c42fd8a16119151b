export * from "./extractSymbols";
export * from "./extractModules";
export * from "./extractTemplates";
export * from "./update";
export * from "./runExtraction";
export * from "./compile";
