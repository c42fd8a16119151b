export * from "./mergeTranslations";
export * from "./updateCatalog";
