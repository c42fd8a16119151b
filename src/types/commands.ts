/**
 * Command option type definitions
 *
 * Shapes produced by the CLI argument parser and consumed by src/commands.
 */

/**
 * Where to find the catalog for one language.
 */
export type CatalogLocation = {
  /** Directory containing `locale/<lang>/LC_MESSAGES/` */
  localeRoot: string;
  /** Target language code (e.g. "bn") */
  lang: string;
  /** Gettext domain, i.e. catalog file name without extension */
  domain: string;
};

export type ExtractSymbolsOptions = CatalogLocation & {
  /** JSON file mapping dotted key → string */
  symbolsFile: string;
  /** Loaded-module manifest JSON file */
  manifestFile: string;
  outputFile: string;
};

export type ExtractModulesOptions = CatalogLocation & {
  /** Directory occurrence paths are resolved against */
  packageRoot: string;
  /** Loaded-module manifest JSON file */
  manifestFile: string;
  outputFile: string;
};

export type ExtractTemplatesOptions = CatalogLocation & {
  suffix: string;
  outputFile: string;
};

export type UpdateOptions = CatalogLocation & {
  /** Translation JSON files, later files override earlier ones */
  translationFiles: string[];
};

export type CompileOptions = {
  /** Path to the `.po` file */
  poFile: string;
};

/**
 * Result of an extraction command.
 */
export type ExtractionResult = {
  catalogPath: string;
  outputFile: string;
  count: number;
};
