/**
 * Shared extraction command flow: locate + load catalog, extract, write
 */

import type {
  CatalogLocation,
  ExtractionResult,
  ReachabilityStrategy,
} from "@/types";
import { GettextCatalogIO, resolveCatalogPath } from "@/catalog";
import type { CatalogIO } from "@/catalog";
import { extractTranslatables, writeExchangeFile } from "@/extraction";
import * as logger from "@/logger";

export type RunExtractionOptions = {
  location: CatalogLocation;
  strategy: ReachabilityStrategy;
  outputFile: string;
  /** Human label for the summary line (e.g. "imported modules") */
  label: string;
  io?: CatalogIO;
};

export function runExtraction(options: RunExtractionOptions): ExtractionResult {
  const { location, strategy, outputFile, label } = options;
  const io = options.io ?? new GettextCatalogIO();
  const log = logger.withContext({ strategy: strategy.kind, lang: location.lang });

  const catalogPath = resolveCatalogPath(location);
  log.info(`Loading catalog from: ${catalogPath}`);
  const catalog = io.load(catalogPath);

  const records = extractTranslatables(catalog, strategy);
  writeExchangeFile(outputFile, records);

  log.info(`Total untranslated strings from ${label}: ${records.length}`);
  return { catalogPath, outputFile, count: records.length };
}
