/**
 * Update flow: load catalog → merge translations → persist + compile
 */

import type { TranslationRecords, UpdateSummary } from "@/types";
import { GettextCatalogIO } from "@/catalog/catalogIO";
import type { CatalogIO } from "@/catalog/catalogIO";
import * as logger from "@/logger";
import { mergeTranslations } from "./mergeTranslations";

export type UpdateCatalogOptions = {
  /** Textual catalog to update; the binary form is written beside it */
  catalogPath: string;
  records: TranslationRecords;
  /** Defaults to GettextCatalogIO */
  io?: CatalogIO;
};

/**
 * Apply translations to a catalog file and recompile it.
 *
 * The catalog is only changed in memory while merging and written once at
 * the end, even when every record was a no-op.
 *
 * @throws {CatalogNotFoundError} If the catalog does not exist
 * @throws {CatalogParseError} If the catalog cannot be parsed
 * @throws {CatalogPersistError} If writing fails (previous files kept)
 */
export function updateCatalog(options: UpdateCatalogOptions): UpdateSummary {
  const { catalogPath, records } = options;
  const io = options.io ?? new GettextCatalogIO();

  logger.info(`Loading catalog from: ${catalogPath}`);
  const catalog = io.load(catalogPath);

  logger.info(`Total translations to apply: ${records.size}`);
  const counts = mergeTranslations(catalog, records);

  logger.info(`Saving updated catalog to: ${catalogPath}`);
  const binaryPath = io.persist(catalog, catalogPath);
  logger.info(`Compiled binary catalog to: ${binaryPath}`);

  const summary: UpdateSummary = {
    ...counts,
    total: records.size,
    catalogPath,
    binaryPath,
  };

  logger.info("Update summary", {
    total: summary.total,
    updated: summary.updated,
    skipped: summary.skipped,
    notFound: summary.notFound,
  });

  return summary;
}
