/**
 * `update` command: merge translation files into the catalog and recompile
 */

import type { UpdateOptions, UpdateSummary } from "@/types";
import { resolveCatalogPath } from "@/catalog";
import { loadTranslationFiles } from "@/extraction";
import { updateCatalog } from "@/merge";

export function update(options: UpdateOptions): UpdateSummary {
  const records = loadTranslationFiles(options.translationFiles);
  return updateCatalog({
    catalogPath: resolveCatalogPath(options),
    records,
  });
}
