/**
 * Merge engine
 *
 * Applies externally produced translations onto catalog entries in place.
 *
 * Rules per record (in the mapping's own order):
 * - unknown msgid → notFound
 * - empty / whitespace-only translation → skipped
 * - shape mismatch (plural onto singular entry, singular onto plural entry,
 *   structured value without msgstr) → skipped + warning
 * - value identical to the current one → no-op, counted nowhere
 * - otherwise → write translation, clear fuzzy, updated
 */

import type {
  CatalogEntry,
  MergeCounts,
  TranslationRecords,
  TranslationValue,
} from "@/types";
import { PLURAL_FORM_PREVIEW_LENGTH, PREVIEW_LENGTH } from "@/constants";
import type { Catalog } from "@/catalog/catalog";
import * as logger from "@/logger";
import { preview } from "@/utils/text/preview";

type MergeOutcome = keyof MergeCounts | "unchanged";

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

function applySingular(entry: CatalogEntry, msgstr: string): MergeOutcome {
  if (isBlank(msgstr)) {
    return "skipped";
  }
  if (entry.msgidPlural !== undefined) {
    logger.warn(
      `Translation has a single form but catalog entry is plural: ${preview(entry.msgid, PREVIEW_LENGTH)}`,
    );
    return "skipped";
  }
  if (entry.msgstr === msgstr) {
    return "unchanged";
  }

  entry.msgstr = msgstr;
  entry.fuzzy = false;
  logger.info(
    `Updated: ${preview(entry.msgid, PREVIEW_LENGTH)} -> ${preview(msgstr, PREVIEW_LENGTH)}`,
  );
  return "updated";
}

function applyPlural(
  entry: CatalogEntry,
  forms: readonly string[],
): MergeOutcome {
  if (entry.msgidPlural === undefined) {
    logger.warn(
      `Translation has plural forms but catalog entry doesn't: ${preview(entry.msgid, PREVIEW_LENGTH)}`,
    );
    return "skipped";
  }
  if (forms.every(isBlank)) {
    return "skipped";
  }

  const needsUpdate = forms.some(
    (form, index) => entry.msgstrPlural.get(index) !== form,
  );
  if (!needsUpdate) {
    return "unchanged";
  }

  forms.forEach((form, index) => entry.msgstrPlural.set(index, form));
  entry.fuzzy = false;
  logger.info(
    `Updated plural: ${preview(entry.msgid, PLURAL_FORM_PREVIEW_LENGTH)} -> [${forms
      .map((form) => preview(form, PLURAL_FORM_PREVIEW_LENGTH))
      .join(" / ")}]`,
  );
  return "updated";
}

/**
 * Apply one translation value to its entry.
 */
export function applyTranslation(
  catalog: Catalog,
  msgid: string,
  value: TranslationValue,
): MergeOutcome {
  const entry = catalog.find(msgid);
  if (entry === undefined) {
    logger.warn(`msgid not found in catalog: ${preview(msgid, PREVIEW_LENGTH)}`);
    return "notFound";
  }

  if (typeof value === "string") {
    return applySingular(entry, value);
  }
  if (value.msgstr === undefined) {
    logger.warn(
      `Translation object missing 'msgstr' field for: ${preview(msgid, PREVIEW_LENGTH)}`,
    );
    return "skipped";
  }
  if (typeof value.msgstr === "string") {
    return applySingular(entry, value.msgstr);
  }
  return applyPlural(entry, value.msgstr);
}

/**
 * Merge translation records into the catalog, mutating it in place.
 *
 * @example
 * const counts = mergeTranslations(catalog, new Map([["Save", "Guardar"]]));
 * // => { updated: 1, skipped: 0, notFound: 0 }
 */
export function mergeTranslations(
  catalog: Catalog,
  records: TranslationRecords,
): MergeCounts {
  const counts: MergeCounts = { updated: 0, skipped: 0, notFound: 0 };

  for (const [msgid, value] of records) {
    const outcome = applyTranslation(catalog, msgid, value);
    if (outcome !== "unchanged") {
      counts[outcome]++;
    }
  }

  return counts;
}
