/**
 * Extraction pipeline
 *
 * Turns the untranslated, reachable entries of a catalog into exchange
 * records for a translation provider.
 *
 * Pipeline per entry (catalog order):
 * 1. Skip translated entries
 * 2. Skip entries the strategy does not consider reachable
 * 3. Build { msgid, msgid_plural? }
 * 4. Drop msgids already emitted in this run (first occurrence wins)
 */

import type { CatalogEntry, ExchangeRecord, ReachabilityStrategy } from "@/types";
import { PLURAL_PREVIEW_LENGTH, PREVIEW_LENGTH } from "@/constants";
import { isTranslated } from "@/catalog/catalog";
import { checkReachability } from "@/reachability";
import * as logger from "@/logger";
import { preview } from "@/utils/text/preview";

function toRecord(entry: CatalogEntry): ExchangeRecord {
  const record: ExchangeRecord = { msgid: entry.msgid };
  if (entry.msgidPlural !== undefined) {
    record.msgid_plural = entry.msgidPlural;
  }
  return record;
}

function reportFound(record: ExchangeRecord, via: string): void {
  if (record.msgid_plural !== undefined) {
    logger.info(
      `Found untranslated plural in ${via}: ${preview(record.msgid, PLURAL_PREVIEW_LENGTH)} / ${preview(record.msgid_plural, PLURAL_PREVIEW_LENGTH)}`,
    );
  } else {
    logger.info(
      `Found untranslated in ${via}: ${preview(record.msgid, PREVIEW_LENGTH)}`,
    );
  }
}

/**
 * Lazily yield exchange records for reachable, untranslated entries.
 *
 * Single pass: the generator cannot be restarted. Order follows the catalog.
 */
export function* iterateTranslatables(
  entries: Iterable<CatalogEntry>,
  strategy: ReachabilityStrategy,
): Generator<ExchangeRecord, void, undefined> {
  const seen = new Set<string>();

  for (const entry of entries) {
    if (isTranslated(entry)) continue;
    if (seen.has(entry.msgid)) continue;

    const verdict = checkReachability(entry, strategy);
    if (!verdict.reachable) continue;

    seen.add(entry.msgid);
    const record = toRecord(entry);
    reportFound(record, verdict.via);
    yield record;
  }
}

/**
 * Collect all exchange records for a catalog under one strategy.
 *
 * @example
 * const records = extractTranslatables(catalog, { kind: "templateSource" });
 * // => [{ msgid: "Sign in" }, { msgid: "%d file", msgid_plural: "%d files" }]
 */
export function extractTranslatables(
  entries: Iterable<CatalogEntry>,
  strategy: ReachabilityStrategy,
): ExchangeRecord[] {
  return Array.from(iterateTranslatables(entries, strategy));
}
