/**
 * Exchange file I/O
 *
 * Extraction writes a JSON array of { msgid, msgid_plural? }. The merge side
 * reads one or more JSON objects keyed by msgid.
 */

import * as fs from "fs";
import * as path from "path";
import type { ExchangeRecord, TranslationValue } from "@/types";
import * as logger from "@/logger";
import { readJsonFile } from "@/utils/jsonFile";
import {
  TranslationFileError,
  validateTranslationFile,
} from "@/utils/exchangeValidation";

/**
 * Write extraction output as pretty-printed JSON (non-ASCII kept as is).
 */
export function writeExchangeFile(
  outputFile: string,
  records: readonly ExchangeRecord[],
): void {
  fs.mkdirSync(path.dirname(path.resolve(outputFile)), { recursive: true });
  fs.writeFileSync(outputFile, `${JSON.stringify(records, null, 2)}\n`, "utf-8");
  logger.info(`Written ${records.length} strings to ${outputFile}`);
}

/**
 * Load translation files in order, later files overriding earlier keys.
 *
 * A missing file is reported and skipped so a batch with one absent part
 * still applies the rest.
 *
 * @throws {TranslationFileError} If a present file is not valid JSON or has the wrong shape
 */
export function loadTranslationFiles(
  files: readonly string[],
): Map<string, TranslationValue> {
  const translations = new Map<string, TranslationValue>();

  for (const file of files) {
    if (!fs.existsSync(file)) {
      logger.warn("Translation file not found, skipping", { file });
      continue;
    }

    logger.info(`Loading translations from: ${file}`);
    const raw = readJsonFile(file, (reason) => new TranslationFileError(reason));
    const records = validateTranslationFile(raw);
    for (const [msgid, value] of records) {
      translations.set(msgid, value);
    }
    logger.info(`  Loaded ${records.size} translations from ${file}`);
  }

  return translations;
}
