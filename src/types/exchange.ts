/**
 * Exchange format type definitions
 *
 * JSON shapes handed to and received from an external translation provider.
 * Field names follow gettext (`msgid_plural`, `msgstr`) since they are part
 * of the file format.
 */

/**
 * Extraction output record (one untranslated string).
 */
export type ExchangeRecord = {
  msgid: string;
  msgid_plural?: string;
};

/**
 * Structured translation as returned for plural-aware batches.
 *
 * `msgstr` is an ordered list of plural forms when `msgid_plural` is present,
 * a single string otherwise.
 */
export type StructuredTranslation = {
  msgstr?: string | string[];
  msgid_plural?: string;
};

/**
 * A translation value: legacy plain string or structured object.
 */
export type TranslationValue = string | StructuredTranslation;

/**
 * Merge input, keyed by msgid, iterated in insertion order.
 */
export type TranslationRecords = ReadonlyMap<string, TranslationValue>;
