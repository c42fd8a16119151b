/**
 * Translation file validation
 *
 * Checks the merge input shape:
 *   { "<msgid>": "<translation>" | { "msgstr": string | string[], "msgid_plural"?: string } }
 *
 * A structured value without "msgstr" is accepted here; the merge engine
 * counts it as skipped.
 */

import type { StructuredTranslation, TranslationValue } from "@/types";

/**
 * Error thrown when a translation file is unreadable or malformed.
 */
export class TranslationFileError extends Error {
  constructor(message: string) {
    super(`Translation file invalid: ${message}`);
    this.name = "TranslationFileError";
  }
}

function validateMsgstr(
  value: unknown,
  fieldPath: string,
): asserts value is string | string[] | undefined {
  if (value === undefined || typeof value === "string") {
    return;
  }
  if (!Array.isArray(value)) {
    throw new TranslationFileError(
      `${fieldPath} must be a string or an array of strings, got ${typeof value}`,
    );
  }
  value.forEach((form: unknown, index: number) => {
    if (typeof form !== "string") {
      throw new TranslationFileError(
        `${fieldPath}[${index}] must be a string, got ${typeof form}`,
      );
    }
  });
}

/**
 * Validates one translation value.
 *
 * @param msgid - Key of the value, for error messages
 * @throws {TranslationFileError} If the value has the wrong shape
 */
export function validateTranslationValue(
  value: unknown,
  msgid: string,
): TranslationValue {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new TranslationFileError(
      `value for "${msgid}" must be a string or an object`,
    );
  }

  const msgstr = "msgstr" in value ? value.msgstr : undefined;
  const msgidPlural = "msgid_plural" in value ? value.msgid_plural : undefined;
  validateMsgstr(msgstr, `"${msgid}".msgstr`);

  const structured: StructuredTranslation = {};
  if (msgstr !== undefined) {
    structured.msgstr = msgstr;
  }
  if (msgidPlural !== undefined) {
    if (typeof msgidPlural !== "string") {
      throw new TranslationFileError(
        `"${msgid}".msgid_plural must be a string, got ${typeof msgidPlural}`,
      );
    }
    structured.msgid_plural = msgidPlural;
  }
  return structured;
}

/**
 * Validates a whole translation file.
 *
 * @returns Translations in file key order
 * @throws {TranslationFileError} On the first malformed value
 */
export function validateTranslationFile(
  raw: unknown,
): Map<string, TranslationValue> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new TranslationFileError(
      "top level must be an object mapping msgid to translation",
    );
  }

  const records = new Map<string, TranslationValue>();
  for (const [msgid, value] of Object.entries(raw)) {
    records.set(msgid, validateTranslationValue(value, msgid));
  }
  return records;
}
