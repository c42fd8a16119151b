/**
 * Catalog configuration constants
 */

/**
 * Directory below the locale root holding one folder per language.
 */
export const LOCALE_DIR = "locale";

/**
 * Gettext category directory inside each language folder.
 */
export const MESSAGES_DIR = "LC_MESSAGES";

/**
 * Fallback gettext domain when neither --domain nor CATALOG_DOMAIN is set.
 */
export const DEFAULT_DOMAIN = "django";

/**
 * Fallback target language when neither --lang nor CATALOG_LANG is set.
 */
export const DEFAULT_LANG = "bn";

export const CATALOG_EXTENSION = ".po";
export const BINARY_CATALOG_EXTENSION = ".mo";

/**
 * Flag marking an unreviewed translation.
 */
export const FUZZY_FLAG = "fuzzy";
