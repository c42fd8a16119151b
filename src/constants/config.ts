/**
 * Environment variable names
 *
 * Command-line options take precedence over these.
 */

export const LOG_LEVEL_ENV = "LOG_LEVEL";
export const CATALOG_LANG_ENV = "CATALOG_LANG";
export const CATALOG_DOMAIN_ENV = "CATALOG_DOMAIN";
