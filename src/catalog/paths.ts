/**
 * Catalog path conventions
 */

import * as path from "path";
import type { CatalogLocation } from "@/types";
import {
  BINARY_CATALOG_EXTENSION,
  LOCALE_DIR,
  MESSAGES_DIR,
  CATALOG_EXTENSION,
} from "@/constants";

/**
 * Path of the textual catalog for one language:
 * `<localeRoot>/locale/<lang>/LC_MESSAGES/<domain>.po`
 */
export function resolveCatalogPath(location: CatalogLocation): string {
  return path.resolve(
    location.localeRoot,
    LOCALE_DIR,
    location.lang,
    MESSAGES_DIR,
    `${location.domain}${CATALOG_EXTENSION}`,
  );
}

/**
 * Sibling path of the compiled catalog (extension replaced by `.mo`).
 *
 * @example
 * binaryCatalogPath("/srv/locale/bn/LC_MESSAGES/django.po")
 * // => "/srv/locale/bn/LC_MESSAGES/django.mo"
 */
export function binaryCatalogPath(catalogPath: string): string {
  const parsed = path.parse(catalogPath);
  return path.join(parsed.dir, `${parsed.name}${BINARY_CATALOG_EXTENSION}`);
}
