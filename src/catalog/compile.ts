/**
 * Standalone compilation of a `.po` file into its `.mo` sibling
 */

import * as logger from "@/logger";
import { GettextCatalogIO } from "./catalogIO";
import type { CatalogIO } from "./catalogIO";
import { binaryCatalogPath } from "./paths";

/**
 * @returns Path of the written binary catalog
 * @throws {CatalogNotFoundError}
 * @throws {CatalogParseError}
 * @throws {CatalogPersistError}
 */
export function compileCatalogFile(
  catalogPath: string,
  io: CatalogIO = new GettextCatalogIO(),
): string {
  logger.info(`Compiling catalog: ${catalogPath}`);
  const catalog = io.load(catalogPath);
  const binaryPath = binaryCatalogPath(catalogPath);
  io.compileBinary(catalog, binaryPath);
  logger.info(`Compiled binary catalog saved to: ${binaryPath}`);
  return binaryPath;
}
