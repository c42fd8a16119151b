/**
 * Catalog error classes
 *
 * All of these are fatal for the running command.
 */

/**
 * Error thrown when the catalog file does not exist.
 */
export class CatalogNotFoundError extends Error {
  public readonly catalogPath: string;

  constructor(catalogPath: string) {
    super(`Catalog not found: ${catalogPath}`);
    this.name = "CatalogNotFoundError";
    this.catalogPath = catalogPath;
  }
}

/**
 * Error thrown when the catalog file cannot be parsed.
 */
export class CatalogParseError extends Error {
  public readonly catalogPath: string;

  constructor(catalogPath: string, reason: string) {
    super(`Catalog parse failed for ${catalogPath}: ${reason}`);
    this.name = "CatalogParseError";
    this.catalogPath = catalogPath;
  }
}

/**
 * Error thrown when writing the textual or binary catalog fails.
 * The previous file on disk is left as it was.
 */
export class CatalogPersistError extends Error {
  public readonly targetPath: string;

  constructor(targetPath: string, reason: string) {
    super(`Catalog persist failed for ${targetPath}: ${reason}`);
    this.name = "CatalogPersistError";
    this.targetPath = targetPath;
  }
}

/**
 * Error thrown when the module-path strategy has no usable base directory.
 */
export class PackageRootUnresolvableError extends Error {
  public readonly packageRoot: string;

  constructor(packageRoot: string, reason: string) {
    super(`Package root unresolvable (${packageRoot}): ${reason}`);
    this.name = "PackageRootUnresolvableError";
    this.packageRoot = packageRoot;
  }
}
