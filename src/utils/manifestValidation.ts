/**
 * Manifest and symbol map validation
 *
 * Validates the JSON inputs of the reachability strategies:
 * - loaded-module manifest (array of names, or name → attribute paths)
 * - symbol map (dotted key → string)
 *
 * Validation is fail-fast: throws on first error with the offending field.
 */

import type { ModuleManifestRaw } from "@/types";

/**
 * Error thrown when a manifest or symbol map is malformed.
 */
export class ManifestValidationError extends Error {
  constructor(message: string) {
    super(`Manifest validation failed: ${message}`);
    this.name = "ManifestValidationError";
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a dotted name without empty segments.
 *
 * @param fieldPath - Field path for error messages (e.g., "modules[2]")
 * @throws {ManifestValidationError} If value is not a usable dotted name
 */
function validateDottedName(
  value: unknown,
  fieldPath: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new ManifestValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
    );
  }
  if (value.split(".").some((segment) => segment.trim().length === 0)) {
    throw new ManifestValidationError(
      `${fieldPath} must be a dotted name without empty segments, got "${value}"`,
    );
  }
}

/**
 * Validates a loaded-module manifest.
 *
 * Accepted shapes:
 * - `["shop", "shop.models"]`
 * - `{ "shop.models": ["Invoice", "Invoice.help_text"] }`
 *
 * @returns The manifest typed as ModuleManifestRaw
 * @throws {ManifestValidationError} On the first malformed name
 */
export function validateModuleManifest(raw: unknown): ModuleManifestRaw {
  if (Array.isArray(raw)) {
    const names: string[] = [];
    raw.forEach((name: unknown, index: number) => {
      validateDottedName(name, `modules[${index}]`);
      names.push(name);
    });
    return names;
  }

  if (!isPlainObject(raw)) {
    throw new ManifestValidationError(
      "manifest must be an array of module names or an object",
    );
  }

  const manifest: Array<[string, string[]]> = [];
  for (const [moduleName, attributes] of Object.entries(raw)) {
    validateDottedName(moduleName, `modules["${moduleName}"]`);
    if (!Array.isArray(attributes)) {
      throw new ManifestValidationError(
        `modules["${moduleName}"] must be an array of attribute paths`,
      );
    }
    const paths: string[] = [];
    attributes.forEach((attributePath: unknown, index: number) => {
      validateDottedName(attributePath, `modules["${moduleName}"][${index}]`);
      paths.push(attributePath);
    });
    manifest.push([moduleName, paths]);
  }
  // fromEntries defines own properties, so "__proto__" stays a plain key
  return Object.fromEntries(manifest);
}

/**
 * Validates a symbol map (dotted key → string).
 *
 * @throws {ManifestValidationError} If the map is not an object, a key is not
 *   a dotted name, or a value is not a string
 */
export function validateSymbolMap(raw: unknown): Record<string, string> {
  if (!isPlainObject(raw)) {
    throw new ManifestValidationError("symbol map must be an object");
  }

  const symbols: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(raw)) {
    validateDottedName(key, `symbols["${key}"]`);
    if (typeof value !== "string") {
      throw new ManifestValidationError(
        `symbols["${key}"] must be a string, got ${typeof value}`,
      );
    }
    symbols.push([key, value]);
  }
  return Object.fromEntries(symbols);
}
