/**
 * Dotted-symbol reachability
 *
 * Used for strings attached to symbols rather than files (e.g. help texts
 * keyed by "app.models.Invoice.amount"). An entry is reachable when a key
 * whose string equals its msgid resolves against the source.
 */

import type {
  CatalogEntry,
  DottedSymbolStrategy,
  ReachabilityVerdict,
} from "@/types";
import {
  ManifestValidationError,
  validateSymbolMap,
} from "@/utils/manifestValidation";
import { readJsonFile } from "@/utils/jsonFile";
import { resolveProgressively } from "./dottedPath";

// msgid → keys, built once per symbol map
const keysByString = new WeakMap<object, Map<string, string[]>>();

function keysFor(
  symbols: DottedSymbolStrategy["symbols"],
  msgid: string,
): readonly string[] {
  let index = keysByString.get(symbols);
  if (index === undefined) {
    index = new Map();
    for (const [key, value] of Object.entries(symbols)) {
      const keys = index.get(value);
      if (keys) {
        keys.push(key);
      } else {
        index.set(value, [key]);
      }
    }
    keysByString.set(symbols, index);
  }
  return index.get(msgid) ?? [];
}

/**
 * Check one entry against the dotted-symbol strategy.
 * Keys are tried in symbol map order; the first that resolves decides.
 */
export function checkDottedSymbol(
  entry: CatalogEntry,
  strategy: DottedSymbolStrategy,
): ReachabilityVerdict {
  for (const key of keysFor(strategy.symbols, entry.msgid)) {
    if (resolveProgressively(key, strategy.source) !== undefined) {
      return { reachable: true, via: key };
    }
  }
  return { reachable: false };
}

/**
 * Load and validate a symbol map file (dotted key → string).
 *
 * @throws {ManifestValidationError}
 */
export function loadSymbolMap(symbolsFile: string): Record<string, string> {
  const raw = readJsonFile(
    symbolsFile,
    (reason) => new ManifestValidationError(reason),
  );
  return validateSymbolMap(raw);
}
