/**
 * Reachability strategies
 *
 * One contract over three strategy values; the caller picks the variant.
 * Reachability does not look at whether the entry is translated.
 */

import type {
  CatalogEntry,
  ReachabilityStrategy,
  ReachabilityVerdict,
} from "@/types";
import { checkModulePath } from "./modulePath";
import { checkDottedSymbol } from "./dottedSymbol";
import { checkTemplateSource } from "./templateSource";

export function checkReachability(
  entry: CatalogEntry,
  strategy: ReachabilityStrategy,
): ReachabilityVerdict {
  switch (strategy.kind) {
    case "modulePath":
      return checkModulePath(entry, strategy);
    case "dottedSymbol":
      return checkDottedSymbol(entry, strategy);
    case "templateSource":
      return checkTemplateSource(entry, strategy);
  }
}

export function isReachable(
  entry: CatalogEntry,
  strategy: ReachabilityStrategy,
): boolean {
  return checkReachability(entry, strategy).reachable;
}

export { createModulePathStrategy, moduleNameForPath } from "./modulePath";
export {
  resolveByLongestPrefix,
  resolveProgressively,
  walkAttributes,
} from "./dottedPath";
export { ModuleRegistry, loadModuleRegistry } from "./moduleRegistry";
export { loadSymbolMap } from "./dottedSymbol";
