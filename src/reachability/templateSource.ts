/**
 * Template-source reachability: pure classification over occurrence paths.
 */

import type {
  CatalogEntry,
  ReachabilityVerdict,
  TemplateSourceStrategy,
} from "@/types";
import { TEMPLATE_SUFFIX } from "@/constants";

export function checkTemplateSource(
  entry: CatalogEntry,
  strategy: TemplateSourceStrategy,
): ReachabilityVerdict {
  const suffix = strategy.suffix ?? TEMPLATE_SUFFIX;
  const match = entry.occurrences.find((o) => o.path.endsWith(suffix));
  return match ? { reachable: true, via: match.path } : { reachable: false };
}
