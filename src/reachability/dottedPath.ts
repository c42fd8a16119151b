/**
 * Dotted path resolution against a ReachabilitySource
 *
 * Two walking orders are used by the strategies:
 * - progressive (left to right): symbol keys like "app.models.Invoice.help_text"
 * - longest prefix first: module names derived from file paths
 *
 * Both finish by walking the remaining segments as attributes.
 */

import type { ReachabilitySource, ReachableHandle } from "@/types";

/**
 * Walk segments as attributes starting from a resolved handle.
 *
 * @returns The final handle, or undefined as soon as one segment is missing
 */
export function walkAttributes(
  start: ReachableHandle,
  segments: readonly string[],
): ReachableHandle | undefined {
  let current: ReachableHandle | undefined = start;
  for (const segment of segments) {
    current = current.attribute(segment);
    if (current === undefined) {
      return undefined;
    }
  }
  return current;
}

/**
 * Resolve left to right.
 *
 * At every prefix, a direct hit on the source replaces the current object
 * (the prefix is a loaded unit of its own). Otherwise the next segment is
 * looked up as an attribute of the previously resolved object. Fails as
 * soon as a segment cannot be found either way.
 *
 * @example
 * // source knows "shop" and "shop.models", Invoice is an attribute of shop.models
 * resolveProgressively("shop.models.Invoice", source) // => handle for Invoice
 */
export function resolveProgressively(
  dottedPath: string,
  source: ReachabilitySource,
): ReachableHandle | undefined {
  const segments = dottedPath.split(".");
  let current: ReachableHandle | undefined;

  for (let i = 0; i < segments.length; i++) {
    const prefix = segments.slice(0, i + 1).join(".");
    const direct = source.resolve(prefix);
    if (direct !== undefined) {
      current = direct;
      continue;
    }
    if (current === undefined) {
      return undefined;
    }
    current = current.attribute(segments[i]);
    if (current === undefined) {
      return undefined;
    }
  }

  return current;
}

/**
 * Resolve by exact match, then by the longest known prefix.
 *
 * Prefixes shrink one segment at a time; for each known prefix the rest of
 * the path must resolve as attributes. A known prefix whose attribute walk
 * fails does not stop the search, shorter prefixes are still tried.
 *
 * @returns The name of the prefix that matched, or undefined
 */
export function resolveByLongestPrefix(
  dottedPath: string,
  source: ReachabilitySource,
): string | undefined {
  if (source.resolve(dottedPath) !== undefined) {
    return dottedPath;
  }

  const segments = dottedPath.split(".");
  for (let i = segments.length - 1; i > 0; i--) {
    const prefix = segments.slice(0, i).join(".");
    const handle = source.resolve(prefix);
    if (handle === undefined) continue;

    if (walkAttributes(handle, segments.slice(i)) !== undefined) {
      return prefix;
    }
  }

  return undefined;
}
