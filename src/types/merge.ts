/**
 * Merge type definitions
 */

/**
 * Per-call merge counters.
 *
 * Identical re-applies are a no-op and counted in none of the buckets.
 */
export type MergeCounts = {
  /** Entries whose translation changed */
  updated: number;
  /** Records that were empty or did not fit the entry's shape */
  skipped: number;
  /** Records whose msgid has no catalog entry */
  notFound: number;
};

/**
 * Outcome of an update run (merge + persist + compile).
 */
export type UpdateSummary = MergeCounts & {
  /** Number of translation records applied */
  total: number;
  /** Textual catalog that was written */
  catalogPath: string;
  /** Compiled binary catalog that was written */
  binaryPath: string;
};
