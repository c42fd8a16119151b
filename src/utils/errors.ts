/**
 * Error helpers
 */

/**
 * Printable message of an unknown thrown value.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
