/**
 * Reachability constants
 */

/**
 * Source-code extensions stripped before a file path is turned into a
 * dotted module name. Any other extension is kept as part of the name.
 */
export const MODULE_SOURCE_EXTENSIONS: readonly string[] = [
  ".py",
  ".pyw",
  ".js",
  ".mjs",
  ".cjs",
  ".ts",
  ".mts",
  ".cts",
  ".jsx",
  ".tsx",
];

/**
 * Occurrence suffix that marks a string as coming from a markup template.
 */
export const TEMPLATE_SUFFIX = ".html";
