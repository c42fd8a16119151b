/**
 * Reference comment parsing (`#: path:line path:line`)
 */

import type { Occurrence } from "@/types";

const LINE_SUFFIX = /^(.*):(\d+)$/;

/**
 * Parse a `#:` reference comment into occurrences.
 *
 * gettext-parser joins multiple reference lines with "\n"; tokens are
 * separated by any whitespace. The last ":<digits>" of a token is the line
 * number; a token without one keeps the whole text as path and a null line.
 *
 * @example
 * parseReferences("app/models.py:12 templates/base.html")
 * // => [{ path: "app/models.py", line: 12 }, { path: "templates/base.html", line: null }]
 */
export function parseReferences(reference: string | undefined): Occurrence[] {
  if (!reference) {
    return [];
  }

  const occurrences: Occurrence[] = [];
  for (const token of reference.split(/\s+/)) {
    if (!token) continue;
    const match = LINE_SUFFIX.exec(token);
    if (match && match[1]) {
      occurrences.push({ path: match[1], line: Number(match[2]) });
    } else {
      occurrences.push({ path: token, line: null });
    }
  }
  return occurrences;
}

/**
 * Format occurrences back into a reference comment, one per line.
 */
export function formatReferences(occurrences: readonly Occurrence[]): string {
  return occurrences
    .map((o) => (o.line === null ? o.path : `${o.path}:${o.line}`))
    .join("\n");
}
