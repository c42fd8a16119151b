/**
 * Short previews of catalog strings for progress lines
 */

/**
 * Cut a string to `maxLength` code points, marking the cut with "...".
 *
 * @example
 * preview("Invoice number", 7) // => "Invoice..."
 * preview("Save", 7)           // => "Save"
 */
export function preview(text: string, maxLength: number): string {
  // Code points, so a surrogate pair is never split
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return text;
  }
  return `${chars.slice(0, maxLength).join("")}...`;
}
