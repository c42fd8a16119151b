/**
 * Catalog type definitions
 *
 * A catalog is the parsed form of one gettext `.po` file: an ordered list of
 * translatable entries plus the header metadata needed to write it back.
 */

/**
 * One recorded source location of a string (`#: path:line`).
 */
export type Occurrence = {
  /** Source path as written by the extraction tooling (relative or absolute) */
  path: string;
  /** Line number, null when the reference carries none */
  line: number | null;
};

/**
 * Comments attached to an entry that the tool never interprets but must
 * preserve when the catalog is saved.
 */
export type EntryComments = {
  /** `# ` translator comments */
  translator?: string;
  /** `#.` comments extracted from the source */
  extracted?: string;
  /** `#|` previous msgid */
  previous?: string;
};

/**
 * One translatable unit of a catalog.
 *
 * `msgid` is the lookup key and never changes after load. Only the
 * translation fields (`msgstr`, `msgstrPlural`, `fuzzy`) are mutated.
 */
export type CatalogEntry = {
  readonly msgid: string;
  readonly msgctxt?: string;
  /** Present iff the entry has plural forms */
  readonly msgidPlural?: string;
  /** Singular translation (ignored for plural entries) */
  msgstr: string;
  /** Plural index → translation (only for plural entries) */
  msgstrPlural: Map<number, string>;
  readonly occurrences: readonly Occurrence[];
  /** Heuristic suggestion that still needs review */
  fuzzy: boolean;
  /** Remaining `#,` flags other than fuzzy (e.g. "c-format") */
  readonly flags: readonly string[];
  readonly comments: EntryComments;
};

/**
 * Catalog header data kept verbatim for persistence.
 */
export type CatalogMetadata = {
  /** Charset declared in the Content-Type header */
  charset: string;
  /** Parsed PO header fields (e.g. "Plural-Forms") */
  headers: Record<string, string>;
  /** Comments attached to the header entry */
  headerComments?: EntryComments;
  /** `#,` flags of the header entry (usually "fuzzy" on fresh catalogs) */
  headerFlags?: string[];
  /** `#~` entries: written back as they are, never looked up or merged */
  obsolete?: CatalogEntry[];
};
