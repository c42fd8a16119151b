/**
 * In-memory catalog model
 *
 * Wraps the ordered entry list of one `.po` file with exact msgid lookup.
 * Entries are created once at load time; only their translation fields are
 * mutated afterwards (by the merge engine).
 */

import type { CatalogEntry, CatalogMetadata, Occurrence } from "@/types";

/**
 * Fields accepted when building an entry by hand (tests, loaders).
 */
export type CatalogEntryInit = {
  msgid: string;
  msgctxt?: string;
  msgidPlural?: string;
  msgstr?: string;
  msgstrPlural?: Iterable<readonly [number, string]>;
  occurrences?: Occurrence[];
  fuzzy?: boolean;
  flags?: string[];
  comments?: CatalogEntry["comments"];
};

/**
 * Build a CatalogEntry with defaults for every optional field.
 *
 * A plural entry without explicit plural translations gets two empty slots,
 * matching what msgmerge writes for a fresh plural string.
 */
export function createEntry(init: CatalogEntryInit): CatalogEntry {
  const emptySlots: Array<[number, string]> = [
    [0, ""],
    [1, ""],
  ];
  const plural =
    init.msgidPlural !== undefined
      ? new Map<number, string>(init.msgstrPlural ?? emptySlots)
      : new Map<number, string>();

  return {
    msgid: init.msgid,
    msgctxt: init.msgctxt,
    msgidPlural: init.msgidPlural,
    msgstr: init.msgstr ?? "",
    msgstrPlural: plural,
    occurrences: init.occurrences ?? [],
    fuzzy: init.fuzzy ?? false,
    flags: init.flags ?? [],
    comments: init.comments ?? {},
  };
}

/**
 * Whether the entry already carries an accepted translation.
 *
 * Fuzzy entries never count as translated. Singular entries need a
 * non-empty msgstr; plural entries need at least one slot and every slot
 * non-empty.
 */
export function isTranslated(entry: CatalogEntry): boolean {
  if (entry.fuzzy) {
    return false;
  }
  if (entry.msgidPlural === undefined) {
    return entry.msgstr !== "";
  }
  if (entry.msgstrPlural.size === 0) {
    return false;
  }
  for (const value of entry.msgstrPlural.values()) {
    if (value === "") {
      return false;
    }
  }
  return true;
}

/**
 * Ordered collection of entries, queryable by exact msgid.
 * Obsolete entries live in `metadata.obsolete` and are not part of it.
 */
export class Catalog implements Iterable<CatalogEntry> {
  public readonly metadata: CatalogMetadata;
  private readonly entryList: CatalogEntry[];
  private readonly byMsgid = new Map<string, CatalogEntry>();

  constructor(entries: CatalogEntry[], metadata?: Partial<CatalogMetadata>) {
    this.entryList = entries;
    this.metadata = {
      charset: metadata?.charset ?? "utf-8",
      headers: metadata?.headers ?? {},
      headerComments: metadata?.headerComments,
      headerFlags: metadata?.headerFlags,
      obsolete: metadata?.obsolete,
    };

    // First entry wins; a later duplicate (other msgctxt) stays in the list
    for (const entry of entries) {
      if (!this.byMsgid.has(entry.msgid)) {
        this.byMsgid.set(entry.msgid, entry);
      }
    }
  }

  /**
   * Exact, case-sensitive lookup.
   */
  find(msgid: string): CatalogEntry | undefined {
    return this.byMsgid.get(msgid);
  }

  get size(): number {
    return this.entryList.length;
  }

  get entries(): readonly CatalogEntry[] {
    return this.entryList;
  }

  [Symbol.iterator](): Iterator<CatalogEntry> {
    return this.entryList[Symbol.iterator]();
  }
}
