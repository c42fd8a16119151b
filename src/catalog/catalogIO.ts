/**
 * Catalog I/O backed by gettext-parser
 *
 * Loads `.po` files into the Catalog model, writes them back and compiles
 * the binary `.mo` lookup table. Obsolete `#~` entries are carried through
 * to the textual form and left out of the binary one. Writes go to a temporary sibling first and
 * are renamed into place, so a failed write never leaves a truncated file.
 */

import * as fs from "fs";
import { mo, po } from "gettext-parser";
import type {
  GetTextComment,
  GetTextTranslation,
  GetTextTranslations,
} from "gettext-parser";
import type { CatalogEntry, EntryComments, Occurrence } from "@/types";
import { FUZZY_FLAG } from "@/constants";
import { describeError } from "@/utils/errors";
import { Catalog, createEntry, isTranslated } from "./catalog";
import {
  CatalogNotFoundError,
  CatalogParseError,
  CatalogPersistError,
} from "./errors";
import { formatReferences, parseReferences } from "./occurrences";
import { binaryCatalogPath } from "./paths";

type TranslationBuckets = GetTextTranslations["translations"];

/** Parsed or compiled table, with the `#~` entries gettext-parser keeps apart */
type CatalogTable = GetTextTranslations & { obsolete?: TranslationBuckets };

/**
 * Catalog persistence collaborator.
 */
export interface CatalogIO {
  /**
   * @throws {CatalogNotFoundError} If the file does not exist
   * @throws {CatalogParseError} If the file is not a valid catalog
   */
  load(catalogPath: string): Catalog;

  /** @throws {CatalogPersistError} */
  save(catalog: Catalog, catalogPath: string): void;

  /** @throws {CatalogPersistError} */
  compileBinary(catalog: Catalog, binaryPath: string): void;

  /**
   * Serialize the textual and binary forms, then write both. Returns the
   * binary path (sibling of catalogPath).
   *
   * @throws {CatalogPersistError}
   */
  persist(catalog: Catalog, catalogPath: string): string;
}

function splitFlags(flag: string | undefined): string[] {
  if (!flag) {
    return [];
  }
  return flag
    .split(/[,\n]/)
    .map((f) => f.trim())
    .filter((f) => f.length > 0);
}

function toEntry(translation: GetTextTranslation): CatalogEntry {
  if (!Array.isArray(translation.msgstr)) {
    throw new Error(`entry "${translation.msgid}" has no msgstr`);
  }
  const flags = splitFlags(translation.comments?.flag);
  const msgidPlural = translation.msgid_plural || undefined;

  return createEntry({
    msgid: translation.msgid,
    msgctxt: translation.msgctxt || undefined,
    msgidPlural,
    msgstr: msgidPlural === undefined ? (translation.msgstr[0] ?? "") : "",
    msgstrPlural:
      msgidPlural === undefined
        ? undefined
        : translation.msgstr.map((value, index): [number, string] => [
            index,
            value,
          ]),
    occurrences: parseReferences(translation.comments?.reference),
    fuzzy: flags.includes(FUZZY_FLAG),
    flags: flags.filter((f) => f !== FUZZY_FLAG),
    comments: {
      translator: translation.comments?.translator || undefined,
      extracted: translation.comments?.extracted || undefined,
      previous: translation.comments?.previous || undefined,
    },
  });
}

function isBuckets(value: unknown): value is TranslationBuckets {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function obsoleteBuckets(table: GetTextTranslations): TranslationBuckets {
  if (!("obsolete" in table)) {
    return {};
  }
  const { obsolete } = table;
  return isBuckets(obsolete) ? obsolete : {};
}

/**
 * Convert parsed gettext-parser data into the Catalog model.
 * The header entry (empty msgid) becomes metadata, not an entry.
 *
 * Entries come out grouped by msgctxt, and within a group in the key order
 * of the parsed table (integer-like msgids first).
 *
 * @throws {Error} If an entry has no msgstr
 */
export function toCatalog(table: GetTextTranslations): Catalog {
  const entries: CatalogEntry[] = [];
  let headerComments: GetTextComment | undefined;

  for (const [context, bucket] of Object.entries(table.translations)) {
    for (const [msgid, translation] of Object.entries(bucket)) {
      if (context === "" && msgid === "") {
        headerComments = translation.comments;
        continue;
      }
      entries.push(toEntry(translation));
    }
  }

  const obsolete: CatalogEntry[] = [];
  for (const bucket of Object.values(obsoleteBuckets(table))) {
    for (const translation of Object.values(bucket)) {
      obsolete.push(toEntry(translation));
    }
  }

  return new Catalog(entries, {
    charset: table.charset,
    headers: { ...table.headers },
    headerComments: headerComments
      ? {
          translator: headerComments.translator || undefined,
          extracted: headerComments.extracted || undefined,
          previous: headerComments.previous || undefined,
        }
      : undefined,
    headerFlags: splitFlags(headerComments?.flag),
    obsolete,
  });
}

function pluralSlots(entry: CatalogEntry): string[] {
  let length = 0;
  for (const index of entry.msgstrPlural.keys()) {
    length = Math.max(length, index + 1);
  }
  const slots = new Array<string>(length).fill("");
  for (const [index, value] of entry.msgstrPlural) {
    slots[index] = value;
  }
  return slots;
}

function toComments(
  comments: EntryComments,
  occurrences: readonly Occurrence[],
  flags: readonly string[],
): GetTextComment {
  return {
    translator: comments.translator ?? "",
    extracted: comments.extracted ?? "",
    reference: formatReferences(occurrences),
    flag: flags.join(", "),
    previous: comments.previous ?? "",
  };
}

function toTranslation(entry: CatalogEntry): GetTextTranslation {
  const translation: GetTextTranslation = {
    msgid: entry.msgid,
    msgstr:
      entry.msgidPlural === undefined ? [entry.msgstr] : pluralSlots(entry),
    comments: toComments(
      entry.comments,
      entry.occurrences,
      entry.fuzzy ? [FUZZY_FLAG, ...entry.flags] : entry.flags,
    ),
  };
  if (entry.msgctxt !== undefined) {
    translation.msgctxt = entry.msgctxt;
  }
  if (entry.msgidPlural !== undefined) {
    translation.msgid_plural = entry.msgidPlural;
  }
  return translation;
}

function addToBuckets(buckets: TranslationBuckets, entry: CatalogEntry): void {
  const context = entry.msgctxt ?? "";
  const bucket = buckets[context] ?? {};
  buckets[context] = bucket;
  bucket[entry.msgid] = toTranslation(entry);
}

/**
 * Build a gettext-parser table from the catalog.
 *
 * @param onlyTranslated - Keep only accepted translations (binary form,
 *   where fuzzy, empty and obsolete entries are left out like msgfmt does)
 */
export function toTable(
  catalog: Catalog,
  onlyTranslated = false,
): CatalogTable {
  const translations: GetTextTranslations["translations"] = {
    "": {
      "": {
        msgid: "",
        msgstr: [""],
        comments: toComments(
          catalog.metadata.headerComments ?? {},
          [],
          catalog.metadata.headerFlags ?? [],
        ),
      },
    },
  };

  for (const entry of catalog) {
    if (onlyTranslated && !isTranslated(entry)) continue;
    addToBuckets(translations, entry);
  }

  const table: CatalogTable = {
    charset: catalog.metadata.charset,
    headers: { ...catalog.metadata.headers },
    translations,
  };

  const obsolete = catalog.metadata.obsolete ?? [];
  if (!onlyTranslated && obsolete.length > 0) {
    const buckets: TranslationBuckets = {};
    for (const entry of obsolete) {
      addToBuckets(buckets, entry);
    }
    table.obsolete = buckets;
  }
  return table;
}

type StagedFile = { tmpPath: string; targetPath: string };

function stage(targetPath: string, data: Buffer): StagedFile {
  const tmpPath = `${targetPath}.tmp-${process.pid}`;
  try {
    fs.writeFileSync(tmpPath, data);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw new CatalogPersistError(targetPath, describeError(err));
  }
  return { tmpPath, targetPath };
}

/**
 * Rename staged files into place in order. On failure every temporary file
 * still pending is removed; targets renamed before the failure stay written.
 */
function commit(files: readonly StagedFile[]): void {
  for (let i = 0; i < files.length; i++) {
    const { tmpPath, targetPath } = files[i];
    try {
      fs.renameSync(tmpPath, targetPath);
    } catch (err) {
      for (const pending of files.slice(i)) {
        fs.rmSync(pending.tmpPath, { force: true });
      }
      throw new CatalogPersistError(targetPath, describeError(err));
    }
  }
}

function serialize(targetPath: string, compile: () => Buffer): Buffer {
  try {
    return compile();
  } catch (err) {
    throw new CatalogPersistError(targetPath, describeError(err));
  }
}

/**
 * CatalogIO implementation for gettext `.po` / `.mo` files.
 */
export class GettextCatalogIO implements CatalogIO {
  load(catalogPath: string): Catalog {
    if (!fs.existsSync(catalogPath)) {
      throw new CatalogNotFoundError(catalogPath);
    }

    const content = fs.readFileSync(catalogPath);
    let table: GetTextTranslations;
    try {
      table = po.parse(content);
    } catch (err) {
      throw new CatalogParseError(catalogPath, describeError(err));
    }
    if (!table || typeof table.translations !== "object") {
      throw new CatalogParseError(catalogPath, "no translations table");
    }

    try {
      return toCatalog(table);
    } catch (err) {
      throw new CatalogParseError(catalogPath, describeError(err));
    }
  }

  save(catalog: Catalog, catalogPath: string): void {
    const text = serialize(catalogPath, () => po.compile(toTable(catalog)));
    commit([stage(catalogPath, text)]);
  }

  compileBinary(catalog: Catalog, binaryPath: string): void {
    const binary = serialize(binaryPath, () =>
      mo.compile(toTable(catalog, true)),
    );
    commit([stage(binaryPath, binary)]);
  }

  persist(catalog: Catalog, catalogPath: string): string {
    const binaryPath = binaryCatalogPath(catalogPath);
    const text = serialize(catalogPath, () => po.compile(toTable(catalog)));
    const binary = serialize(binaryPath, () =>
      mo.compile(toTable(catalog, true)),
    );

    // Binary first: if anything fails, the textual catalog is untouched
    const binaryFile = stage(binaryPath, binary);
    let textFile: StagedFile;
    try {
      textFile = stage(catalogPath, text);
    } catch (err) {
      fs.rmSync(binaryFile.tmpPath, { force: true });
      throw err;
    }
    commit([binaryFile, textFile]);
    return binaryPath;
  }
}
