/**
 * Unit tests for the merge engine
 *
 * Each test builds a fresh in-memory catalog, merges a mapping into it and
 * checks both the counters and the resulting entries.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Catalog, createEntry, isTranslated } from "@/catalog/catalog";
import { mergeTranslations } from "@/merge/mergeTranslations";
import { extractTranslatables } from "@/extraction/extractTranslatables";
import type { TranslationValue } from "@/types";
import { loggedLines, silenceConsole } from "../helpers/silenceConsole";

let spies: ReturnType<typeof silenceConsole>;

beforeEach(() => {
  spies = silenceConsole();
});

afterEach(() => {
  vi.restoreAllMocks();
});

function buildCatalog(): Catalog {
  return new Catalog([
    createEntry({ msgid: "Save" }),
    createEntry({ msgid: "Cancel", msgstr: "Cancelar" }),
    createEntry({ msgid: "Checkout", msgstr: "Caja", fuzzy: true }),
    createEntry({ msgid: "%d item", msgidPlural: "%d items" }),
  ]);
}

function records(
  entries: Record<string, TranslationValue>,
): Map<string, TranslationValue> {
  return new Map(Object.entries(entries));
}

describe("mergeTranslations", () => {
  it("writes a plain string onto a singular entry", () => {
    const catalog = buildCatalog();

    const counts = mergeTranslations(catalog, records({ Save: "Guardar" }));

    expect(counts).toEqual({ updated: 1, skipped: 0, notFound: 0 });
    expect(catalog.find("Save")?.msgstr).toBe("Guardar");
  });

  it("accepts a structured singular value", () => {
    const catalog = buildCatalog();

    const counts = mergeTranslations(catalog, records({ Save: { msgstr: "Guardar" } }));

    expect(counts.updated).toBe(1);
    expect(catalog.find("Save")?.msgstr).toBe("Guardar");
  });

  it("clears fuzzy on update", () => {
    const catalog = buildCatalog();

    mergeTranslations(catalog, records({ Checkout: "Pagar" }));

    const entry = catalog.find("Checkout");
    expect(entry?.msgstr).toBe("Pagar");
    expect(entry?.fuzzy).toBe(false);
  });

  it("writes plural forms by index", () => {
    const catalog = buildCatalog();

    const counts = mergeTranslations(
      catalog,
      records({
        "%d item": { msgid_plural: "%d items", msgstr: ["%d artículo", "%d artículos"] },
      }),
    );

    expect(counts).toEqual({ updated: 1, skipped: 0, notFound: 0 });
    const entry = catalog.find("%d item");
    expect(entry?.msgstrPlural.get(0)).toBe("%d artículo");
    expect(entry?.msgstrPlural.get(1)).toBe("%d artículos");
  });

  it("leaves slots beyond the supplied forms untouched", () => {
    const catalog = buildCatalog();

    mergeTranslations(catalog, records({ "%d item": { msgstr: ["%d artículo"] } }));

    const entry = catalog.find("%d item");
    expect(entry && [...entry.msgstrPlural]).toEqual([
      [0, "%d artículo"],
      [1, ""],
    ]);
    expect(entry && isTranslated(entry)).toBe(false);
  });

  it("counts unknown msgids as not found", () => {
    const catalog = buildCatalog();

    const counts = mergeTranslations(
      catalog,
      records({ Unknown: "Desconocido", save: "guardar" }),
    );

    expect(counts).toEqual({ updated: 0, skipped: 0, notFound: 2 });
    expect(catalog.find("Save")?.msgstr).toBe("");
  });

  it("skips empty and whitespace-only translations", () => {
    const catalog = buildCatalog();

    const counts = mergeTranslations(
      catalog,
      records({
        Save: "   ",
        Cancel: "",
        "%d item": { msgstr: ["", " "] },
      }),
    );

    expect(counts).toEqual({ updated: 0, skipped: 3, notFound: 0 });
    expect(catalog.find("Cancel")?.msgstr).toBe("Cancelar");
  });

  it("skips a plural value for a singular entry and leaves it untouched", () => {
    const catalog = buildCatalog();

    const counts = mergeTranslations(
      catalog,
      records({ Save: { msgid_plural: "Saves", msgstr: ["Guardar", "Guardados"] } }),
    );

    expect(counts).toEqual({ updated: 0, skipped: 1, notFound: 0 });
    const entry = catalog.find("Save");
    expect(entry?.msgstr).toBe("");
    expect(entry?.msgstrPlural.size).toBe(0);
    expect(loggedLines(spies.warn)[0]).toMatch(
      /Translation has plural forms but catalog entry doesn't: Save$/,
    );
  });

  it("skips a single form for a plural entry", () => {
    const catalog = buildCatalog();

    const counts = mergeTranslations(catalog, records({ "%d item": "%d artículo" }));

    expect(counts).toEqual({ updated: 0, skipped: 1, notFound: 0 });
    expect(catalog.find("%d item")?.msgstrPlural.get(0)).toBe("");
    expect(loggedLines(spies.warn)[0]).toMatch(
      /Translation has a single form but catalog entry is plural: %d item$/,
    );
  });

  it("skips a structured value without msgstr", () => {
    const catalog = buildCatalog();

    const counts = mergeTranslations(catalog, records({ Save: { msgid_plural: "Saves" } }));

    expect(counts).toEqual({ updated: 0, skipped: 1, notFound: 0 });
    expect(loggedLines(spies.warn)[0]).toMatch(
      /Translation object missing 'msgstr' field for: Save$/,
    );
  });

  it("counts an identical value nowhere", () => {
    const catalog = buildCatalog();

    const counts = mergeTranslations(catalog, records({ Cancel: "Cancelar" }));

    expect(counts).toEqual({ updated: 0, skipped: 0, notFound: 0 });
  });

  it("is idempotent", () => {
    const catalog = buildCatalog();
    const batch = records({
      Save: "Guardar",
      Checkout: "Pagar",
      "%d item": { msgstr: ["%d artículo", "%d artículos"] },
      Missing: "Falta",
    });

    const first = mergeTranslations(catalog, batch);
    const second = mergeTranslations(catalog, batch);

    expect(first).toEqual({ updated: 3, skipped: 0, notFound: 1 });
    expect(second).toEqual({ updated: 0, skipped: 0, notFound: 1 });
  });

  it("updates only the first entry when msgids repeat", () => {
    const verb = createEntry({ msgid: "Open", msgctxt: "verb" });
    const adjective = createEntry({ msgid: "Open", msgctxt: "adjective" });
    const catalog = new Catalog([verb, adjective]);

    mergeTranslations(catalog, records({ Open: "Abrir" }));

    expect(verb.msgstr).toBe("Abrir");
    expect(adjective.msgstr).toBe("");
  });

  it("leaves nothing to extract after a full merge", () => {
    const template = [{ path: "templates/cart.html", line: 3 }];
    const catalog = new Catalog([
      createEntry({ msgid: "Cart", occurrences: template }),
      createEntry({ msgid: "%d item", msgidPlural: "%d items", occurrences: template }),
    ]);

    const pending = extractTranslatables(catalog, { kind: "templateSource" });
    const translated = new Map<string, TranslationValue>(
      pending.map((record): [string, TranslationValue] =>
        record.msgid_plural === undefined
          ? [record.msgid, `ES ${record.msgid}`]
          : [
              record.msgid,
              {
                msgid_plural: record.msgid_plural,
                msgstr: [`ES ${record.msgid}`, `ES ${record.msgid_plural}`],
              },
            ],
      ),
    );
    mergeTranslations(catalog, translated);

    expect(pending).toHaveLength(2);
    expect(extractTranslatables(catalog, { kind: "templateSource" })).toEqual([]);
  });
});
