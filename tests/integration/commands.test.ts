/**
 * Integration tests for the command flows
 *
 * Runs each command against SAMPLE_PO in a temp locale tree, then checks the
 * exchange file, the updated catalog and its compiled form.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readFileSync } from "fs";
import { dirname, join } from "path";
import { mo } from "gettext-parser";
import {
  compile,
  extractModules,
  extractSymbols,
  extractTemplates,
  update,
} from "@/commands";
import { GettextCatalogIO } from "@/catalog/catalogIO";
import { CatalogNotFoundError, PackageRootUnresolvableError } from "@/catalog/errors";
import { updateCatalog } from "@/merge/updateCatalog";
import { ManifestValidationError } from "@/utils/manifestValidation";
import { createCatalogWorkspace } from "../helpers/catalogFixtures";
import type { CatalogWorkspace } from "../helpers/catalogFixtures";
import { silenceConsole } from "../helpers/silenceConsole";

function readJson(file: string): unknown {
  return JSON.parse(readFileSync(file, "utf-8"));
}

describe("command flows", () => {
  let ws: CatalogWorkspace;

  beforeEach(() => {
    silenceConsole();
    ws = createCatalogWorkspace();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    ws.cleanup();
  });

  describe("extractTemplates", () => {
    it("writes untranslated template strings", () => {
      const outputFile = join(ws.root, "translateables_html.json");

      const result = extractTemplates({
        ...ws.location,
        suffix: ".html",
        outputFile,
      });

      expect(result).toEqual({ catalogPath: ws.catalogPath, outputFile, count: 2 });
      expect(readJson(outputFile)).toEqual([
        { msgid: "%d item", msgid_plural: "%d items" },
        { msgid: "Sign in" },
      ]);
    });

    it("fails when the catalog for the language is missing", () => {
      expect(() =>
        extractTemplates({
          ...ws.location,
          lang: "fr",
          suffix: ".html",
          outputFile: join(ws.root, "out.json"),
        }),
      ).toThrow(CatalogNotFoundError);
    });
  });

  describe("extractModules", () => {
    it("writes untranslated strings whose module is loaded", () => {
      ws.writeFile("shop/models.py", "");
      const manifestFile = ws.writeFile("modules.json", JSON.stringify(["shop.models"]));
      const outputFile = join(ws.root, "translateables.json");

      const result = extractModules({
        ...ws.location,
        packageRoot: ws.root,
        manifestFile,
        outputFile,
      });

      expect(result.count).toBe(2);
      expect(readJson(outputFile)).toEqual([
        { msgid: "Invoice" },
        { msgid: "Checkout" },
      ]);
    });

    it("finds nothing when no listed module matches", () => {
      ws.writeFile("shop/models.py", "");
      const manifestFile = ws.writeFile("modules.json", JSON.stringify(["billing"]));
      const outputFile = join(ws.root, "translateables.json");

      const result = extractModules({
        ...ws.location,
        packageRoot: ws.root,
        manifestFile,
        outputFile,
      });

      expect(result.count).toBe(0);
      expect(readJson(outputFile)).toEqual([]);
    });

    it("fails for a missing package root", () => {
      const manifestFile = ws.writeFile("modules.json", "[]");

      expect(() =>
        extractModules({
          ...ws.location,
          packageRoot: join(ws.root, "absent"),
          manifestFile,
          outputFile: join(ws.root, "out.json"),
        }),
      ).toThrow(PackageRootUnresolvableError);
    });

    it("fails for a malformed manifest", () => {
      const manifestFile = ws.writeFile("modules.json", JSON.stringify({ shop: 1 }));

      expect(() =>
        extractModules({
          ...ws.location,
          packageRoot: ws.root,
          manifestFile,
          outputFile: join(ws.root, "out.json"),
        }),
      ).toThrow(ManifestValidationError);
    });
  });

  describe("extractSymbols", () => {
    it("writes untranslated strings attached to loaded symbols", () => {
      const symbolsFile = ws.writeFile(
        "symbols.json",
        JSON.stringify({
          "shop.models.Invoice.number": "Invoice",
          "shop.forms.SignInForm.title": "Sign in",
        }),
      );
      const manifestFile = ws.writeFile(
        "modules.json",
        JSON.stringify({ "shop.models": ["Invoice.number"] }),
      );
      const outputFile = join(ws.root, "translateables.json");

      const result = extractSymbols({
        ...ws.location,
        symbolsFile,
        manifestFile,
        outputFile,
      });

      expect(result.count).toBe(1);
      expect(readJson(outputFile)).toEqual([{ msgid: "Invoice" }]);
    });
  });

  describe("update", () => {
    it("merges, persists and compiles", () => {
      const translationFile = ws.writeFile(
        "es.json",
        JSON.stringify({
          Invoice: "Factura",
          "Sign in": { msgstr: "Iniciar sesión" },
          "%d item": {
            msgid_plural: "%d items",
            msgstr: ["%d artículo", "%d artículos"],
          },
          Missing: "Falta",
          Cart: "Carrito",
          Checkout: "  ",
        }),
      );

      const summary = update({ ...ws.location, translationFiles: [translationFile] });

      expect(summary).toEqual({
        updated: 3,
        skipped: 1,
        notFound: 1,
        total: 6,
        catalogPath: ws.catalogPath,
        binaryPath: join(dirname(ws.catalogPath), "django.mo"),
      });

      const catalog = new GettextCatalogIO().load(ws.catalogPath);
      expect(catalog.find("Invoice")?.msgstr).toBe("Factura");
      expect(catalog.find("Sign in")?.msgstr).toBe("Iniciar sesión");
      expect(catalog.find("Checkout")?.fuzzy).toBe(true);
      expect(catalog.find("Checkout")?.msgstr).toBe("Caja");

      const binary = mo.parse(readFileSync(summary.binaryPath));
      expect(Object.keys(binary.translations[""]).sort()).toEqual([
        "",
        "%d item",
        "Cart",
        "Invoice",
        "Sign in",
      ]);
      expect(binary.translations[""]["%d item"].msgstr).toEqual([
        "%d artículo",
        "%d artículos",
      ]);
    });

    it("is idempotent across runs", () => {
      const translationFile = ws.writeFile(
        "es.json",
        JSON.stringify({ Invoice: "Factura", Missing: "Falta" }),
      );

      update({ ...ws.location, translationFiles: [translationFile] });
      const afterFirst = readFileSync(ws.catalogPath, "utf-8");
      const second = update({ ...ws.location, translationFiles: [translationFile] });

      expect(second).toMatchObject({ updated: 0, skipped: 0, notFound: 1 });
      expect(readFileSync(ws.catalogPath, "utf-8")).toBe(afterFirst);
    });

    it("leaves nothing to extract once the extracted strings are translated", () => {
      const outputFile = join(ws.root, "translateables_html.json");
      extractTemplates({ ...ws.location, suffix: ".html", outputFile });

      const translationFile = ws.writeFile(
        "es.json",
        JSON.stringify({
          "%d item": { msgid_plural: "%d items", msgstr: ["%d artículo", "%d artículos"] },
          "Sign in": "Iniciar sesión",
        }),
      );
      update({ ...ws.location, translationFiles: [translationFile] });

      const second = extractTemplates({ ...ws.location, suffix: ".html", outputFile });
      expect(second.count).toBe(0);
      expect(readJson(outputFile)).toEqual([]);
    });

    it("writes even when every record is a no-op", () => {
      const summary = updateCatalog({
        catalogPath: ws.catalogPath,
        records: new Map(),
      });

      expect(summary).toMatchObject({ updated: 0, skipped: 0, notFound: 0, total: 0 });
      const binary = mo.parse(readFileSync(summary.binaryPath));
      expect(binary.translations[""]["Cart"].msgstr).toEqual(["Carrito"]);
    });
  });

  describe("compile", () => {
    it("compiles the given .po file", () => {
      const binaryPath = compile({ poFile: ws.catalogPath });

      expect(binaryPath).toBe(join(dirname(ws.catalogPath), "django.mo"));
    });
  });
});
