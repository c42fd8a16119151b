/**
 * Unit tests for catalog path conventions and reference comments
 */

import { describe, it, expect } from "vitest";
import { resolve } from "path";
import { binaryCatalogPath, resolveCatalogPath } from "@/catalog/paths";
import { formatReferences, parseReferences } from "@/catalog/occurrences";

describe("resolveCatalogPath", () => {
  it("builds <root>/locale/<lang>/LC_MESSAGES/<domain>.po", () => {
    expect(
      resolveCatalogPath({ localeRoot: "/srv/app", lang: "bn", domain: "django" }),
    ).toBe("/srv/app/locale/bn/LC_MESSAGES/django.po");
  });

  it("resolves a relative root against the working directory", () => {
    expect(
      resolveCatalogPath({ localeRoot: "proj", lang: "es", domain: "messages" }),
    ).toBe(resolve("proj", "locale", "es", "LC_MESSAGES", "messages.po"));
  });
});

describe("binaryCatalogPath", () => {
  it("swaps .po for .mo", () => {
    expect(binaryCatalogPath("/srv/locale/bn/LC_MESSAGES/django.po")).toBe(
      "/srv/locale/bn/LC_MESSAGES/django.mo",
    );
  });

  it("only replaces the last extension", () => {
    expect(binaryCatalogPath("/tmp/app.v2.po")).toBe("/tmp/app.v2.mo");
  });
});

describe("parseReferences", () => {
  it("splits tokens on whitespace and newlines", () => {
    expect(
      parseReferences("app/models.py:12 app/views.py:3\ntemplates/base.html:40"),
    ).toEqual([
      { path: "app/models.py", line: 12 },
      { path: "app/views.py", line: 3 },
      { path: "templates/base.html", line: 40 },
    ]);
  });

  it("keeps tokens without a line number", () => {
    expect(parseReferences("templates/base.html")).toEqual([
      { path: "templates/base.html", line: null },
    ]);
  });

  it("splits on the last colon", () => {
    expect(parseReferences("C:/src/app.py:7")).toEqual([
      { path: "C:/src/app.py", line: 7 },
    ]);
  });

  it("returns nothing for missing or empty references", () => {
    expect(parseReferences(undefined)).toEqual([]);
    expect(parseReferences("")).toEqual([]);
  });
});

describe("formatReferences", () => {
  it("writes one occurrence per line", () => {
    expect(
      formatReferences([
        { path: "app/models.py", line: 12 },
        { path: "templates/base.html", line: null },
      ]),
    ).toBe("app/models.py:12\ntemplates/base.html");
  });
});
