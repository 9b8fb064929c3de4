import { describe, expect, it } from "vitest";
import { hasTableMarker, looksLikeInfoTable, startsWithMarkup } from "./info-table-shape.util.js";

describe("looksLikeInfoTable", () => {
  it("accepts an XML information table", () => {
    expect(looksLikeInfoTable("<informationTable><infoTable></infoTable></informationTable>")).toBe(
      true,
    );
  });

  it("accepts field markers without a table element", () => {
    expect(looksLikeInfoTable("<nameOfIssuer>ACME CORP</nameOfIssuer><cusip>123456789</cusip>")).toBe(
      true,
    );
  });

  it("rejects an edgarSubmission cover document", () => {
    const cover = "<edgarSubmission><nameOfIssuer>X</nameOfIssuer><cusip>1</cusip></edgarSubmission>";
    expect(looksLikeInfoTable(cover)).toBe(false);
  });

  it("accepts an edgarSubmission bundle that carries the table", () => {
    expect(looksLikeInfoTable("<edgarSubmission><infoTable><cusip>1</cusip></infoTable>")).toBe(true);
  });

  it("needs two markers", () => {
    expect(looksLikeInfoTable("NAME OF ISSUER CUSIP VALUE")).toBe(false);
  });

  it("rejects empty input", () => {
    expect(looksLikeInfoTable("")).toBe(false);
    expect(looksLikeInfoTable(null)).toBe(false);
    expect(looksLikeInfoTable(undefined)).toBe(false);
  });
});

describe("content shape", () => {
  it("detects markup after leading whitespace", () => {
    expect(startsWithMarkup("\n  <?xml version=\"1.0\"?>")).toBe(true);
    expect(startsWithMarkup("FORM 13F")).toBe(false);
  });

  it("detects table markers case-insensitively", () => {
    expect(hasTableMarker("<ns1:InfoTable>")).toBe(true);
    expect(hasTableMarker("<table><tr>")).toBe(false);
  });
});
