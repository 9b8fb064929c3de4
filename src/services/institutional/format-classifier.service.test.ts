import { describe, expect, it, vi } from "vitest";
import { classifyAndParse } from "./format-classifier.service.js";
import { infoTableXml } from "./testing/fake-sec-gateway.js";
import type { HoldingsParseStrategy } from "../../types/institutional.types.js";

const options = { identityKeyLength: 8 };

describe("classifyAndParse", () => {
  it("parses XML information tables as structured markup", async () => {
    const xml = infoTableXml([{ name: "Acme Corp", cusip: "123456789", value: 10, shares: 100 }]);

    const outcome = await classifyAndParse(xml, options);

    expect(outcome.format).toBe("structured-markup");
    expect(outcome.snapshot.get("12345678")?.marketValue).toBe(10_000);
  });

  it("parses markup without a table element as marked-up text", async () => {
    const html =
      '<html><td class="nameOfIssuer">Acme Corp</td><td>123456789</td><td>7</td><td>900</td></html>';

    const outcome = await classifyAndParse(html, options);

    expect(outcome.format).toBe("marked-up-text");
    expect(outcome.snapshot.get("12345678")?.shareCount).toBe(900);
  });

  it("parses line tables as semi-structured text", async () => {
    const text = [
      "INFORMATION TABLE",
      "ACME CORP    COM 123456789 10 100 SH",
      "GLOBEX INC   COM 223456789 20 200 SH",
      "INITECH LLC  COM 323456789 30 300 SH",
      "UMBRELLA CO  COM 423456789 40 400 SH",
      "HOOLI INC    COM 523456789 50 500 SH",
    ].join("\n");

    const outcome = await classifyAndParse(text, options);

    expect(outcome.format).toBe("semi-structured-text");
    expect(outcome.snapshot.size).toBe(5);
  });

  it("falls back to labelled fields for sparse text", async () => {
    const text = "NAME OF ISSUER: Acme Corp\nCUSIP: 123456789\nVALUE: 10\nSHARES: 100";

    const outcome = await classifyAndParse(text, options);

    expect(outcome.format).toBe("tag-delimited-text");
    expect(outcome.snapshot.get("12345678")?.companyName).toBe("ACME CORP");
  });

  it("stops at the first strategy that accepts", async () => {
    const declines: HoldingsParseStrategy = {
      format: "structured-markup",
      tryParse: vi.fn(async () => null),
    };
    const accepts: HoldingsParseStrategy = {
      format: "tag-delimited-text",
      tryParse: vi.fn(async () => ({
        format: "tag-delimited-text" as const,
        snapshot: new Map(),
        rowsSeen: 0,
        rowsSkipped: 0,
      })),
    };
    const unused: HoldingsParseStrategy = { format: "marked-up-text", tryParse: vi.fn() };

    const outcome = await classifyAndParse("anything", options, [declines, accepts, unused]);

    expect(outcome.format).toBe("tag-delimited-text");
    expect(declines.tryParse).toHaveBeenCalledWith("anything", options);
    expect(unused.tryParse).not.toHaveBeenCalled();
  });

  it("reports unrecognized content when every strategy declines", async () => {
    const outcome = await classifyAndParse("anything", options, []);

    expect(outcome).toEqual({
      format: "unrecognized",
      snapshot: new Map(),
      rowsSeen: 0,
      rowsSkipped: 0,
    });
  });
});
