import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import { UNKNOWN_TICKER, loadTickerMap, lookupTicker } from "./ticker.util.js";

describe("lookupTicker", () => {
  it("matches exact names", () => {
    expect(lookupTicker("APPLE INC")).toBe("AAPL");
    expect(lookupTicker("bank amer corp")).toBe("BAC");
  });

  it("matches when the filed name contains a known name", () => {
    expect(lookupTicker("APPLE INC NEW")).toBe("AAPL");
  });

  it("matches when a known name contains the filed name", () => {
    expect(lookupTicker("VERISIGN")).toBe("VRSN");
  });

  it("falls back to N/A", () => {
    expect(lookupTicker("ACME CORP")).toBe(UNKNOWN_TICKER);
    expect(lookupTicker("")).toBe("N/A");
    expect(lookupTicker("   ")).toBe("N/A");
  });

  it("accepts a custom mapping", () => {
    const mapping = new Map([["ACME CORP", "ACME"]]);
    expect(lookupTicker("Acme Corp", mapping)).toBe("ACME");
  });
});

describe("loadTickerMap", () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true });
    dir = null;
  });

  it("loads the bundled map", () => {
    const mapping = loadTickerMap();
    expect(mapping.get("COCA COLA CO")).toBe("KO");
  });

  it("uppercases names from the file", async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "tickers-"));
    const file = path.join(dir, "tickers.json");
    await fs.writeFile(file, JSON.stringify({ " Acme Corp ": "ACME" }));

    expect(loadTickerMap(file).get("ACME CORP")).toBe("ACME");
  });

  it("rejects malformed tickers", async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "tickers-"));
    const file = path.join(dir, "tickers.json");
    await fs.writeFile(file, JSON.stringify({ "ACME CORP": "acme" }));

    expect(() => loadTickerMap(file)).toThrow(ConfigError);
  });
});
