import { readFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import Joi from "joi";
import { ConfigError } from "../errors.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const TICKER_MAP_PATH = path.join(__dirname, "../../../data/ticker-map.json");

export const UNKNOWN_TICKER = "N/A";

const tickerMapSchema = Joi.object<Record<string, string>>().pattern(
  Joi.string().min(1),
  Joi.string().pattern(/^[A-Z]{1,5}(\.[A-Z]{1,2})?$/),
);

export function loadTickerMap(filePath: string = TICKER_MAP_PATH): ReadonlyMap<string, string> {
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  const validated = tickerMapSchema.validate(raw);
  if (validated.error) {
    throw new ConfigError(`Invalid ticker map ${filePath}: ${validated.error.message}`);
  }

  const entries = Object.entries(validated.value).map(
    ([name, ticker]) => [name.trim().toUpperCase(), ticker] as const,
  );
  return new Map(entries);
}

// Loaded once per process
const tickerMap = loadTickerMap();

/**
 * Issuer name -> ticker. Exact match first, then the first mapping where either
 * name contains the other (13F issuer names are abbreviated: "BANK AMER CORP").
 */
export function lookupTicker(
  companyName: string,
  mapping: ReadonlyMap<string, string> = tickerMap,
): string {
  const name = (companyName || "").trim().toUpperCase();
  if (!name) return UNKNOWN_TICKER;

  const exact = mapping.get(name);
  if (exact) return exact;

  for (const [pattern, ticker] of mapping) {
    if (name.includes(pattern) || pattern.includes(name)) return ticker;
  }
  return UNKNOWN_TICKER;
}
