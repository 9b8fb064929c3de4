import logger from "../logger.js";
import { HoldingsSnapshotBuilder } from "./holdings-snapshot.util.js";
import { startsWithMarkup } from "./info-table-shape.util.js";
import {
  INTEGER_TOKEN_SOURCE,
  parseIntegerToken,
  splitSharesAndValue,
} from "./number-token.util.js";
import type {
  HoldingsParseStrategy,
  ParseOptions,
  ParseOutcome,
} from "../../types/institutional.types.js";

/**
 * Line-oriented reader for legacy TXT/SGML submissions, where the information
 * table is a fixed-width text block:
 *
 *   NAME OF ISSUER      TITLE   CUSIP       VALUE    SHARES  ...
 *   APPLE INC           COM     037833100   1,234    10,000  SH  SOLE
 */

const TABLE_START_MARKERS = ["information table", "<informationtable", "<infotable", "info table"];
const TABLE_END_MARKERS = ["</informationtable", "</infotable", "<signature", "<signatures"];
const IDENTIFIER_TOKEN = /\b([A-Z0-9]{9})\b/;

// Fewer distinct positions than this and the line heuristics are not trusted
export const MIN_TEXT_TABLE_POSITIONS = 5;

function leadingName(line: string, identifier: string): string {
  const parts = line.split(/\s+/).filter(Boolean);
  const index = parts.findIndex((part) => part.includes(identifier));
  if (index <= 0) return "";
  return parts
    .slice(0, index)
    .join(" ")
    .trim()
    .toUpperCase()
    .replace(/[<>]/g, "");
}

function numbersOnLine(line: string): number[] {
  const tokens = line.matchAll(new RegExp(String.raw`\b(${INTEGER_TOKEN_SOURCE})\b`, "g"));
  return Array.from(tokens, (match) => parseIntegerToken(match[1]));
}

export function parseTextTable(content: string, options: ParseOptions): ParseOutcome {
  const builder = new HoldingsSnapshotBuilder(options.identityKeyLength);
  let inTable = false;
  let rowsSeen = 0;
  let rowsSkipped = 0;

  for (const line of content.split(/\r\n|\r|\n/)) {
    const lower = line.toLowerCase();
    if (!inTable && TABLE_START_MARKERS.some((marker) => lower.includes(marker))) {
      inTable = true;
      continue;
    }
    if (inTable && TABLE_END_MARKERS.some((marker) => lower.includes(marker))) {
      inTable = false;
    }
    if (!inTable) continue;

    const match = IDENTIFIER_TOKEN.exec(line);
    if (!match) continue;
    rowsSeen++;

    // An all-digit identifier is itself a numeric token and can win as the share count
    const identifier = match[1];
    const numbers = numbersOnLine(line);
    if (numbers.length === 0) {
      rowsSkipped++;
      continue;
    }

    const { shares, valueThousands } = splitSharesAndValue(numbers);
    builder.add(identifier, leadingName(line, identifier), valueThousands * 1000, shares);
  }

  return {
    format: "semi-structured-text",
    snapshot: builder.build(),
    rowsSeen,
    rowsSkipped,
  };
}

export const semiStructuredTextStrategy: HoldingsParseStrategy = {
  format: "semi-structured-text",
  async tryParse(content, options) {
    if (startsWithMarkup(content)) return null;

    const outcome = parseTextTable(content, options);
    if (outcome.snapshot.size < MIN_TEXT_TABLE_POSITIONS) {
      logger.debug(
        `Text table yielded ${outcome.snapshot.size} positions, falling back to labelled extraction`,
      );
      return null;
    }
    return outcome;
  },
};
