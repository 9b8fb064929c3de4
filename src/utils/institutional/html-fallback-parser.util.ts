import * as cheerio from "cheerio";
import { HoldingsSnapshotBuilder } from "./holdings-snapshot.util.js";
import { startsWithMarkup } from "./info-table-shape.util.js";
import { parseIntegerToken, splitSharesAndValue } from "./number-token.util.js";
import { nearestMatch, windowAround } from "./text-window.util.js";
import type {
  HoldingsParseStrategy,
  ParseOptions,
  ParseOutcome,
} from "../../types/institutional.types.js";

/**
 * Last resort for HTML/XML payloads without an infoTable structure (rendered
 * tables, xsl output). Each CUSIP-shaped token anchors a window; the issuer comes
 * from a nameOfIssuer-tagged cell and the numbers from bare `>123,456<` cells.
 * Only comma-grouped or short cells count as numbers, so `>4500<` is ignored.
 */

const WINDOW_RADIUS = 800;
const IDENTIFIER_TOKEN = /\b[A-Z0-9]{9}\b/g;
const ISSUER_CELL = /NAMEOFISSUER[^>]*>([^<]+)/gi;
const NUMBER_CELL = />(\d{1,3}(?:,\d{3})*)</g;

function decodeCellText(raw: string): string {
  return cheerio.load(raw, null, false).text().replace(/\s+/g, " ").trim();
}

export function parseMarkupWindows(content: string, options: ParseOptions): ParseOutcome {
  const builder = new HoldingsSnapshotBuilder(options.identityKeyLength);
  let rowsSeen = 0;
  let rowsSkipped = 0;

  for (const match of content.matchAll(IDENTIFIER_TOKEN)) {
    rowsSeen++;
    const identifier = match[0];
    const { chunk, anchor } = windowAround(
      content,
      match.index ?? 0,
      identifier.length,
      WINDOW_RADIUS,
    );

    const numbers = Array.from(chunk.matchAll(NUMBER_CELL), (m) => parseIntegerToken(m[1]));

    if (numbers.length === 0) {
      rowsSkipped++;
      continue;
    }

    const nameMatch = nearestMatch(chunk, ISSUER_CELL, anchor);
    const name = nameMatch ? decodeCellText(nameMatch[1]).toUpperCase() : "";
    const { shares, valueThousands } = splitSharesAndValue(numbers);
    builder.add(identifier, name, valueThousands * 1000, shares);
  }

  return {
    format: "marked-up-text",
    snapshot: builder.build(),
    rowsSeen,
    rowsSkipped,
  };
}

export const markedUpTextStrategy: HoldingsParseStrategy = {
  format: "marked-up-text",
  async tryParse(content, options) {
    if (!startsWithMarkup(content)) return null;
    return parseMarkupWindows(content, options);
  },
};
