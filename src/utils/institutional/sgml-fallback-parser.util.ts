import { HoldingsSnapshotBuilder } from "./holdings-snapshot.util.js";
import { startsWithMarkup } from "./info-table-shape.util.js";
import { INTEGER_TOKEN_SOURCE, parseIntegerToken } from "./number-token.util.js";
import { nearestMatch, windowAround } from "./text-window.util.js";
import type {
  HoldingsParseStrategy,
  ParseOptions,
  ParseOutcome,
} from "../../types/institutional.types.js";

/**
 * Fallback for text submissions whose table is not line-aligned: every labelled
 * CUSIP anchors a window, and the issuer/value/shares labels are searched inside it.
 *
 *   <NAMEOFISSUER>APPLE INC
 *   <CUSIP>037833100
 *   <VALUE>1234
 *   <SSHPRNAMT>10000
 */

const WINDOW_RADIUS = 500;
// label, then ":", ">" or a space, then the field
const LABELLED_CUSIP = /(?:CUSIP|cusip)\s*[:> ]\s*([A-Z0-9]{9})/g;
const ISSUER_FIELD = /(?:NAMEOFISSUER|NAME OF ISSUER)\s*[:> ]\s*([^\n<]+)/gi;
const VALUE_FIELD = new RegExp(
  String.raw`(?:VALUE|value)\s*[:> ]\s*(${INTEGER_TOKEN_SOURCE})`,
  "g",
);
const SHARES_FIELD = new RegExp(
  String.raw`(?:SSHPRNAMT|sshprnamt|SHARES)\s*[:> ]\s*(${INTEGER_TOKEN_SOURCE})`,
  "g",
);

export function parseLabelledFields(content: string, options: ParseOptions): ParseOutcome {
  const builder = new HoldingsSnapshotBuilder(options.identityKeyLength);
  let rowsSeen = 0;
  let rowsSkipped = 0;

  for (const match of content.matchAll(LABELLED_CUSIP)) {
    rowsSeen++;
    const cusip = match[1];
    const { chunk, anchor } = windowAround(
      content,
      match.index ?? 0,
      match[0].length,
      WINDOW_RADIUS,
    );

    const nameMatch = nearestMatch(chunk, ISSUER_FIELD, anchor);
    const name = nameMatch ? nameMatch[1].replace(/[<>/]/g, "").trim().toUpperCase() : "";

    const valueMatch = nearestMatch(chunk, VALUE_FIELD, anchor);
    const marketValue = valueMatch ? parseIntegerToken(valueMatch[1]) * 1000 : 0;

    const sharesMatch = nearestMatch(chunk, SHARES_FIELD, anchor);
    const shares = sharesMatch ? parseIntegerToken(sharesMatch[1]) : 0;

    if (marketValue <= 0 && shares <= 0) {
      rowsSkipped++;
      continue;
    }
    builder.add(cusip, name, marketValue, shares);
  }

  return {
    format: "tag-delimited-text",
    snapshot: builder.build(),
    rowsSeen,
    rowsSkipped,
  };
}

export const tagDelimitedTextStrategy: HoldingsParseStrategy = {
  format: "tag-delimited-text",
  async tryParse(content, options) {
    if (startsWithMarkup(content)) return null;
    return parseLabelledFields(content, options);
  },
};
