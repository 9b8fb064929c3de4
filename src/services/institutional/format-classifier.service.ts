import logger from "../../utils/logger.js";
import { emptySnapshot } from "../../utils/institutional/holdings-snapshot.util.js";
import { structuredMarkupStrategy } from "../../utils/institutional/xml-parser.util.js";
import { markedUpTextStrategy } from "../../utils/institutional/html-fallback-parser.util.js";
import { semiStructuredTextStrategy } from "../../utils/institutional/text-table-parser.util.js";
import { tagDelimitedTextStrategy } from "../../utils/institutional/sgml-fallback-parser.util.js";
import type {
  HoldingsParseStrategy,
  ParseOptions,
  ParseOutcome,
} from "../../types/institutional.types.js";

/**
 * Most structured first. Each strategy decides whether the payload is its shape;
 * the first one that returns an outcome wins.
 */
export const HOLDINGS_PARSE_STRATEGIES: readonly HoldingsParseStrategy[] = [
  structuredMarkupStrategy,
  markedUpTextStrategy,
  semiStructuredTextStrategy,
  tagDelimitedTextStrategy,
];

export async function classifyAndParse(
  content: string,
  options: ParseOptions,
  strategies: readonly HoldingsParseStrategy[] = HOLDINGS_PARSE_STRATEGIES,
): Promise<ParseOutcome> {
  for (const strategy of strategies) {
    const outcome = await strategy.tryParse(content, options);
    if (!outcome) continue;

    logger.info(
      `   📊 Parsed ${outcome.snapshot.size} positions as ${outcome.format} ` +
        `(${outcome.rowsSeen} rows, ${outcome.rowsSkipped} skipped)`,
    );
    return outcome;
  }

  logger.warn("⚠️ No parser accepted the payload");
  return { format: "unrecognized", snapshot: emptySnapshot(), rowsSeen: 0, rowsSkipped: 0 };
}
