import xml2js from "xml2js";
import logger from "../logger.js";
import { ParseError, errorMessage } from "../errors.js";
import { HoldingsSnapshotBuilder, emptySnapshot } from "./holdings-snapshot.util.js";
import { hasTableMarker, startsWithMarkup } from "./info-table-shape.util.js";
import { parseDecimal } from "./number-token.util.js";
import type {
  HoldingsParseStrategy,
  ParseOptions,
  ParseOutcome,
} from "../../types/institutional.types.js";

/**
 * =========================================
 * Form 13F Information Table (XML)
 * =========================================
 * <informationTable xmlns="http://www.sec.gov/edgar/document/thirteenf/informationtable">
 *   <infoTable>
 *     <nameOfIssuer>APPLE INC</nameOfIssuer>
 *     <titleOfClass>COM</titleOfClass>
 *     <cusip>037833100</cusip>
 *     <value>1234567</value>            (thousands of dollars)
 *     <shrsOrPrnAmt>
 *       <sshPrnamt>100000</sshPrnamt>
 *       <sshPrnamtType>SH</sshPrnamtType>
 *     </shrsOrPrnAmt>
 *     ...
 *   </infoTable>
 * </informationTable>
 */

// Clean XML namespaces (ns1:, n1:, com:) and compare tags case-insensitively
const cleanName = (name: string) => name.replace(/^(.*:)/, "").toLowerCase();

type XmlRecord = { [tag: string]: unknown };

function isXmlRecord(node: unknown): node is XmlRecord {
  return typeof node === "object" && node !== null && !Array.isArray(node);
}

function asList(node: unknown): unknown[] {
  return Array.isArray(node) ? node : [node];
}

/** Every element named `tag` below `node`, in document order. */
function findAll(node: unknown, tag: string, found: unknown[] = []): unknown[] {
  for (const item of asList(node)) {
    if (!isXmlRecord(item)) continue;
    for (const [key, child] of Object.entries(item)) {
      if (key === tag) found.push(...asList(child));
      findAll(child, tag, found);
    }
  }
  return found;
}

function findFirst(node: unknown, tag: string): unknown {
  for (const item of asList(node)) {
    if (!isXmlRecord(item)) continue;
    for (const [key, child] of Object.entries(item)) {
      if (key === tag) return asList(child)[0];
      const nested = findFirst(child, tag);
      if (nested !== undefined) return nested;
    }
  }
  return undefined;
}

function childOf(node: unknown, tag: string): unknown {
  if (!isXmlRecord(node) || !(tag in node)) return undefined;
  return asList(node[tag])[0];
}

function textOf(node: unknown): string {
  if (typeof node === "string") return node.trim();
  if (isXmlRecord(node) && typeof node._ === "string") return node._.trim();
  return "";
}

export async function parseInfoTableXml(
  content: string,
  options: ParseOptions,
): Promise<ParseOutcome> {
  const xmlClean = content.trim().replace(/ xmlns="[^"]+"/, "");

  let parsed: unknown;
  try {
    parsed = await xml2js.parseStringPromise(xmlClean, {
      explicitArray: false,
      trim: true,
      normalize: true,
      ignoreAttrs: true,
      tagNameProcessors: [cleanName],
    });
  } catch (err) {
    const parseError = new ParseError(`Malformed information table XML: ${errorMessage(err)}`);
    logger.warn(`⚠️ ${parseError.message}`);
    return { format: "structured-markup", snapshot: emptySnapshot(), rowsSeen: 0, rowsSkipped: 0 };
  }

  const builder = new HoldingsSnapshotBuilder(options.identityKeyLength);
  const rows = findAll(parsed, "infotable");
  let rowsSkipped = 0;

  for (const row of rows) {
    const nameNode = findFirst(row, "nameofissuer");
    const cusipNode = findFirst(row, "cusip");
    const valueNode = findFirst(row, "value");
    const cusip = textOf(cusipNode);

    if (nameNode === undefined || valueNode === undefined || !cusip) {
      rowsSkipped++;
      continue;
    }

    const valueThousands = parseDecimal(textOf(valueNode) || "0");
    const sharesText = textOf(childOf(findFirst(row, "shrsorprnamt"), "sshprnamt"));
    const shares = sharesText ? parseDecimal(sharesText) : 0;

    if (valueThousands === null || shares === null) {
      rowsSkipped++;
      continue;
    }

    builder.add(cusip, textOf(nameNode).toUpperCase(), valueThousands * 1000, Math.trunc(shares));
  }

  if (rowsSkipped > 0) {
    logger.warn(`⚠️ Skipped ${rowsSkipped} of ${rows.length} infoTable rows`);
  }
  logger.debug(`📊 XML information table: ${rows.length} rows -> ${builder.size} positions`);

  return {
    format: "structured-markup",
    snapshot: builder.build(),
    rowsSeen: rows.length,
    rowsSkipped,
  };
}

export const structuredMarkupStrategy: HoldingsParseStrategy = {
  format: "structured-markup",
  async tryParse(content, options) {
    if (!startsWithMarkup(content) || !hasTableMarker(content)) return null;
    return parseInfoTableXml(content, options);
  },
};
