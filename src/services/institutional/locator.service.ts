import logger from "../../utils/logger.js";
import { LocatorError } from "../../utils/errors.js";
import { looksLikeInfoTable } from "../../utils/institutional/info-table-shape.util.js";
import { fetchHoldingsContent } from "./content-fetcher.service.js";
import type {
  FilingIndexEntry,
  LocatedFilings,
  SecGateway,
} from "../../types/institutional.types.js";

export const HOLDINGS_FORM_TYPES: ReadonlySet<string> = new Set(["13F-HR", "13F-HR/A"]);

// Amendments can replace a quarter with a cover page only, so look a few filings back
export const PREVIOUS_FILING_SCAN_DEPTH = 4;

export function eligibleFilings(index: FilingIndexEntry[]): FilingIndexEntry[] {
  return index
    .filter((filing) => HOLDINGS_FORM_TYPES.has(filing.formType))
    .sort((a, b) => b.filingDate.localeCompare(a.filingDate));
}

/**
 * The latest 13F-HR(/A) filing, plus the most recent earlier one that actually
 * carries an information table. Falls back to the second filing when none of the
 * scanned ones does.
 */
export async function locateFilings(gateway: SecGateway, cik: string): Promise<LocatedFilings> {
  const candidates = eligibleFilings(await gateway.fetchFilingIndex(cik));
  logger.info(`   Found ${candidates.length} 13F filings for CIK ${cik}`);

  if (candidates.length < 2) {
    throw new LocatorError(cik, candidates.length);
  }

  const currentAccession = candidates[0].accessionNumber;

  for (const candidate of candidates.slice(1, 1 + PREVIOUS_FILING_SCAN_DEPTH)) {
    const content = await fetchHoldingsContent(gateway, cik, candidate.accessionNumber);
    if (content && looksLikeInfoTable(content)) {
      logger.info(
        `   ✓ Comparing ${currentAccession} against ${candidate.accessionNumber} (${candidate.filingDate})`,
      );
      return { currentAccession, previousAccession: candidate.accessionNumber };
    }
    logger.warn(`   ⚠️ ${candidate.accessionNumber} has no information table, looking further back`);
  }

  const previousAccession = candidates[1].accessionNumber;
  logger.warn(
    `   ⚠️ No earlier filing with an information table, falling back to ${previousAccession}`,
  );
  return { currentAccession, previousAccession };
}
