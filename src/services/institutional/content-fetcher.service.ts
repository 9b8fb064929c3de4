import logger from "../../utils/logger.js";
import { FetchNotFoundError, errorMessage } from "../../utils/errors.js";
import { looksLikeInfoTable } from "../../utils/institutional/info-table-shape.util.js";
import { archiveBaseUrl } from "../../utils/institutional/sec-urls.util.js";
import type { SecGateway } from "../../types/institutional.types.js";

/**
 * Conventional information table names, tried after the directory listing and
 * the primary .txt bundle. `{prefix}` is the first 12 digits of the accession.
 */
const COMMON_INFO_TABLE_NAMES = [
  "form13fInfoTable.xml",
  "InfoTable.xml",
  "xslForm13F_X01/form13fInfoTable.xml",
  "xslForm13F_X01/InfoTable.xml",
  "d{prefix}inftable.xml",
  "informationTable.xml",
  "table.xml",
  "holdings.xml",
  "primary_doc.xml",
] as const;

export function commonInfoTableNames(accessionNumber: string): string[] {
  const prefix = accessionNumber.replace(/-/g, "").slice(0, 12);
  return COMMON_INFO_TABLE_NAMES.map((name) => name.replace("{prefix}", prefix));
}

/**
 * One candidate, one attempt. Network errors and timeouts only fail the candidate.
 */
async function tryCandidate(gateway: SecGateway, url: string): Promise<string | null> {
  try {
    const { status, body } = await gateway.fetchDocument(url);
    if (status === 200 && looksLikeInfoTable(body)) {
      return body;
    }
    logger.debug(`   ✗ ${url} (HTTP ${status})`);
  } catch (err) {
    logger.warn(`   ⚠️ Request failed for ${url}: ${errorMessage(err)}`);
  }
  return null;
}

async function fromDirectoryListing(
  gateway: SecGateway,
  cik: string,
  accessionNumber: string,
): Promise<string | null> {
  let names: string[] | null;
  try {
    names = await gateway.fetchDirectoryListing(cik, accessionNumber);
  } catch (err) {
    logger.warn(`   ⚠️ Directory listing failed for ${accessionNumber}: ${errorMessage(err)}`);
    return null;
  }
  if (!names) return null;

  const base = archiveBaseUrl(cik, accessionNumber);
  for (const name of names.filter((n) => n.toLowerCase().endsWith(".xml"))) {
    const content = await tryCandidate(gateway, `${base}/${name}`);
    if (content) {
      logger.info(`   📄 Information table found in directory listing: ${name}`);
      return content;
    }
  }
  return null;
}

async function fromPrimaryBundle(
  gateway: SecGateway,
  cik: string,
  accessionNumber: string,
): Promise<string | null> {
  const url = `${archiveBaseUrl(cik, accessionNumber)}/${accessionNumber}.txt`;
  const content = await tryCandidate(gateway, url);
  if (content) logger.info(`   📄 Information table found in ${accessionNumber}.txt`);
  return content;
}

async function fromCommonNames(
  gateway: SecGateway,
  cik: string,
  accessionNumber: string,
): Promise<string | null> {
  const base = archiveBaseUrl(cik, accessionNumber);
  for (const name of commonInfoTableNames(accessionNumber)) {
    const content = await tryCandidate(gateway, `${base}/${name}`);
    if (content) {
      logger.info(`   📄 Information table found by name: ${name}`);
      return content;
    }
  }
  return null;
}

/**
 * Raw information table of one filing, or null when no candidate document looks
 * like one. Tiers: directory listing XMLs, the primary .txt bundle, common names.
 */
export async function fetchHoldingsContent(
  gateway: SecGateway,
  cik: string,
  accessionNumber: string,
): Promise<string | null> {
  logger.debug(`🔎 Looking for the information table of ${accessionNumber}`);

  const content =
    (await fromDirectoryListing(gateway, cik, accessionNumber)) ??
    (await fromPrimaryBundle(gateway, cik, accessionNumber)) ??
    (await fromCommonNames(gateway, cik, accessionNumber));

  if (!content) {
    logger.warn(`⚠️ No information table found for ${accessionNumber}`);
  }
  return content;
}

export async function requireHoldingsContent(
  gateway: SecGateway,
  cik: string,
  accessionNumber: string,
): Promise<string> {
  const content = await fetchHoldingsContent(gateway, cik, accessionNumber);
  if (content === null) {
    throw new FetchNotFoundError(cik, accessionNumber);
  }
  return content;
}
