import { ValidationError } from "../errors.js";

export const SEC_ARCHIVES_HOST = "https://www.sec.gov";
export const SEC_DATA_HOST = "https://data.sec.gov";

/**
 * Normalizes a CIK to its integer form ("0001067983" -> "1067983").
 * Throws ValidationError for anything that is not 1-10 digits.
 */
export function toCikNumber(cik: string): string {
  const trimmed = cik.trim();
  if (!/^\d{1,10}$/.test(trimmed)) {
    throw new ValidationError(`Invalid CIK: "${cik}"`, { cik });
  }
  return parseInt(trimmed, 10).toString();
}

export function padCik(cik: string): string {
  return toCikNumber(cik).padStart(10, "0");
}

export function submissionsUrl(cik: string): string {
  return `${SEC_DATA_HOST}/submissions/CIK${padCik(cik)}.json`;
}

export function archiveBaseUrl(cik: string, accessionNumber: string): string {
  const accessionNoHyphens = accessionNumber.replace(/-/g, "");
  return `${SEC_ARCHIVES_HOST}/Archives/edgar/data/${toCikNumber(cik)}/${accessionNoHyphens}`;
}

export function directoryIndexUrl(cik: string, accessionNumber: string): string {
  return `${archiveBaseUrl(cik, accessionNumber)}/index.json`;
}
