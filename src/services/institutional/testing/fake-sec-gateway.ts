import type {
  DocumentResponse,
  FilingIndexEntry,
  SecGateway,
} from "../../../types/institutional.types.js";

export type FakeSecFixture = {
  filings?: FilingIndexEntry[];
  /** accession -> file names */
  listings?: Record<string, string[]>;
  /** url -> body, or an Error to simulate a network failure */
  documents?: Record<string, string | Error>;
};

/** In-process EDGAR stand-in keyed by URL. Unknown URLs answer 404. */
export class FakeSecGateway implements SecGateway {
  readonly requests: string[] = [];

  constructor(private readonly fixture: FakeSecFixture = {}) {}

  async fetchFilingIndex(cik: string): Promise<FilingIndexEntry[]> {
    this.requests.push(`index:${cik}`);
    return this.fixture.filings ?? [];
  }

  async fetchDirectoryListing(_cik: string, accessionNumber: string): Promise<string[] | null> {
    this.requests.push(`listing:${accessionNumber}`);
    return this.fixture.listings?.[accessionNumber] ?? null;
  }

  async fetchDocument(url: string): Promise<DocumentResponse> {
    this.requests.push(url);
    const document = this.fixture.documents?.[url];
    if (document instanceof Error) throw document;
    if (document === undefined) return { status: 404, body: "Not Found" };
    return { status: 200, body: document };
  }
}

export type InfoTableRow = {
  name: string;
  cusip: string;
  value: number | string;
  shares: number | string;
};

export function infoTableXml(rows: InfoTableRow[]): string {
  const body = rows
    .map(
      (row) => `  <infoTable>
    <nameOfIssuer>${row.name}</nameOfIssuer>
    <titleOfClass>COM</titleOfClass>
    <cusip>${row.cusip}</cusip>
    <value>${row.value}</value>
    <shrsOrPrnAmt>
      <sshPrnamt>${row.shares}</sshPrnamt>
      <sshPrnamtType>SH</sshPrnamtType>
    </shrsOrPrnAmt>
  </infoTable>`,
    )
    .join("\n");

  return `<?xml version="1.0" encoding="UTF-8"?>
<informationTable xmlns="http://www.sec.gov/edgar/document/thirteenf/informationtable">
${body}
</informationTable>`;
}
