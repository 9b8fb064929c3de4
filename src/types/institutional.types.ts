/**
 * Type definitions for the 13F holdings change analysis
 */

// ============================================================================
// Holdings Types
// ============================================================================

export type HoldingRecord = {
  identityKey: string;
  companyName: string;
  marketValue: number; // in dollars (already converted from thousands)
  shareCount: number;
};

/**
 * One filing's positions keyed by identity key (CUSIP prefix).
 * Parsers hand these out frozen; nothing downstream mutates them.
 */
export type HoldingsSnapshot = ReadonlyMap<string, Readonly<HoldingRecord>>;

export type HoldingsFormat =
  | "structured-markup"
  | "marked-up-text"
  | "semi-structured-text"
  | "tag-delimited-text"
  | "unrecognized";

export type ParseOptions = {
  identityKeyLength: number;
};

export type ParseOutcome = {
  format: HoldingsFormat;
  snapshot: HoldingsSnapshot;
  rowsSeen: number;
  rowsSkipped: number;
};

export interface HoldingsParseStrategy {
  readonly format: HoldingsFormat;
  /** Resolves to null when the payload is not this strategy's shape. */
  tryParse(content: string, options: ParseOptions): Promise<ParseOutcome | null>;
}

// ============================================================================
// Filing & Gateway Types
// ============================================================================

export type FilingIndexEntry = {
  formType: string;
  accessionNumber: string;
  filingDate: string; // YYYY-MM-DD
};

export type LocatedFilings = {
  currentAccession: string;
  previousAccession: string;
};

export type DocumentResponse = {
  status: number;
  body: string;
};

export interface SecGateway {
  fetchFilingIndex(cik: string): Promise<FilingIndexEntry[]>;
  /** File names of the filing's directory, or null when the listing is unavailable. */
  fetchDirectoryListing(cik: string, accessionNumber: string): Promise<string[] | null>;
  /** Resolves for any HTTP status; rejects on network errors and timeouts. */
  fetchDocument(url: string): Promise<DocumentResponse>;
}

// ============================================================================
// Portfolio & Analysis Types
// ============================================================================

export type PositionStatus = "NEW" | "EXIT" | "CHANGE";

export type DeltaRow = {
  identityKey: string;
  companyName: string;
  ticker: string;
  currentValue: number;
  previousValue: number;
  currentShares: number;
  previousShares: number;
  weightCurrent: number;
  weightPrevious: number;
  weightChange: number;
  shareChangeAbs: number;
  shareChangePct: number | null;
  status: PositionStatus;
};

export type RankedTables = {
  topHoldings: DeltaRow[];
  topBuys: DeltaRow[];
  topSells: DeltaRow[];
};

export type TableOptions = {
  sortBySecondaryMetric?: boolean;
};

export type ExportedFiles = {
  holdings: string;
  buys: string;
  sells: string;
};

export type AnalysisResult = RankedTables & {
  cik: string;
  currentAccession: string;
  previousAccession: string;
  allDeltaRows: DeltaRow[];
  hasPreviousData: boolean;
  sortBySecondaryMetric: boolean;
  exportedFiles: ExportedFiles | null;
};
