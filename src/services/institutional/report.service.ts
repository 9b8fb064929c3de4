import { TOP_BUYS_LIMIT, TOP_HOLDINGS_LIMIT, TOP_SELLS_LIMIT } from "./table-generator.service.js";
import type { AnalysisResult, DeltaRow } from "../../types/institutional.types.js";

const fixed2 = (n: number) => n.toFixed(2);

function shareChangeCell(row: DeltaRow): string {
  return row.shareChangePct === null ? "N/A" : `${fixed2(row.shareChangePct)}%`;
}

function companyCell(row: DeltaRow): string {
  return `${row.companyName.slice(0, 30)} (${row.ticker})`;
}

function titled(title: string, lines: string[]): string {
  return ["", title, "=".repeat(title.length), ...lines].join("\n");
}

export function formatHoldingsTable(rows: DeltaRow[]): string {
  const header =
    `${"Rank".padEnd(4)} ${"Company (Ticker)".padEnd(40)} ${"% Port".padStart(8)} ` +
    `${"Δ pp".padStart(8)} ${"% Change(shares)".padStart(17)} ${"Status".padStart(8)}`;

  const lines = rows.map(
    (row, i) =>
      `${String(i + 1).padEnd(4)} ${companyCell(row).padEnd(40)} ` +
      `${fixed2(row.weightCurrent).padStart(8)} ${fixed2(row.weightChange).padStart(8)} ` +
      `${shareChangeCell(row).padStart(17)} ${row.status.padStart(8)}`,
  );
  return titled(`TOP ${TOP_HOLDINGS_LIMIT} HOLDINGS`, [header, ...lines]);
}

export function formatMovesTable(kind: "buys" | "sells", rows: DeltaRow[]): string {
  const changeHeader = kind === "buys" ? "Wt Increase" : "Wt Decrease";
  const header =
    `${"Rank".padEnd(4)} ${"Company (Ticker)".padEnd(40)} ${"% Port".padStart(8)} ` +
    `${changeHeader.padStart(12)} ${"% Change(shares)".padStart(17)}`;

  const lines = rows.map(
    (row, i) =>
      `${String(i + 1).padEnd(4)} ${companyCell(row).padEnd(40)} ` +
      `${fixed2(row.weightCurrent).padStart(8)} ${fixed2(row.weightChange).padStart(12)} ` +
      `${shareChangeCell(row).padStart(17)}`,
  );
  const title =
    kind === "buys" ? `TOP ${TOP_BUYS_LIMIT} BUYS` : `TOP ${TOP_SELLS_LIMIT} SELLS`;
  return titled(title, [header, ...lines]);
}

export function formatReport(result: AnalysisResult): string {
  const previous = result.hasPreviousData ? result.previousAccession : "none";
  return [
    `CIK ${result.cik}: ${result.currentAccession} vs ${previous}`,
    formatHoldingsTable(result.topHoldings),
    formatMovesTable("buys", result.topBuys),
    formatMovesTable("sells", result.topSells),
  ].join("\n");
}
