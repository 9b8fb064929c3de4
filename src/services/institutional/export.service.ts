import fs from "fs/promises";
import path from "path";
import logger from "../../utils/logger.js";
import { toCsv } from "../../utils/institutional/csv.util.js";
import type { DeltaRow, ExportedFiles, RankedTables } from "../../types/institutional.types.js";

export const DELTA_ROW_COLUMNS: ReadonlyArray<keyof DeltaRow> = [
  "identityKey",
  "companyName",
  "ticker",
  "currentValue",
  "previousValue",
  "currentShares",
  "previousShares",
  "weightCurrent",
  "weightPrevious",
  "weightChange",
  "shareChangeAbs",
  "shareChangePct",
  "status",
];

const pad2 = (n: number) => n.toString().padStart(2, "0");

/** Local time as YYYYMMDD_HHmmss */
export function exportTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}_` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

export async function exportTables(
  tables: RankedTables,
  cik: string,
  exportDir: string,
  now: Date = new Date(),
): Promise<ExportedFiles> {
  await fs.mkdir(exportDir, { recursive: true });
  const stamp = exportTimestamp(now);
  const fileFor = (table: string) => path.join(exportDir, `cik_${cik}_${table}_${stamp}.csv`);

  const files: ExportedFiles = {
    holdings: fileFor("holdings"),
    buys: fileFor("buys"),
    sells: fileFor("sells"),
  };

  await fs.writeFile(files.holdings, toCsv(tables.topHoldings, DELTA_ROW_COLUMNS), "utf8");
  await fs.writeFile(files.buys, toCsv(tables.topBuys, DELTA_ROW_COLUMNS), "utf8");
  await fs.writeFile(files.sells, toCsv(tables.topSells, DELTA_ROW_COLUMNS), "utf8");

  logger.info(`💾 Exported ${files.holdings}, ${files.buys}, ${files.sells}`);
  return files;
}
