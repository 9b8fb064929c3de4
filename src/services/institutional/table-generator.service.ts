import type { DeltaRow, RankedTables, TableOptions } from "../../types/institutional.types.js";

export const TOP_HOLDINGS_LIMIT = 20;
export const TOP_BUYS_LIMIT = 10;
export const TOP_SELLS_LIMIT = 20;

type Comparator = (a: DeltaRow, b: DeltaRow) => number;

// null share change sorts last either way
function byShareChangePct(direction: 1 | -1): Comparator {
  return (a, b) => {
    if (a.shareChangePct === b.shareChangePct) return 0;
    if (a.shareChangePct === null) return 1;
    if (b.shareChangePct === null) return -1;
    return direction * (a.shareChangePct - b.shareChangePct);
  };
}

function thenBy(primary: Comparator, secondary: Comparator | null): Comparator {
  if (!secondary) return primary;
  return (a, b) => primary(a, b) || secondary(a, b);
}

const byWeightCurrentDesc: Comparator = (a, b) => b.weightCurrent - a.weightCurrent;
const byWeightChangeDesc: Comparator = (a, b) => b.weightChange - a.weightChange;
const byWeightChangeAsc: Comparator = (a, b) => a.weightChange - b.weightChange;

/**
 * Top holdings by current weight, and the "real" buys and sells: shares and
 * weight must move in the same direction. Buys/sells rank by weight change (pp).
 */
export function generateTables(
  rows: readonly DeltaRow[],
  options: TableOptions = {},
): RankedTables {
  const tieBreak = options.sortBySecondaryMetric === true;

  const topHoldings = rows
    .filter((r) => r.currentValue > 0)
    .sort(thenBy(byWeightCurrentDesc, tieBreak ? byShareChangePct(-1) : null))
    .slice(0, TOP_HOLDINGS_LIMIT);

  const topBuys = rows
    .filter((r) => r.shareChangeAbs > 0 && r.weightChange > 0)
    .sort(thenBy(byWeightChangeDesc, tieBreak ? byShareChangePct(-1) : null))
    .slice(0, TOP_BUYS_LIMIT);

  const topSells = rows
    .filter((r) => r.shareChangeAbs < 0 && r.weightChange < 0)
    .sort(thenBy(byWeightChangeAsc, tieBreak ? byShareChangePct(1) : null))
    .slice(0, TOP_SELLS_LIMIT);

  return { topHoldings, topBuys, topSells };
}
