import { lookupTicker } from "../../utils/institutional/ticker.util.js";
import { totalMarketValue } from "../../utils/institutional/holdings-snapshot.util.js";
import type {
  DeltaRow,
  HoldingRecord,
  HoldingsSnapshot,
  PositionStatus,
} from "../../types/institutional.types.js";

const absentRecord = (identityKey: string): HoldingRecord => ({
  identityKey,
  companyName: "",
  marketValue: 0,
  shareCount: 0,
});

function positionStatus(current: HoldingRecord, previous: HoldingRecord): PositionStatus {
  if (previous.marketValue === 0) return "NEW";
  if (current.marketValue === 0) return "EXIT";
  return "CHANGE";
}

/**
 * Weight change (percentage points of the portfolio) and share change for every
 * position held in either quarter. An empty quarter's total is floored at 1 so
 * weights stay finite.
 */
export function computeDeltas(
  current: HoldingsSnapshot,
  previous: HoldingsSnapshot,
  tickerFor: (companyName: string) => string = lookupTicker,
): DeltaRow[] {
  const totalCurrent = totalMarketValue(current) || 1;
  const totalPrevious = totalMarketValue(previous) || 1;

  const identityKeys = new Set([...current.keys(), ...previous.keys()]);

  return Array.from(identityKeys, (identityKey) => {
    const cur = current.get(identityKey) ?? absentRecord(identityKey);
    const prev = previous.get(identityKey) ?? absentRecord(identityKey);

    const companyName = cur.companyName || prev.companyName;
    const weightCurrent = (cur.marketValue / totalCurrent) * 100;
    const weightPrevious = (prev.marketValue / totalPrevious) * 100;
    const shareChangeAbs = cur.shareCount - prev.shareCount;

    return {
      identityKey,
      companyName,
      ticker: tickerFor(companyName),
      currentValue: cur.marketValue,
      previousValue: prev.marketValue,
      currentShares: cur.shareCount,
      previousShares: prev.shareCount,
      weightCurrent,
      weightPrevious,
      weightChange: weightCurrent - weightPrevious,
      shareChangeAbs,
      shareChangePct: prev.shareCount > 0 ? (shareChangeAbs / prev.shareCount) * 100 : null,
      status: positionStatus(cur, prev),
    };
  });
}
