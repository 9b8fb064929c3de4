import { describe, expect, it } from "vitest";
import { computeDeltas } from "./calculator.service.js";
import type { HoldingRecord, HoldingsSnapshot } from "../../types/institutional.types.js";

function snapshot(...records: Array<[string, string, number, number]>): HoldingsSnapshot {
  return new Map(
    records.map(([identityKey, companyName, marketValue, shareCount]): [string, HoldingRecord] => [
      identityKey,
      { identityKey, companyName, marketValue, shareCount },
    ]),
  );
}

const noTicker = () => "N/A";

describe("computeDeltas", () => {
  it("measures weight in percentage points and share change in percent", () => {
    const rows = computeDeltas(
      snapshot(["12345678", "ACME CORP", 600, 100]),
      snapshot(["12345678", "ACME CORP", 400, 50]),
      noTicker,
    );

    expect(rows).toEqual([
      {
        identityKey: "12345678",
        companyName: "ACME CORP",
        ticker: "N/A",
        currentValue: 600,
        previousValue: 400,
        currentShares: 100,
        previousShares: 50,
        weightCurrent: 100,
        weightPrevious: 100,
        weightChange: 0,
        shareChangeAbs: 50,
        shareChangePct: 100,
        status: "CHANGE",
      },
    ]);
  });

  it("classifies new and exited positions", () => {
    const rows = computeDeltas(
      snapshot(["A", "ALPHA", 300, 10], ["B", "BETA", 100, 5]),
      snapshot(["A", "ALPHA", 200, 10], ["C", "GAMMA", 200, 4]),
      noTicker,
    );

    expect(rows.map((r) => r.identityKey)).toEqual(["A", "B", "C"]);

    const [alpha, beta, gamma] = rows;
    expect(alpha).toMatchObject({ status: "CHANGE", weightCurrent: 75, weightPrevious: 50 });
    expect(alpha.weightChange).toBe(25);
    expect(alpha.shareChangePct).toBe(0);

    expect(beta).toMatchObject({ status: "NEW", weightPrevious: 0, shareChangePct: null });
    expect(beta.weightChange).toBe(25);

    expect(gamma).toMatchObject({
      status: "EXIT",
      companyName: "GAMMA",
      weightCurrent: 0,
      weightChange: -50,
      shareChangeAbs: -4,
      shareChangePct: -100,
    });
  });

  it("floors an empty quarter's total at 1", () => {
    const rows = computeDeltas(snapshot(["A", "ALPHA", 500, 5]), new Map(), noTicker);

    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      status: "NEW",
      weightCurrent: 100,
      weightPrevious: 0,
      weightChange: 100,
      shareChangePct: null,
    });
  });

  it("keeps current weights summing to 100", () => {
    const rows = computeDeltas(
      snapshot(["A", "ALPHA", 123, 1], ["B", "BETA", 456, 1], ["C", "GAMMA", 789, 1]),
      new Map(),
      noTicker,
    );

    const total = rows.reduce((sum, r) => sum + r.weightCurrent, 0);
    expect(total).toBeCloseTo(100, 9);
  });

  it("resolves tickers from the company name", () => {
    const rows = computeDeltas(snapshot(["03783310", "APPLE INC", 100, 1]), new Map());

    expect(rows[0].ticker).toBe("AAPL");
  });

  it("returns nothing for two empty quarters", () => {
    expect(computeDeltas(new Map(), new Map())).toEqual([]);
  });
});
