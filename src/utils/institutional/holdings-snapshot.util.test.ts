import { describe, expect, it } from "vitest";
import {
  HoldingsSnapshotBuilder,
  emptySnapshot,
  toIdentityKey,
  totalMarketValue,
} from "./holdings-snapshot.util.js";

describe("toIdentityKey", () => {
  it("trims, uppercases and truncates", () => {
    expect(toIdentityKey(" 00206r102 ", 8)).toBe("00206R10");
    expect(toIdentityKey("00206R102", 9)).toBe("00206R102");
  });
});

describe("HoldingsSnapshotBuilder", () => {
  it("sums rows that share an identity key", () => {
    const builder = new HoldingsSnapshotBuilder(8);
    builder.add("12345678A", "ACME CORP", 100, 10);
    builder.add("12345678B", "ACME CORP CL B", 200, 20);

    const snapshot = builder.build();
    expect(snapshot.size).toBe(1);
    expect(snapshot.get("12345678")).toEqual({
      identityKey: "12345678",
      companyName: "ACME CORP",
      marketValue: 300,
      shareCount: 30,
    });
  });

  it("keeps the first non-empty name", () => {
    const builder = new HoldingsSnapshotBuilder(8);
    builder.add("12345678A", "", 100, 1);
    builder.add("12345678B", "ACME CORP", 100, 1);
    builder.add("12345678C", "OTHER NAME", 100, 1);

    expect(builder.build().get("12345678")?.companyName).toBe("ACME CORP");
  });

  it("keeps share classes apart with a 9 character key", () => {
    const builder = new HoldingsSnapshotBuilder(9);
    builder.add("12345678A", "ACME CORP", 100, 10);
    builder.add("12345678B", "ACME CORP", 200, 20);

    expect(builder.size).toBe(2);
  });

  it("builds frozen records detached from the builder", () => {
    const builder = new HoldingsSnapshotBuilder();
    builder.add("123456789", "ACME CORP", 100, 10);
    const snapshot = builder.build();
    builder.add("123456789", "ACME CORP", 100, 10);

    const record = snapshot.get("12345678");
    expect(Object.isFrozen(record)).toBe(true);
    expect(record?.marketValue).toBe(100);
  });
});

describe("totalMarketValue", () => {
  it("sums market values", () => {
    const builder = new HoldingsSnapshotBuilder();
    builder.add("123456789", "ACME CORP", 600, 1);
    builder.add("223456789", "GLOBEX INC", 400, 1);

    expect(totalMarketValue(builder.build())).toBe(1000);
    expect(totalMarketValue(emptySnapshot())).toBe(0);
  });
});
