import type { HoldingRecord, HoldingsSnapshot } from "../../types/institutional.types.js";

export const DEFAULT_IDENTITY_KEY_LENGTH = 8;

export function toIdentityKey(identifier: string, identityKeyLength: number): string {
  return identifier.trim().toUpperCase().slice(0, identityKeyLength);
}

/**
 * Accumulates raw rows of one parse call. Rows sharing an identity key are summed
 * (share classes, lot lines); the first non-empty issuer name wins.
 */
export class HoldingsSnapshotBuilder {
  private readonly records = new Map<string, HoldingRecord>();

  constructor(private readonly identityKeyLength: number = DEFAULT_IDENTITY_KEY_LENGTH) {}

  add(identifier: string, companyName: string, marketValue: number, shareCount: number): void {
    const identityKey = toIdentityKey(identifier, this.identityKeyLength);
    const existing = this.records.get(identityKey);

    if (!existing) {
      this.records.set(identityKey, { identityKey, companyName, marketValue, shareCount });
      return;
    }

    existing.marketValue += marketValue;
    existing.shareCount += shareCount;
    if (!existing.companyName && companyName) {
      existing.companyName = companyName;
    }
  }

  get size(): number {
    return this.records.size;
  }

  build(): HoldingsSnapshot {
    return new Map(
      Array.from(this.records, ([key, record]) => [key, Object.freeze({ ...record })] as const),
    );
  }
}

export function emptySnapshot(): HoldingsSnapshot {
  return new Map();
}

export function totalMarketValue(snapshot: HoldingsSnapshot): number {
  let total = 0;
  for (const record of snapshot.values()) total += record.marketValue;
  return total;
}
