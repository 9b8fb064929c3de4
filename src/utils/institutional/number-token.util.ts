// Comma-grouped ("1,234,567") or plain ("1234567") digit runs
export const INTEGER_TOKEN_SOURCE = String.raw`\d{1,3}(?:,\d{3})+|\d+`;

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function parseIntegerToken(token: string): number {
  return parseInt(token.replace(/,/g, ""), 10);
}

/** Returns null for anything that is not a plain decimal literal. */
export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL.test(trimmed)) return null;
  return Number(trimmed);
}

/**
 * Largest number is read as the share count, smallest as the value in thousands.
 * With a single number the value is estimated as shares / 1000.
 */
export function splitSharesAndValue(numbers: number[]): { shares: number; valueThousands: number } {
  const sorted = [...numbers].sort((a, b) => b - a);
  const shares = sorted[0] ?? 0;
  const valueThousands =
    sorted.length > 1 ? sorted[sorted.length - 1] : Math.max(Math.floor(shares / 1000), 0);
  return { shares, valueThousands };
}
