export type TextWindow = {
  chunk: string;
  /** Offset of the anchor match inside `chunk`. */
  anchor: number;
};

export function windowAround(
  content: string,
  matchStart: number,
  matchLength: number,
  radius: number,
): TextWindow {
  const start = Math.max(0, matchStart - radius);
  const end = Math.min(content.length, matchStart + matchLength + radius);
  return { chunk: content.slice(start, end), anchor: matchStart - start };
}

/**
 * The match of `pattern` closest to `anchor`. Neighbouring rows share the window,
 * so the first match is often the previous row's field.
 */
export function nearestMatch(
  chunk: string,
  pattern: RegExp,
  anchor: number,
): RegExpMatchArray | null {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  let best: RegExpMatchArray | null = null;
  let bestDistance = Infinity;

  for (const match of chunk.matchAll(new RegExp(pattern.source, flags))) {
    const distance = Math.abs((match.index ?? 0) - anchor);
    if (distance < bestDistance) {
      best = match;
      bestDistance = distance;
    }
  }
  return best;
}
