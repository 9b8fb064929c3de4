const INFO_TABLE_MARKERS = ["informationtable", "infotable", "nameofissuer", "cusip"] as const;

/**
 * True when the payload looks like a 13F information table: at least two of the
 * table/field markers, and not a bare edgarSubmission cover document.
 */
export function looksLikeInfoTable(text: string | null | undefined): boolean {
  const lower = (text ?? "").toLowerCase();
  if (!lower) return false;

  const hasTableMarker = lower.includes("infotable") || lower.includes("informationtable");
  // primary_doc.xml carries the cover page and summary only
  if (lower.includes("edgarsubmission") && !hasTableMarker) return false;

  const hits = INFO_TABLE_MARKERS.filter((marker) => lower.includes(marker)).length;
  return hits >= 2;
}

export function startsWithMarkup(content: string): boolean {
  return content.trimStart().startsWith("<");
}

export function hasTableMarker(content: string): boolean {
  const lower = content.toLowerCase();
  return lower.includes("informationtable") || lower.includes("infotable");
}
