/**
 * Normalize a title for comparison: lowercase, drop everything outside
 * [a-z0-9 ], collapse whitespace. Catalog titles, synonyms, override keys and
 * parsed torrent titles all go through this same function.
 */
export function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/\s/g, " ")
    .replace(/[^a-z0-9 ]/g, "")
    .replace(/ +/g, " ")
    .trim();
}

/**
 * Keys like "2" or "" score spuriously high against equally degenerate
 * synonyms, so they never take part in fuzzy matching.
 */
export function isInformative(key: string): boolean {
  return key.length >= 3 && /[a-z]/.test(key);
}

/** Apply a known parser correction (e.g. "oshi no" → "oshi no ko"). */
export function applyTitleCorrection(title: string, corrections: ReadonlyMap<string, string>): string {
  return corrections.get(title.toLowerCase().trim()) ?? title;
}

/**
 * "Kizoku Tensei - Megumareta Umare kara ..." → "Kizoku Tensei".
 * Must run on the raw title since normalization removes the dash.
 */
export function subtitlePrefix(title: string): string | null {
  const idx = title.indexOf(" - ");
  if (idx <= 0) return null;
  return title.slice(0, idx).trim();
}

const ORDINAL_SEASON = /\b(\d+)(?:st|nd|rd|th) season\b/g;
const SEASON_NUMBER = /\bseason (\d+)\b/g;
const SHORT_SEASON = /\bs(\d+)\b/g;

/** Season numbers a catalog title encodes: "Season 3", "2nd Season", "S2". */
export function seasonOrdinals(title: string): number[] {
  const key = normalize(title);
  const found = new Set<number>();
  for (const pattern of [ORDINAL_SEASON, SEASON_NUMBER, SHORT_SEASON]) {
    for (const m of key.matchAll(pattern)) {
      found.add(parseInt(m[1], 10));
    }
  }
  return [...found].sort((a, b) => a - b);
}
