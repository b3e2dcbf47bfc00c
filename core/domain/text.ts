// core/domain/text.ts

// Articles, conjunctions, pronouns and filler that carry no job signal.
export const STOP_WORDS: ReadonlySet<string> = new Set([
  "the", "and", "for", "are", "but", "not", "you", "all", "any", "can",
  "had", "her", "was", "one", "our", "out", "has", "him", "his", "how",
  "its", "may", "who", "she", "they", "them", "their", "there", "these", "those",
  "this", "that", "what", "which", "will", "with", "have", "from", "been", "were",
  "into", "than", "then", "your", "also", "yours",
]);

export type TermCount = { term: string; count: number };

/** Lowercase alphabetic tokens of length >= 3, stop words removed. */
export function tokenize(text: string): string[] {
  const words = String(text || "").toLowerCase().match(/\b[a-z]{3,}\b/g);
  if (!words) return [];
  return words.filter((w) => !STOP_WORDS.has(w));
}

/**
 * Most frequent tokens, highest count first. Ties keep first-occurrence order
 * so the result is stable for identical input.
 */
export function wordFrequency(text: string, limit = 20): TermCount[] {
  const counts = new Map<string, number>();
  for (const t of tokenize(text)) counts.set(t, (counts.get(t) || 0) + 1);

  return [...counts.entries()]
    .map(([term, count]) => ({ term, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

/** Case-insensitive dedupe that keeps the first spelling seen. Blank entries are dropped. */
export function dedupeCaseInsensitive(items: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of items) {
    const s = String(raw || "").trim();
    if (!s) continue;
    const k = s.toLowerCase();
    if (seen.has(k)) continue;
    seen.add(k);
    out.push(s);
  }
  return out;
}
