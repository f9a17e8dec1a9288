const WORD_CHAR = "[\\p{L}\\p{N}_]";

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whole-word, case-insensitive matcher. Word edges are Unicode-aware, so
 * "jour" does not match inside "séjour" and a term ending in "€" still has
 * a right edge.
 */
export function wholeWord(source: string, flags = "iu"): RegExp {
  return new RegExp(`(?<!${WORD_CHAR})(?:${source})(?!${WORD_CHAR})`, flags);
}

/** `...`-wrapped excerpt around `text[index]`, empty for a missing match. */
export function excerpt(text: string, index: number, length: number, radius = 20): string {
  if (index < 0) return "";
  const start = Math.max(0, index - radius);
  const end = Math.min(text.length, index + length + radius);
  return `...${text.slice(start, end)}...`;
}
