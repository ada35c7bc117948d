export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Offset of the first whole-word (or whole-phrase) occurrence, or -1 */
export function phraseIndex(text: string, phrase: string): number {
  const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(phrase.toLowerCase())}(?=$|[^a-z0-9])`);
  const match = pattern.exec(text.toLowerCase());
  if (!match) return -1;
  const lead = match[1] ?? '';
  return match.index + lead.length;
}

/** Whole-word (or whole-phrase) match, so "bar" does not hit "Barrel House" */
export function containsPhrase(text: string, phrase: string): boolean {
  return phraseIndex(text, phrase) >= 0;
}

/** First phrase from the list found in the text, in list order */
export function findPhrase(text: string, phrases: readonly string[]): string | null {
  return phrases.find(phrase => containsPhrase(text, phrase)) ?? null;
}

/**
 * Whole-word match that also takes the common inflections of the last word:
 * "pair" hits "pairs" and "paired" but not "repair".
 */
export function containsStem(text: string, stem: string): boolean {
  const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(stem.toLowerCase())}(?:s|es|d|ed|ing)?(?=$|[^a-z0-9])`);
  return pattern.test(text.toLowerCase());
}

/** First stem from the list found in the text, in list order */
export function findStem(text: string, stems: readonly string[]): string | null {
  return stems.find(stem => containsStem(text, stem)) ?? null;
}

export function titleCase(value: string): string {
  return value.replace(/\b([a-z])/g, (_, ch: string) => ch.toUpperCase());
}
