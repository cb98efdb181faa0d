function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Inflections a keyword may carry: "hotels", "cancelled", "cancellation", "travelling".
const SUFFIXES = '(?:s|es|d|ed|led|ling|lation|ing)?';

const cache = new Map<string, RegExp>();

function phrasePattern(phrase: string): RegExp {
  const stems = [escapeRegExp(phrase) + SUFFIXES];
  // "reschedule" -> "rescheduling"
  if (phrase.endsWith('e')) stems.push(escapeRegExp(phrase.slice(0, -1)) + 'ing');
  return new RegExp(`(^|[^\\p{L}\\p{N}])(?:${stems.join('|')})(?=$|[^\\p{L}\\p{N}])`, 'u');
}

/**
 * Matches a phrase at a word start, allowing a plain inflection after it.
 * "spa" matches "spas" but not "space" or "spacious".
 */
export function containsPhrase(text: string, phrase: string): boolean {
  let re = cache.get(phrase);
  if (!re) {
    re = phrasePattern(phrase);
    cache.set(phrase, re);
  }
  return re.test(text);
}

export function firstPhrase<T extends string>(text: string, phrases: readonly T[]): T | undefined {
  return phrases.find((p) => containsPhrase(text, p));
}
