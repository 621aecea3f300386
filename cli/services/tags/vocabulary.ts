export interface WordCount {
  word: string;
  count: number;
}

const MIN_WORD_LENGTH = 3;
const HEX_TOKEN = /^[0-9a-f]{6,}$/;

function isVocabularyWord(word: string, stopwords: ReadonlySet<string>): boolean {
  if (word.length < MIN_WORD_LENGTH) return false;
  if (/^\d+$/.test(word)) return false;
  if (stopwords.has(word)) return false;
  // uuid fragments and hashes
  return !HEX_TOKEN.test(word);
}

/**
 * Count descriptive words across filename stems.
 * Sorted by count, ties keep first-seen order.
 */
export function extractVocabulary(stems: readonly string[], stopwords: readonly string[]): WordCount[] {
  const stopSet = new Set(stopwords.map((word) => word.toLowerCase()));
  const counts = new Map<string, number>();

  for (const stem of stems) {
    for (const word of stem.toLowerCase().split(/[-_\s]+/)) {
      if (!isVocabularyWord(word, stopSet)) continue;
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .map(([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count);
}

export function formatBar(count: number, divisor: number, width: number): string {
  return '█'.repeat(Math.min(Math.floor(count / divisor), width));
}
