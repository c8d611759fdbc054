/**
 * Training n-grams
 * Picks the most frequent bigrams of a language for the font-property pass
 */

export interface BigramRecord {
  bigram: string;
  count: number;
}

// Share of all bigram occurrences the selection must cover
export const NGRAM_COVERAGE = 0.99;

/**
 * Parse a .bigram_freqs file: one "<bigram> <count>" record per line.
 * Lines without a numeric count are skipped.
 */
export function parseBigramFreqs(content: string): BigramRecord[] {
  const records: BigramRecord[] = [];
  for (const line of content.split("\n")) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 2) continue;
    const count = Number.parseInt(fields[1], 10);
    if (Number.isNaN(count)) continue;
    records.push({ bigram: fields[0], count });
  }
  return records;
}

/**
 * Take bigrams in descending count order until their cumulative count
 * exceeds `coverage` of the total. The bigram that crosses the threshold is included.
 */
export function selectTrainingNgrams(
  records: readonly BigramRecord[],
  coverage: number = NGRAM_COVERAGE,
): string[] {
  const threshold = coverage * records.reduce((sum, r) => sum + r.count, 0);
  const sorted = [...records].sort((a, b) => b.count - a.count);

  const selected: string[] = [];
  let cumulative = 0;
  for (const { bigram, count } of sorted) {
    if (cumulative > threshold) break;
    selected.push(bigram);
    cumulative += count;
  }
  return selected;
}
