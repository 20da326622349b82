/**
 * Keyword Ranker
 *
 * Text-overlap ranking used when a query cannot be embedded. Scores a
 * document by the share of query phrases (single words and adjacent word
 * pairs, stop words removed) that occur in its text.
 */

const STOP_WORDS = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for',
  'of', 'with', 'by', 'is', 'are', 'was', 'were', 'be', 'been', 'being',
  'have', 'has', 'had', 'do', 'does', 'did', 'will', 'would', 'could', 'should',
  'what', 'which', 'who', 'how', 'when', 'where', 'under', 'can', 'i', 'my'
]);

export interface KeywordCandidate {
  text: string;
}

export interface KeywordScore {
  index: number;
  score: number;
  distance: number;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase()
    .replace(/[^\w\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .split(' ')
    .filter(word => word.length > 1 && !STOP_WORDS.has(word));
}

/**
 * Single words plus adjacent pairs, deduplicated
 */
export function extractPhrases(text: string): string[] {
  const words = tokenize(text);
  const phrases = new Set<string>(words);

  for (let i = 0; i < words.length - 1; i++) {
    phrases.add(`${words[i]} ${words[i + 1]}`);
  }

  return [...phrases];
}

/**
 * Rank candidates by ascending `1 - score`. Every candidate is ranked,
 * including those sharing no phrase with the query (distance 1), the same
 * way a nearest-neighbour search always returns its k closest records.
 */
export function rankByKeywords(
  query: string,
  candidates: KeywordCandidate[],
  limit: number
): KeywordScore[] {
  if (limit <= 0 || candidates.length === 0) {
    return [];
  }

  const phrases = extractPhrases(query);

  const scored = candidates.map((candidate, index) => {
    const score = phrases.length === 0 ? 0 : matchShare(phrases, candidate.text);
    return { index, score, distance: 1 - score };
  });

  scored.sort((a, b) => a.distance - b.distance || a.index - b.index);

  return scored.slice(0, limit);
}

function matchShare(phrases: string[], text: string): number {
  // Padded so phrase lookups only match on word boundaries
  const haystack = ` ${tokenize(text).join(' ')} `;
  let matched = 0;

  for (const phrase of phrases) {
    if (haystack.includes(` ${phrase} `)) {
      matched++;
    }
  }

  return matched / phrases.length;
}
