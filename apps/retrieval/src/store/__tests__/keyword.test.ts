import { describe, it, expect } from 'vitest';
import { extractPhrases, rankByKeywords, tokenize } from '../keyword.js';

describe('tokenize', () => {
  it('should lowercase, strip punctuation and drop stop words', () => {
    expect(tokenize('What is the Statute of Limitations?')).toEqual(['statute', 'limitations']);
  });

  it('should drop single characters', () => {
    expect(tokenize('a b cd')).toEqual(['cd']);
  });
});

describe('extractPhrases', () => {
  it('should return words and adjacent pairs', () => {
    expect(extractPhrases('breach of contract damages')).toEqual([
      'breach',
      'contract',
      'damages',
      'breach contract',
      'contract damages',
    ]);
  });
});

describe('rankByKeywords', () => {
  const documents = [
    { text: 'The tenant sued over the security deposit.' },
    { text: 'Security deposit must be returned within twenty-one days.' },
    { text: 'Overtime wages for hourly employees.' },
  ];

  it('should rank by the share of matched phrases', () => {
    const ranked = rankByKeywords('security deposit deadline', documents, 3);

    // phrases: security, deposit, deadline, security deposit, deposit deadline
    expect(ranked.map(r => r.index)).toEqual([0, 1, 2]);
    expect(ranked[0].score).toBeCloseTo(3 / 5, 10);
    expect(ranked[1].score).toBeCloseTo(3 / 5, 10);
    expect(ranked[2]).toEqual({ index: 2, score: 0, distance: 1 });
  });

  it('should respect the limit', () => {
    expect(rankByKeywords('overtime', documents, 1)).toEqual([{ index: 2, score: 1, distance: 0 }]);
  });

  it('should match whole words only', () => {
    expect(rankByKeywords('wage', documents, 3).every(r => r.score === 0)).toBe(true);
  });

  it('should score everything 0 for a query of stop words', () => {
    const ranked = rankByKeywords('what is the', documents, 3);
    expect(ranked.map(r => r.distance)).toEqual([1, 1, 1]);
  });

  it('should return nothing for a non-positive limit', () => {
    expect(rankByKeywords('security', documents, 0)).toEqual([]);
  });
});
