/**
 * Fuzzy Matching Similarity Tests
 */

import { describe, it, expect } from 'vitest';
import { findBestMatch, levenshteinDistance, similarityRatio } from '../similarity.js';

describe('levenshteinDistance', () => {
  it('should count single edits', () => {
    expect(levenshteinDistance('TULANE', 'TULANE')).toBe(0);
    expect(levenshteinDistance('TULANE', 'TULANES')).toBe(1);
    expect(levenshteinDistance('TULANE', 'TOLANE')).toBe(1);
    expect(levenshteinDistance('TULANE', 'TULAN')).toBe(1);
  });

  it('should handle empty strings', () => {
    expect(levenshteinDistance('', 'RICE')).toBe(4);
    expect(levenshteinDistance('RICE', '')).toBe(4);
  });

  it('should match the textbook example', () => {
    expect(levenshteinDistance('KITTEN', 'SITTING')).toBe(3);
  });
});

describe('similarityRatio', () => {
  it('should be 1 for identical strings', () => {
    expect(similarityRatio('OREGON STATE UNIVERSITY', 'OREGON STATE UNIVERSITY')).toBe(1);
    expect(similarityRatio('', '')).toBe(1);
  });

  it('should be symmetric', () => {
    expect(similarityRatio('KITTEN', 'SITTING')).toBe(similarityRatio('SITTING', 'KITTEN'));
  });

  it('should normalize by the longer string', () => {
    expect(similarityRatio('KITTEN', 'SITTING')).toBeCloseTo(4 / 7, 10);
    expect(similarityRatio('OREGON STATE UNIVERSTY', 'OREGON STATE UNIVERSITY')).toBeCloseTo(22 / 23, 10);
  });

  it('should be 0 against an empty string', () => {
    expect(similarityRatio('RICE', '')).toBe(0);
  });
});

describe('findBestMatch', () => {
  const candidates = ['OREGON STATE UNIVERSITY', 'TULANE UNIVERSITY', 'UNIVERSITY OF RICHMOND'];

  it('should pick the closest candidate above threshold', () => {
    const result = findBestMatch('oregon state universty', candidates, 0.85);
    expect(result?.match).toBe('OREGON STATE UNIVERSITY');
    expect(result?.score).toBeCloseTo(22 / 23, 10);
  });

  it('should return null when nothing reaches the threshold', () => {
    expect(findBestMatch('OREGON', candidates, 0.85)).toBeNull();
  });

  it('should accept a score exactly at the threshold', () => {
    expect(findBestMatch('ABCX', ['ABCD'], 0.75)).toEqual({ match: 'ABCD', score: 0.75 });
  });

  it('should break ties alphabetically regardless of input order', () => {
    expect(findBestMatch('ABCX', ['ABCE', 'ABCD'], 0.5)?.match).toBe('ABCD');
    expect(findBestMatch('ABCX', new Set(['ABCD', 'ABCE']), 0.5)?.match).toBe('ABCD');
  });
});
