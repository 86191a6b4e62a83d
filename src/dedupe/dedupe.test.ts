/**
 * Tests for the Duplicate Filter
 *
 * - Title normalization (normalizeTitle, cleanCandidateTitle)
 * - Edit distance and similarity ratio
 * - Threshold semantics of isDuplicateTitle
 */

import { describe, it, expect } from '@jest/globals';
import { normalizeTitle, cleanCandidateTitle } from './normalize.js';
import {
  indelDistance,
  similarityRatio,
  titleSimilarity,
  findDuplicate,
  isDuplicateTitle,
  DEFAULT_SIMILARITY_THRESHOLD,
} from './similarity.js';

// ============================================================================
// normalizeTitle Tests
// ============================================================================

describe('normalizeTitle', () => {
  it('should lowercase and keep only ascii letters and digits', () => {
    expect(normalizeTitle('Harbor Lights (Live)')).toBe('harborlightslive');
    expect(normalizeTitle("Don't Stop - 2019 Remaster")).toBe('dontstop2019remaster');
  });

  it('should return empty string for punctuation-only input', () => {
    expect(normalizeTitle('  -- !! ')).toBe('');
    expect(normalizeTitle('')).toBe('');
  });

  it('should drop accented characters', () => {
    expect(normalizeTitle('Café')).toBe('caf');
  });
});

// ============================================================================
// cleanCandidateTitle Tests
// ============================================================================

describe('cleanCandidateTitle', () => {
  it('should take the first segment before " - "', () => {
    expect(cleanCandidateTitle('Harbor Lights - The Tidewater Band - Low Tide')).toBe('harbor lights');
  });

  it('should strip surrounding quotes after trimming', () => {
    expect(cleanCandidateTitle('  "Harbor Lights" - The Tidewater Band')).toBe('harbor lights');
    expect(cleanCandidateTitle('“Paper Moons” - Cass Rivera')).toBe('paper moons');
  });

  it('should keep hyphens that are not the delimiter', () => {
    expect(cleanCandidateTitle('Re-Run - Artist - Album')).toBe('re-run');
  });

  it('should return the whole line when no delimiter is present', () => {
    expect(cleanCandidateTitle('Northbound')).toBe('northbound');
  });
});

// ============================================================================
// Similarity Tests
// ============================================================================

describe('indelDistance', () => {
  it('should count a substitution as two edits', () => {
    expect(indelDistance('abc', 'abd')).toBe(2);
  });

  it('should equal the combined length for disjoint strings', () => {
    expect(indelDistance('abc', 'xyz')).toBe(6);
    expect(indelDistance('', 'abc')).toBe(3);
  });

  it('should be zero for identical strings', () => {
    expect(indelDistance('harborlights', 'harborlights')).toBe(0);
  });
});

describe('similarityRatio', () => {
  it('should return 100 for identical non-empty strings', () => {
    expect(similarityRatio('northbound', 'northbound')).toBe(100);
  });

  it('should return 0 when either string is empty', () => {
    expect(similarityRatio('', 'abc')).toBe(0);
    expect(similarityRatio('abc', '')).toBe(0);
    expect(similarityRatio('', '')).toBe(0);
  });

  it('should round the ratio to an integer', () => {
    // (6 - 2) / 6 = 66.7
    expect(similarityRatio('abc', 'abd')).toBe(67);
    // (23 - 1) / 23 = 95.65
    expect(similarityRatio('harborlights', 'harborlight')).toBe(96);
  });

  it('should be symmetric', () => {
    expect(similarityRatio('papermoons', 'northbound')).toBe(similarityRatio('northbound', 'papermoons'));
  });

  it('should compare normalized titles', () => {
    expect(titleSimilarity('Harbor Lights!', 'harbor-lights')).toBe(100);
  });
});

// ============================================================================
// isDuplicateTitle Tests
// ============================================================================

describe('isDuplicateTitle', () => {
  const exclusions = ['harbor lights', 'northbound', 'paper moons'];

  it('should use 85 as the default threshold', () => {
    expect(DEFAULT_SIMILARITY_THRESHOLD).toBe(85);
  });

  it('should flag near-identical titles', () => {
    expect(isDuplicateTitle('Harbor Light', exclusions)).toBe(true);
    expect(findDuplicate('HARBOR LIGHT', exclusions)).toBe('harbor lights');
  });

  it('should accept distinct titles', () => {
    // northboundtrain vs northbound: 20 / 25 = 80
    expect(isDuplicateTitle('Northbound Train', exclusions)).toBe(false);
    expect(isDuplicateTitle('Glass Harbor', exclusions)).toBe(false);
    // blue vs thunderstruck share 'ue': 100 * 4 / 17 = 24
    expect(titleSimilarity('Blue', 'Thunderstruck')).toBe(24);
    expect(isDuplicateTitle('Blue', ['Thunderstruck'])).toBe(false);
  });

  it('should require the ratio to exceed the threshold strictly', () => {
    const a = 'abcdefghijklmnopqrst';
    const b = 'abcdefghijklmnopqxyz';
    expect(similarityRatio(a, b)).toBe(85);
    expect(isDuplicateTitle(a, [b], 85)).toBe(false);
    expect(isDuplicateTitle(a, [b], 84)).toBe(true);
  });

  it('should never flag against an empty exclusion list', () => {
    expect(isDuplicateTitle('Harbor Lights', [])).toBe(false);
  });

  it('should never flag a title that normalizes to nothing', () => {
    expect(isDuplicateTitle('!!!', ['!!!'])).toBe(false);
  });
});
