import { describe, it, expect } from 'vitest';
import { isMedley, medleySegments, normalize } from './normalize.js';

const SAMPLES = [
  'Tokyo (Acoustic)',
  'Glass Harbor  (Extended Jam) (Live)',
  'Paper (Lanterns (2019 Mix)) Reprise',
  '  Neon   Dreams\t',
  'Song (live',
  'Desert Rain / Ocean Avenue',
  '((()))',
  ''
];

describe('normalize', () => {
  it('strips a parenthetical suffix and lowercases', () => {
    expect(normalize('Tokyo (Acoustic)')).toBe('tokyo');
  });

  it('strips several parentheticals', () => {
    expect(normalize('Glass Harbor  (Extended Jam) (Live)')).toBe('glass harbor');
  });

  it('strips nested parentheticals completely', () => {
    expect(normalize('Paper (Lanterns (2019 Mix)) Reprise')).toBe('paper reprise');
  });

  it('collapses inner whitespace and trims', () => {
    expect(normalize('  Neon   Dreams\t')).toBe('neon dreams');
  });

  it('leaves an unclosed parenthesis alone', () => {
    expect(normalize('Song (live')).toBe('song (live');
  });

  it('returns an empty string for empty input', () => {
    expect(normalize('')).toBe('');
  });

  it('is idempotent', () => {
    for (const sample of SAMPLES) {
      const once = normalize(sample);
      expect(normalize(once)).toBe(once);
    }
  });

  it('never leaves parenthesized text or doubled whitespace', () => {
    for (const sample of SAMPLES) {
      const result = normalize(sample);
      expect(result).not.toMatch(/\([^()]*\)/);
      expect(result).not.toMatch(/\s{2}/);
    }
  });
});

describe('medley detection', () => {
  it('detects the slash indicator', () => {
    expect(isMedley('Desert Rain / Ocean Avenue')).toBe(true);
    expect(isMedley('Desert Rain')).toBe(false);
  });

  it('splits medley segments', () => {
    expect(medleySegments('Desert Rain / Ocean Avenue')).toEqual(['Desert Rain', 'Ocean Avenue']);
    expect(medleySegments('A // B /')).toEqual(['A', 'B']);
  });
});
