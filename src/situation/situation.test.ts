import { describe, expect, it } from 'vitest';
import { MOODS, MOOD_PROFILES, parseMood } from './mood';
import { parseTrust } from './trust';
import { contextFrom, isSituationTag, situationTags } from './tags';

describe('parseMood', () => {
  it('accepts keys and labels in any case', () => {
    expect(parseMood('Calm')).toBe('calm');
    expect(parseMood(' HOPEFUL ')).toBe('hopeful');
  });

  it('accepts ranks as numbers or digits', () => {
    expect(parseMood(3)).toBe('cautious');
    expect(parseMood('6')).toBe('hopeful');
  });

  it('returns null for anything else', () => {
    expect(parseMood(0)).toBeNull();
    expect(parseMood(2.5)).toBeNull();
    expect(parseMood('7')).toBeNull();
    expect(parseMood('joyful')).toBeNull();
  });

  it('lists moods in rank order', () => {
    expect(MOODS.map(m => MOOD_PROFILES[m].rank)).toEqual([1, 2, 3, 4, 5, 6]);
  });
});

describe('parseTrust', () => {
  it('parses trust levels', () => {
    expect(parseTrust('Present')).toBe('present');
    expect(parseTrust('absent')).toBe('absent');
    expect(parseTrust('maybe')).toBeNull();
  });
});

describe('situationTags', () => {
  it('adds the pair tag only when both inputs are chosen', () => {
    expect(situationTags({})).toEqual([]);
    expect(situationTags({ trust: 'absent' })).toEqual(['trust:absent']);
    expect(situationTags({ mood: 'calm' })).toEqual(['mood:calm']);
    expect(situationTags({ trust: 'absent', mood: 'closed' })).toEqual([
      'trust:absent',
      'mood:closed',
      'trust:absent+mood:closed'
    ]);
  });

  it('recognises trust, mood and pair tags', () => {
    expect(isSituationTag('trust:absent+mood:closed')).toBe(true);
    expect(isSituationTag('mood:calm')).toBe(true);
    expect(isSituationTag('grief')).toBe(false);
  });
});

describe('contextFrom', () => {
  it('normalises tags and drops empty ones', () => {
    expect([...contextFrom([' Grief ', '', 'grief', 'MOOD:calm'])]).toEqual(['grief', 'mood:calm']);
  });
});
