/**
 * =============================================================================
 * TEXT UTILITIES - Unit Tests
 * =============================================================================
 */

import { compareCodePoints } from '../shared/utils/text.utils';

describe('compareCodePoints', () => {
  it('returns 0 for equal strings', () => {
    expect(compareCodePoints('Cary', 'Cary')).toBe(0);
    expect(compareCodePoints('', '')).toBe(0);
  });

  it('sorts uppercase before lowercase', () => {
    expect(compareCodePoints('Zebulon', 'apex')).toBe(-1);
  });

  it('sorts a prefix before the longer string', () => {
    expect(compareCodePoints('Apex', 'Apex West')).toBe(-1);
    expect(compareCodePoints('Apex West', 'Apex')).toBe(1);
  });

  it('sorts a character outside the BMP after U+FF5E', () => {
    expect(compareCodePoints('～', '🚗')).toBe(-1);
    expect(compareCodePoints('🚗', '～')).toBe(1);
  });

  it('compares past a shared astral prefix', () => {
    expect(compareCodePoints('🚗A', '🚗B')).toBe(-1);
    expect(['🚗B', '🚗', '🚗A'].sort(compareCodePoints)).toEqual(['🚗', '🚗A', '🚗B']);
  });
});
