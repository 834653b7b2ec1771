import { describe, it, expect } from 'vitest';
import { generateHint, isHintLevel } from '@/services/hint.utils';

describe('isHintLevel', () => {
  it('accepts 1, 2 and 3 only', () => {
    expect([0, 1, 2, 3, 4, 1.5].map(isHintLevel)).toEqual([false, true, true, true, false, false]);
  });
});

describe('generateHint', () => {
  it('level 1 replaces every character with an underscore', () => {
    expect(generateHint('ngày mai', 1)).toBe('____ ___');
  });

  it('level 2 keeps the first character of each word', () => {
    expect(generateHint('ngày mai', 2)).toBe('n___ m__');
  });

  it('level 3 reveals the answer', () => {
    expect(generateHint('ngày mai', 3)).toBe('ngày mai');
  });

  it('counts a decomposed letter as one character', () => {
    expect(generateHint('nga\u0300y', 1)).toBe('____');
    expect(generateHint('\u0111e\u0302\u0301n', 2)).toBe('\u0111__');
  });

  it('collapses repeated whitespace between words', () => {
    expect(generateHint('  làm   việc ', 1)).toBe('___ ____');
  });

  it('keeps a leading capital at level 2', () => {
    expect(generateHint('Older brother', 2)).toBe('O____ b______');
  });
});
