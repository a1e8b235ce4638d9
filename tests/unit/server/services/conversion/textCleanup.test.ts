import { describe, it, expect } from 'vitest';
import { cleanLines, cleanText } from '../../../../../src/server/services/conversion/textCleanup.js';

describe('textCleanup', () => {
  describe('cleanText', () => {
    it('trims lines, collapses blank runs and drops noise lines', () => {
      const raw = '  Hello world  \r\n\r\n\r\n a b c \nNext\u000c line\n\n';

      expect(cleanText(raw)).toBe('Hello world\n\nNext line\n');
    });

    it('returns an empty string when only whitespace and noise remain', () => {
      expect(cleanText('   \n x y \n\t\n')).toBe('');
    });

    it('removes unpaired surrogates and keeps valid pairs', () => {
      expect(cleanText('Учебный план \uD800 текст\nконец \uDC00')).toBe('Учебный план  текст\nконец\n');
      expect(cleanText('План \uD83D\uDE00')).toBe('План \uD83D\uDE00\n');
    });

    it('drops single-letter noise in any script', () => {
      expect(cleanText('а б в\nУчебный план')).toBe('Учебный план\n');
    });
  });

  describe('cleanLines', () => {
    it('strips leading blank lines', () => {
      expect(cleanLines(['', '  ', 'a1', ''])).toEqual(['a1']);
    });

    it('keeps lines that mix single letters with words', () => {
      expect(cleanLines(['I am here', 'B 12'])).toEqual(['I am here', 'B 12']);
    });
  });
});
