import { NameClassifier, compilePattern } from '../../src/services/name-classifier.service';
import { PatternCompileError } from '../../src/errors';

describe('NameClassifier', () => {
  describe('compilePattern', () => {
    it('should keep the source text', () => {
      const pattern = compilePattern('^bot\\d+$');
      expect(pattern.source).toBe('^bot\\d+$');
      expect(pattern.regex.test('bot42')).toBe(true);
    });

    it('should turn a leading (?i) group into the i flag', () => {
      const pattern = compilePattern('(?i)cheat');
      expect(pattern.source).toBe('(?i)cheat');
      expect(pattern.regex.flags).toBe('iu');
      expect(pattern.regex.test('CHEATER')).toBe(true);
    });

    it('should reject inline flags RegExp cannot express', () => {
      expect(() => compilePattern('(?x)bot')).toThrow(PatternCompileError);
    });

    it('should reject invalid expressions', () => {
      expect(() => compilePattern('[unterminated')).toThrow(PatternCompileError);
    });

    it('should support Unicode property classes', () => {
      const pattern = compilePattern('^\\p{Script=Cyrillic}+$');
      expect(pattern.regex.test('Иван')).toBe(true);
      expect(pattern.regex.test('Ivan')).toBe(false);
    });

    it('should reject unknown properties and stray escapes', () => {
      expect(() => compilePattern('\\p{NotAProperty}')).toThrow(PatternCompileError);
      expect(() => compilePattern('bot\\-1')).toThrow(PatternCompileError);
    });
  });

  describe('match', () => {
    it('should return the first matching pattern in list order', () => {
      const classifier = new NameClassifier();
      classifier.add('bot');
      classifier.add('b');

      expect(classifier.match('mybot')?.source).toBe('bot');
      expect(classifier.match('abc')?.source).toBe('b');
      expect(classifier.match('player')).toBeNull();
    });

    it('should match anywhere in the name', () => {
      const classifier = new NameClassifier();
      classifier.add('MYG\\)T');
      expect(classifier.match('(1)MYG)T')?.source).toBe('MYG\\)T');
    });
  });

  describe('addLines', () => {
    it('should skip blank lines and report invalid ones', () => {
      const classifier = new NameClassifier();
      const { added, warnings } = classifier.addLines('one\n\n   \n(two\r\nthree  \n');

      expect(added.map((p) => p.source)).toEqual(['one', 'three']);
      expect(warnings).toHaveLength(1);
      expect(warnings[0].pattern).toBe('(two');
      expect(classifier.size).toBe(2);
    });
  });

  describe('remove / serialize', () => {
    it('should remove by index and write one pattern per line', () => {
      const classifier = new NameClassifier();
      classifier.addLines('a\nb\nc');

      expect(classifier.remove(1)?.source).toBe('b');
      expect(classifier.remove(5)).toBeNull();
      expect(classifier.serialize()).toBe('a\nc\n');
    });
  });
});
