import { generateContentHash, generateExamId, generateQuestionHash } from './contentHash';

describe('contentHash', () => {
  it('should return the md5 digest, optionally truncated', () => {
    expect(generateContentHash('abc')).toBe('900150983cd24fb0d6963f7d28e17f72');
    expect(generateContentHash('abc', 8)).toBe('90015098');
  });

  it('should return "empty" for empty content', () => {
    expect(generateContentHash('')).toBe('empty');
  });

  it('should ignore case and surrounding whitespace in question hashes', () => {
    expect(generateQuestionHash('  ABC ')).toBe(generateContentHash('abc'));
  });

  it('should derive exam ids from course code and page text', () => {
    expect(generateExamId(null, ['abc'])).toBe('exam-90015098');
    expect(generateExamId('ECON 310', ['abc'])).toBe('exam-ECON310-90015098');
  });
});
