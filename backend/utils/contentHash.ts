import crypto from 'crypto';

/**
 * Content hashing for exact-duplicate detection and stable exam ids
 */

/**
 * Generates a content hash using MD5 algorithm
 * @param content - The content to hash
 * @param length - The desired hash length (default: full digest)
 * @returns A hex hash string, or 'empty' for empty content
 */
export function generateContentHash(content: string, length?: number): string {
  if (!content) {
    return 'empty';
  }

  const digest = crypto.createHash('md5').update(content).digest('hex');
  return length === undefined ? digest : digest.substring(0, length);
}

/**
 * Hash used to detect identical questions: case and surrounding whitespace are ignored
 */
export function generateQuestionHash(text: string): string {
  return generateContentHash(text.toLowerCase().trim());
}

/**
 * Deterministic exam id derived from course code and page text
 * @example generateExamId('ECON310', ['1. ...']) // "exam-ECON310-3f2a9c1d"
 */
export function generateExamId(courseCode: string | null, pages: readonly string[]): string {
  const hash = generateContentHash(pages.join('\f'), 8);
  const course = courseCode ? `-${courseCode.replace(/[^A-Za-z0-9]/g, '')}` : '';
  return `exam${course}-${hash}`;
}
