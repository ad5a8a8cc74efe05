/**
 * Cover-Metadata Adapter
 *
 * Resolves per-exam metadata (course code, cover-declared total marks, date).
 * Supplied values always win; the cover text (everything printed before the
 * first question) fills whatever is missing.
 */

import type { CoverMetadata, ExamDocument, ResolvedCoverMetadata } from '../../types/index.js';

const COURSE_CODE_PATTERNS: ReadonlyArray<RegExp> = [
  /COURSE\s*(?:CODE|NUMBER|NUM)?\s*:?\s*([A-Z]{2,}\s?\d{3,4})\b/i,
  // "ECON 310", "MATH1010"; not "FALL 2023" or "PAGE 12"
  /\b(?!(?:FALL|SPRING|SUMMER|WINTER|PAGE|TOTAL)\b)([A-Z]{2,5}\s?(?!(?:19|20)\d{2}\b)\d{3,4})\b/
];

const TOTAL_MARKS_PATTERNS: ReadonlyArray<RegExp> = [
  /total\s+marks?\s*:?\s*(\d+(?:\.\d+)?)/i,
  /(\d+(?:\.\d+)?)\s+marks?\s+total/i,
  /total\s*:\s*(\d+(?:\.\d+)?)\s+marks?/i,
  /(\d+(?:\.\d+)?)\s+points?\s+total/i,
  /total\s+points?\s*:?\s*(\d+(?:\.\d+)?)/i
];

const MONTHS = '(?:January|February|March|April|May|June|July|August|September|October|November|December)';

const DATE_PATTERNS: ReadonlyArray<RegExp> = [
  /(?:examination\s+)?date\s*:?\s*(\d{1,2}[-/]\d{1,2}[-/]\d{2,4})/i,
  new RegExp(`\\b(\\d{1,2}\\s+${MONTHS}\\s+\\d{4})\\b`, 'i'),
  new RegExp(`\\b(${MONTHS}\\s+\\d{1,2},?\\s+\\d{4})\\b`, 'i'),
  /\b((?:Fall|Spring|Summer|Winter)\s+\d{4})\b/i
];

function firstCapture(text: string, patterns: ReadonlyArray<RegExp>): string | null {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match) return match[1].trim();
  }
  return null;
}

export class CoverPageParser {

  /**
   * Course code, compacted and uppercased: "econ 310" → "ECON310"
   */
  static extractCourseCode(text: string): string | null {
    const raw = firstCapture(text, COURSE_CODE_PATTERNS);
    if (!raw) return null;
    const code = raw.replace(/\s+/g, '').toUpperCase();
    return /^[A-Z]{2,}\d{3,4}$/.test(code) ? code : null;
  }

  static extractTotalMarks(text: string): number | null {
    const raw = firstCapture(text, TOTAL_MARKS_PATTERNS);
    if (!raw) return null;
    const value = parseFloat(raw);
    return Number.isFinite(value) && value > 0 ? value : null;
  }

  static extractDate(text: string): string | null {
    return firstCapture(text, DATE_PATTERNS);
  }

  static parse(text: string): ResolvedCoverMetadata {
    if (!text) {
      return { courseCode: null, totalMarksFromCover: null, examDate: null };
    }
    return {
      courseCode: this.extractCourseCode(text),
      totalMarksFromCover: this.extractTotalMarks(text),
      examDate: this.extractDate(text)
    };
  }
}

export class CoverMetadataAdapter {

  /**
   * Accept numbers or numeric strings; anything else is absent
   */
  static normalizeTotal(value: CoverMetadata['totalMarksFromCover']): number | null {
    if (value === null || value === undefined) return null;
    const numeric = typeof value === 'number' ? value : parseFloat(value.trim());
    return Number.isFinite(numeric) ? numeric : null;
  }

  static normalizeString(value: string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  /**
   * Merge supplied metadata with what the cover text declares.
   */
  static resolve(exam: ExamDocument, coverText: string, parseCoverPage: boolean): ResolvedCoverMetadata {
    const supplied: CoverMetadata = exam.coverMetadata ?? {};
    const resolved: ResolvedCoverMetadata = {
      courseCode: this.normalizeString(exam.courseCode) ?? this.normalizeString(supplied.courseCode),
      totalMarksFromCover: this.normalizeTotal(supplied.totalMarksFromCover),
      examDate: this.normalizeString(supplied.examDate)
    };

    const isComplete = resolved.courseCode !== null
      && resolved.totalMarksFromCover !== null
      && resolved.examDate !== null;

    if (!parseCoverPage || isComplete || coverText.trim().length === 0) {
      return resolved;
    }

    const parsed = CoverPageParser.parse(coverText);
    return {
      courseCode: resolved.courseCode ?? parsed.courseCode,
      totalMarksFromCover: resolved.totalMarksFromCover ?? parsed.totalMarksFromCover,
      examDate: resolved.examDate ?? parsed.examDate
    };
  }
}
