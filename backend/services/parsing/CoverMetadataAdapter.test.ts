import { CoverMetadataAdapter, CoverPageParser } from './CoverMetadataAdapter';
import type { ExamDocument } from '../../types/index';

describe('CoverPageParser', () => {
  it('should extract and compact course codes', () => {
    expect(CoverPageParser.extractCourseCode('Course Code: econ 310')).toBe('ECON310');
    expect(CoverPageParser.extractCourseCode('ECON 310 Final Examination\nFall 2023')).toBe('ECON310');
  });

  it('should not mistake a term and year for a course code', () => {
    expect(CoverPageParser.extractCourseCode('FALL 2023')).toBeNull();
  });

  it('should extract the declared total marks', () => {
    expect(CoverPageParser.extractTotalMarks('Total marks: 80')).toBe(80);
    expect(CoverPageParser.extractTotalMarks('This paper has 100 marks total')).toBe(100);
    expect(CoverPageParser.extractTotalMarks('Answer every question')).toBeNull();
  });

  it('should extract dates in common formats', () => {
    expect(CoverPageParser.extractDate('Date: 12/04/2023')).toBe('12/04/2023');
    expect(CoverPageParser.extractDate('Held on 12 April 2023')).toBe('12 April 2023');
    expect(CoverPageParser.extractDate('April 12, 2023')).toBe('April 12, 2023');
    expect(CoverPageParser.extractDate('Final Exam, Fall 2023')).toBe('Fall 2023');
  });

  it('should return empty metadata for empty text', () => {
    expect(CoverPageParser.parse('')).toEqual({ courseCode: null, totalMarksFromCover: null, examDate: null });
  });
});

describe('CoverMetadataAdapter', () => {
  const coverText = 'ECON 310\nTotal marks: 80\n12 April 2023';

  it('should normalize supplied totals', () => {
    expect(CoverMetadataAdapter.normalizeTotal('50')).toBe(50);
    expect(CoverMetadataAdapter.normalizeTotal(12)).toBe(12);
    expect(CoverMetadataAdapter.normalizeTotal('abc')).toBeNull();
    expect(CoverMetadataAdapter.normalizeTotal(undefined)).toBeNull();
  });

  it('should prefer supplied values and fill gaps from the cover text', () => {
    const exam: ExamDocument = {
      pages: [],
      courseCode: ' MATH101 ',
      coverMetadata: { totalMarksFromCover: '50' }
    };

    expect(CoverMetadataAdapter.resolve(exam, coverText, true)).toEqual({
      courseCode: 'MATH101',
      totalMarksFromCover: 50,
      examDate: '12 April 2023'
    });
  });

  it('should read everything from the cover text when nothing is supplied', () => {
    expect(CoverMetadataAdapter.resolve({ pages: [] }, coverText, true)).toEqual({
      courseCode: 'ECON310',
      totalMarksFromCover: 80,
      examDate: '12 April 2023'
    });
  });

  it('should skip the cover text when cover parsing is disabled', () => {
    expect(CoverMetadataAdapter.resolve({ pages: [] }, coverText, false)).toEqual({
      courseCode: null,
      totalMarksFromCover: null,
      examDate: null
    });
  });
});
