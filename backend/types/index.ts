/**
 * Core type definitions for the exam question parsing service
 */

// Input contract (from the text extraction collaborator)
export interface CoverMetadata {
  courseCode?: string | null;
  totalMarksFromCover?: number | string | null;
  examDate?: string | null;
}

export interface ExamDocument {
  examId?: string;
  filename?: string;
  courseCode?: string | null;
  pages: string[];
  coverMetadata?: CoverMetadata | null;
}

export interface ResolvedCoverMetadata {
  courseCode: string | null;
  totalMarksFromCover: number | null;
  examDate: string | null;
}

// Question types
export const QUESTION_TYPES = [
  'multiple_choice',
  'true_false',
  'numerical',
  'essay',
  'short_answer',
  'sub_question',
  'other'
] as const;

export type QuestionType = typeof QUESTION_TYPES[number];

export type QualityFlag =
  | 'possible_ocr_noise'
  | 'too_short'
  | 'low_confidence_marks'
  | 'marks_not_found'
  | 'marks_exceed_total'
  | 'orphaned_sub_question';

export type ExamReviewFlag =
  | 'extraction_unavailable'
  | 'segmentation_fallback'
  | 'marks_sanity_violation'
  | 'cover_total_rejected'
  | 'processing_failed';

// Segmentation
export interface QuestionSpan {
  index: number;              // position in the arena
  questionNumber: number;
  marker: string | null;      // "7.", "(ii)", "Question 3"; null for the synthetic fallback
  body: string;               // raw text after the marker
  flags: QualityFlag[];
}

export interface SegmentationResult {
  spans: QuestionSpan[];
  preamble: string;
  usedFallback: boolean;
}

// Linking
export interface LinkedSpan extends QuestionSpan {
  isSubQuestion: boolean;
  parentQuestionNumber: number | null;
}

// Classification
export interface ClassifiedSpan extends LinkedSpan {
  questionType: QuestionType;
  options: string[];
}

// Marks
export type MarksPatternName =
  | 'parenthesized'
  | 'bracketed'
  | 'suffixed'
  | 'phrase'
  | 'bare_parenthetical';

export interface MarksMatch {
  marks: number;
  pattern: MarksPatternName;
  lowConfidence: boolean;
}

export type MarksSource = 'cover_page' | 'calculated_sum';

export interface QuestionRecord {
  questionNumber: number;
  marker: string | null;
  text: string;
  questionType: QuestionType;
  marks: number | null;
  difficultyScore: number | null;
  isSubQuestion: boolean;
  parentQuestionNumber: number | null;
  topics: string[];
  options: string[];
  qualityFlags: QualityFlag[];
}

export interface TotalMarksResolution {
  totalMarks: number | null;
  marksSource: MarksSource | null;
  reviewFlags: ExamReviewFlag[];
  rejectedTotal: number | null;
}

export interface MarksExtractionResult {
  questions: QuestionRecord[];
  total: TotalMarksResolution;
  questionsWithMarks: number;
  questionsWithScores: number;
}

// Cleaning
export interface CleaningReport {
  totalProcessed: number;
  removedDuplicate: number;
  removedTooShort: number;
  removedInvalid: number;
  finalCount: number;
  totalRemoved: number;
  retentionRate: string;      // "87.5%"
}

// Duplicates and invalid questions are counted in the report, not raised as issues
export type RemovalReason = 'duplicate' | 'too_short' | 'invalid';

export interface RemovedQuestion {
  questionNumber: number;
  reason: RemovalReason;
  duplicateOf?: number;
  similarity?: number;
}

export interface CleaningResult {
  questions: QuestionRecord[];
  report: CleaningReport;
  removed: RemovedQuestion[];
}

// Errors / issues
export type ParsingIssueCode =
  | 'EXTRACTION_UNAVAILABLE'
  | 'SEGMENTATION_AMBIGUOUS'
  | 'MARKS_NOT_FOUND'
  | 'MARKS_SANITY_VIOLATION'
  | 'PROCESSING_FAILED';

export interface ParsingIssue {
  code: ParsingIssueCode;
  message: string;
  questionNumber?: number;
}

export interface ExamStats {
  typeCounts: Partial<Record<QuestionType, number>>;
  subQuestions: number;
  mainQuestions: number;
  questionsWithMarks: number;
  questionsWithScores: number;
}

export interface ExamParsingResult {
  examId: string;
  filename: string | null;
  courseCode: string | null;
  examDate: string | null;
  totalMarks: number | null;
  marksSource: MarksSource | null;
  questions: QuestionRecord[];
  cleaningReport: CleaningReport;
  reviewFlags: ExamReviewFlag[];
  issues: ParsingIssue[];
  stats: ExamStats;
}

export interface BatchParsingResult {
  runId: string;
  results: ExamParsingResult[];
  totals: {
    examsProcessed: number;
    examsFailed: number;
    totalQuestions: number;
  };
}

// Output contract (persisted, snake_case field names)
export interface QuestionRecordDocument {
  question_number: number;
  marker: string | null;
  text: string;
  question_type: QuestionType;
  marks: number | null;
  difficulty_score: number | null;
  is_sub_question: boolean;
  parent_question_number: number | null;
  topics: string[];
  options: string[];
  extraction_quality_flags: QualityFlag[];
}

export interface CleaningReportDocument {
  total_processed: number;
  removed_duplicate: number;
  removed_too_short: number;
  removed_invalid: number;
  final_count: number;
  total_removed: number;
  retention_rate: string;
}

export interface ExamResultDocument {
  exam_id: string;
  filename: string | null;
  course_code: string | null;
  exam_date: string | null;
  total_marks: number | null;
  marks_source: MarksSource | null;
  question_count: number;
  questions: QuestionRecordDocument[];
  cleaning_report: CleaningReportDocument;
  review_flags: ExamReviewFlag[];
  issues: ParsingIssue[];
  run_id: string | null;
  processed_at: string;
}
