/**
 * Converts pipeline results into the persisted snake_case documents
 */

import type {
  CleaningReport,
  CleaningReportDocument,
  ExamParsingResult,
  ExamResultDocument,
  QuestionRecord,
  QuestionRecordDocument
} from '../../types/index.js';

export function toQuestionRecordDocument(question: QuestionRecord): QuestionRecordDocument {
  return {
    question_number: question.questionNumber,
    marker: question.marker,
    text: question.text,
    question_type: question.questionType,
    marks: question.marks,
    difficulty_score: question.difficultyScore,
    is_sub_question: question.isSubQuestion,
    parent_question_number: question.parentQuestionNumber,
    topics: [...question.topics],
    options: [...question.options],
    extraction_quality_flags: [...question.qualityFlags]
  };
}

export function toCleaningReportDocument(report: CleaningReport): CleaningReportDocument {
  return {
    total_processed: report.totalProcessed,
    removed_duplicate: report.removedDuplicate,
    removed_too_short: report.removedTooShort,
    removed_invalid: report.removedInvalid,
    final_count: report.finalCount,
    total_removed: report.totalRemoved,
    retention_rate: report.retentionRate
  };
}

export function serializeExamResult(
  result: ExamParsingResult,
  runId: string | null = null,
  processedAt: Date = new Date()
): ExamResultDocument {
  return {
    exam_id: result.examId,
    filename: result.filename,
    course_code: result.courseCode,
    exam_date: result.examDate,
    total_marks: result.totalMarks,
    marks_source: result.marksSource,
    question_count: result.questions.length,
    questions: result.questions.map(toQuestionRecordDocument),
    cleaning_report: toCleaningReportDocument(result.cleaningReport),
    review_flags: [...result.reviewFlags],
    issues: result.issues.map(issue => ({ ...issue })),
    run_id: runId,
    processed_at: processedAt.toISOString()
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shape check for documents read back from a store
 */
export function isExamResultDocument(value: unknown): value is ExamResultDocument {
  if (!isRecord(value)) return false;
  return typeof value['exam_id'] === 'string'
    && typeof value['question_count'] === 'number'
    && Array.isArray(value['questions'])
    && isRecord(value['cleaning_report'])
    && Array.isArray(value['review_flags'])
    && Array.isArray(value['issues'])
    && typeof value['processed_at'] === 'string';
}
