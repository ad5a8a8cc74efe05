/**
 * Exam Parsing Pipeline
 *
 * Runs one exam through segmentation, linking, classification, marks
 * extraction and cleaning. Every stage returns a new structure. No exception
 * leaves processExam: failures become flags and issues on the result.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  BatchParsingResult,
  ExamDocument,
  ExamParsingResult,
  ExamReviewFlag,
  ExamStats,
  ParsingIssue,
  QuestionRecord,
  QuestionType
} from '../../types/index.js';
import { DEFAULT_PARSING_CONFIG, type ParsingConfig } from '../../config/parsingConfig.js';
import { QuestionSegmenter } from './QuestionSegmenter.js';
import { SubQuestionLinker } from './SubQuestionLinker.js';
import { QuestionTypeClassifier } from './QuestionTypeClassifier.js';
import { MarksExtractor } from './MarksExtractor.js';
import { QuestionCleaner } from './QuestionCleaner.js';
import { CoverMetadataAdapter } from './CoverMetadataAdapter.js';
import { generateExamId } from '../../utils/contentHash.js';
import { ErrorHandler } from '../../utils/errorHandler.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';

export class ExamParsingPipeline {
  private readonly config: ParsingConfig;

  constructor(config: ParsingConfig = DEFAULT_PARSING_CONFIG) {
    this.config = config;
  }

  /**
   * Parse a single exam. Never throws.
   */
  processExam(exam: ExamDocument): ExamParsingResult {
    let examId = typeof exam.examId === 'string' && exam.examId.length > 0 ? exam.examId : null;

    try {
      const pages = Array.isArray(exam.pages) ? exam.pages.filter((page): page is string => typeof page === 'string') : [];
      examId = examId ?? generateExamId(exam.courseCode ?? null, pages);
      return this.runStages(exam, pages, examId);
    } catch (error) {
      const failedId = examId ?? `exam-failed-${uuidv4()}`;
      PipelineLogger.error('PARSING', `Exam ${failedId} failed`, error);
      const result = this.emptyResult(exam, failedId, ['processing_failed']);
      result.issues.push(ErrorHandler.toIssue('PROCESSING_FAILED', ErrorHandler.analyzeError(error).message));
      return result;
    }
  }

  /**
   * Parse many independent exams; one failing exam never affects the others.
   */
  processExams(exams: readonly ExamDocument[]): BatchParsingResult {
    const runId = uuidv4();
    const results = exams.map(exam => this.processExam(exam));

    const totals = {
      examsProcessed: results.length,
      examsFailed: results.filter(result => result.reviewFlags.includes('processing_failed')).length,
      totalQuestions: results.reduce((total, result) => total + result.questions.length, 0)
    };

    PipelineLogger.info('PARSING', `Run ${runId}: ${totals.examsProcessed} exams, ${totals.totalQuestions} questions, ${totals.examsFailed} failed`);

    return { runId, results, totals };
  }

  private runStages(exam: ExamDocument, pages: string[], examId: string): ExamParsingResult {
    const hasText = pages.some(page => page.trim().length > 0);

    if (!hasText) {
      PipelineLogger.warn('PARSING', `Exam ${examId}: no text supplied`);
      const result = this.emptyResult(exam, examId, ['extraction_unavailable']);
      result.issues.push(ErrorHandler.toIssue('EXTRACTION_UNAVAILABLE', 'No text was supplied for this exam'));
      return result;
    }

    const issues: ParsingIssue[] = [];
    const reviewFlags: ExamReviewFlag[] = [];

    // 1. Segment
    const segmentation = QuestionSegmenter.segment(pages);
    if (segmentation.usedFallback) {
      reviewFlags.push('segmentation_fallback');
      issues.push(ErrorHandler.toIssue('SEGMENTATION_AMBIGUOUS', 'No question markers found; the whole text was kept as one question', 1));
    }

    const cover = CoverMetadataAdapter.resolve(exam, segmentation.preamble, this.config.parseCoverPage);

    // 2. Link sub-questions, 3. classify
    const linked = SubQuestionLinker.link(segmentation.spans);
    const classified = QuestionTypeClassifier.classify(linked, this.config);

    // 4. Marks and difficulty
    const marks = MarksExtractor.apply(classified, cover.totalMarksFromCover, this.config);
    reviewFlags.push(...marks.total.reviewFlags);
    if (marks.total.rejectedTotal !== null) {
      issues.push(ErrorHandler.toIssue(
        'MARKS_SANITY_VIOLATION',
        `Total marks ${marks.total.rejectedTotal} exceeds the bound of ${this.config.totalMarksBound}`
      ));
    }
    for (const question of marks.questions) {
      if (question.marks === null) {
        issues.push(ErrorHandler.toIssue('MARKS_NOT_FOUND', 'No marks pattern matched', question.questionNumber));
      }
    }

    // 5. Clean, then demote sub-questions whose parent did not survive
    const cleaning = QuestionCleaner.clean(marks.questions, this.config);
    const questions = SubQuestionLinker.repairOrphans(cleaning.questions, question => {
      const questionType = QuestionTypeClassifier.classifyText(question.text, this.config);
      return {
        questionType,
        options: questionType === 'multiple_choice' ? QuestionTypeClassifier.extractOptions(question.text) : []
      };
    });

    PipelineLogger.info(
      'PARSING',
      `Exam ${examId}: ${questions.length} questions (total marks: ${marks.total.totalMarks ?? 'not found'})`
    );

    return {
      examId,
      filename: exam.filename ?? null,
      courseCode: cover.courseCode,
      examDate: cover.examDate,
      totalMarks: marks.total.totalMarks,
      marksSource: marks.total.marksSource,
      questions,
      cleaningReport: cleaning.report,
      reviewFlags,
      issues,
      stats: ExamParsingPipeline.computeStats(questions)
    };
  }

  static computeStats(questions: readonly QuestionRecord[]): ExamStats {
    const typeCounts: Partial<Record<QuestionType, number>> = {};
    for (const question of questions) {
      typeCounts[question.questionType] = (typeCounts[question.questionType] ?? 0) + 1;
    }
    const subStats = SubQuestionLinker.getStats(questions);

    return {
      typeCounts,
      subQuestions: subStats.subQuestions,
      mainQuestions: subStats.mainQuestions,
      questionsWithMarks: questions.filter(question => question.marks !== null).length,
      questionsWithScores: questions.filter(question => question.difficultyScore !== null).length
    };
  }

  private emptyResult(exam: ExamDocument, examId: string, reviewFlags: ExamReviewFlag[]): ExamParsingResult {
    return {
      examId,
      filename: typeof exam.filename === 'string' ? exam.filename : null,
      courseCode: typeof exam.courseCode === 'string' ? CoverMetadataAdapter.normalizeString(exam.courseCode) : null,
      examDate: null,
      totalMarks: null,
      marksSource: null,
      questions: [],
      cleaningReport: QuestionCleaner.buildReport(0, []),
      reviewFlags,
      issues: [],
      stats: ExamParsingPipeline.computeStats([])
    };
  }
}
