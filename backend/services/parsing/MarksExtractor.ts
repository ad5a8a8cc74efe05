/**
 * Marks & Difficulty Extractor
 *
 * Reads a point value from each question's text, resolves the exam's total
 * marks and derives difficulty_score = marks / total_marks.
 */

import type {
  ClassifiedSpan,
  MarksExtractionResult,
  MarksMatch,
  MarksPatternName,
  QualityFlag,
  QuestionRecord,
  TotalMarksResolution
} from '../../types/index.js';
import type { MarksStrictness, ParsingConfig } from '../../config/parsingConfig.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';

interface MarksPattern {
  name: MarksPatternName;
  regex: RegExp;
  lowConfidence: boolean;
}

const UNIT = '(?:pts?|points?|marks?)';
const NUMBER = '(\\d+(?:\\.\\d+)?)';

/**
 * Tried in order; the first pattern yielding a positive value wins.
 */
export const MARKS_PATTERNS: ReadonlyArray<MarksPattern> = [
  { name: 'parenthesized', regex: new RegExp(`\\(\\s*${NUMBER}\\s*${UNIT}\\.?\\s*\\)`, 'i'), lowConfidence: false },     // (10pts) (10 marks)
  { name: 'bracketed', regex: new RegExp(`\\[\\s*${NUMBER}\\s*${UNIT}\\.?\\s*\\]`, 'i'), lowConfidence: false },        // [10 MARKS]
  { name: 'suffixed', regex: new RegExp(`\\b${NUMBER}\\s*${UNIT}\\b`, 'i'), lowConfidence: false },                       // 10pts. 10 points
  { name: 'phrase', regex: new RegExp(`\\b(?:worth|out\\s+of|carries)\\s+${NUMBER}\\b`, 'i'), lowConfidence: false },     // worth 10
  { name: 'bare_parenthetical', regex: new RegExp(`\\(\\s*${NUMBER}\\s*\\)`), lowConfidence: true }                      // (10)
];

export class MarksExtractor {

  /**
   * Extract the point value of one question, or null when no pattern matches.
   */
  static extractMarks(text: string, strictness: MarksStrictness = 'lenient'): MarksMatch | null {
    if (!text) return null;

    for (const pattern of MARKS_PATTERNS) {
      if (pattern.lowConfidence && strictness === 'strict') continue;

      const match = text.match(pattern.regex);
      if (!match) continue;

      const marks = parseFloat(match[1]);
      if (Number.isFinite(marks) && marks > 0) {
        return { marks, pattern: pattern.name, lowConfidence: pattern.lowConfidence };
      }
    }

    return null;
  }

  /**
   * Prefer a sane cover total; otherwise the sum of extracted marks.
   * A total above the bound is an extraction error and is discarded, never clamped.
   */
  static resolveTotalMarks(
    marks: ReadonlyArray<number | null>,
    coverTotal: number | null,
    bound: number
  ): TotalMarksResolution {
    const resolution: TotalMarksResolution = {
      totalMarks: null,
      marksSource: null,
      reviewFlags: [],
      rejectedTotal: null
    };

    if (coverTotal !== null) {
      if (coverTotal > 0 && coverTotal <= bound) {
        return { ...resolution, totalMarks: coverTotal, marksSource: 'cover_page' };
      }
      if (coverTotal > bound) {
        PipelineLogger.warn('MARKS', `Cover total marks (${coverTotal}) exceeds ${bound}, ignoring it`);
        resolution.reviewFlags.push('cover_total_rejected');
        resolution.rejectedTotal = coverTotal;
      }
    }

    const found = marks.filter((value): value is number => value !== null);
    const sum = found.reduce((total, value) => total + value, 0);

    if (found.length === 0 || sum === 0) {
      return resolution;
    }

    if (sum > bound) {
      PipelineLogger.warn('MARKS', `Total marks (${sum}) exceeds ${bound}, likely extraction error; setting total to null`);
      resolution.reviewFlags.push('marks_sanity_violation');
      resolution.rejectedTotal = sum;
      return resolution;
    }

    return { ...resolution, totalMarks: sum, marksSource: 'calculated_sum' };
  }

  /**
   * Difficulty score in [0, 1], or null when it cannot be computed honestly
   */
  static calculateDifficultyScore(marks: number | null, totalMarks: number | null): number | null {
    if (marks === null || totalMarks === null || totalMarks <= 0) return null;
    if (marks > totalMarks) return null;
    return marks / totalMarks;
  }

  /**
   * Turn classified spans into question records carrying marks and difficulty.
   */
  static apply(
    spans: readonly ClassifiedSpan[],
    coverTotal: number | null,
    config: Pick<ParsingConfig, 'totalMarksBound' | 'marksStrictness'>
  ): MarksExtractionResult {
    const matches = spans.map(span => this.extractMarks(span.body, config.marksStrictness));
    const total = this.resolveTotalMarks(matches.map(match => match?.marks ?? null), coverTotal, config.totalMarksBound);

    let questionsWithMarks = 0;
    let questionsWithScores = 0;

    const questions = spans.map((span, position): QuestionRecord => {
      const match = matches[position];
      const marks = match ? match.marks : null;
      const difficultyScore = this.calculateDifficultyScore(marks, total.totalMarks);
      const qualityFlags: QualityFlag[] = [...span.flags];

      if (match === null) {
        qualityFlags.push('marks_not_found');
      } else {
        questionsWithMarks++;
        if (match.lowConfidence) qualityFlags.push('low_confidence_marks');
        if (total.totalMarks !== null && match.marks > total.totalMarks) qualityFlags.push('marks_exceed_total');
      }
      if (difficultyScore !== null) questionsWithScores++;

      return {
        questionNumber: span.questionNumber,
        marker: span.marker,
        text: span.body,
        questionType: span.questionType,
        marks,
        difficultyScore,
        isSubQuestion: span.isSubQuestion,
        parentQuestionNumber: span.parentQuestionNumber,
        topics: [],
        options: [...span.options],
        qualityFlags
      };
    });

    return { questions, total, questionsWithMarks, questionsWithScores };
  }
}
