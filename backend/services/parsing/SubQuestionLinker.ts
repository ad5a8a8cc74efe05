/**
 * Sub-Question Linker
 *
 * Second pass over the segmenter's span arena. A span whose marker is a letter
 * or lowercase roman numeral becomes a sub-question of the nearest preceding
 * span with a main marker. Without such a span the marker is ignored.
 */

import type { ClassifiedSpan, LinkedSpan, QuestionRecord, QuestionSpan } from '../../types/index.js';
import { MAIN_MARKER_PATTERN, ROMAN_MAIN_MARKER_PATTERN, SUB_MARKER_PATTERN } from '../../config/questionPatterns.js';

export interface SubQuestionStats {
  totalQuestions: number;
  subQuestions: number;
  mainQuestions: number;
  subQuestionPercentage: number;
}

export class SubQuestionLinker {

  static isMainQuestionMarker(marker: string | null): boolean {
    return marker !== null && (MAIN_MARKER_PATTERN.test(marker) || ROMAN_MAIN_MARKER_PATTERN.test(marker));
  }

  static isSubQuestionMarker(marker: string | null): boolean {
    return marker !== null && !this.isMainQuestionMarker(marker) && SUB_MARKER_PATTERN.test(marker);
  }

  /**
   * Annotate spans with parent links. Returns new objects; the arena is untouched.
   */
  static link(spans: readonly QuestionSpan[]): LinkedSpan[] {
    let nearestMainIndex: number | null = null;

    return spans.map((span, position): LinkedSpan => {
      if (this.isMainQuestionMarker(span.marker)) {
        nearestMainIndex = position;
        return { ...span, flags: [...span.flags], isSubQuestion: false, parentQuestionNumber: null };
      }

      if (this.isSubQuestionMarker(span.marker) && nearestMainIndex !== null) {
        const parent = spans[nearestMainIndex];
        return {
          ...span,
          flags: [...span.flags],
          isSubQuestion: true,
          parentQuestionNumber: parent.questionNumber
        };
      }

      return { ...span, flags: [...span.flags], isSubQuestion: false, parentQuestionNumber: null };
    });
  }

  /**
   * After cleaning, a sub-question whose parent was removed becomes a normal
   * question. `reclassify` supplies the type it would have had as a main question.
   */
  static repairOrphans(
    questions: readonly QuestionRecord[],
    reclassify: (question: QuestionRecord) => Pick<ClassifiedSpan, 'questionType' | 'options'>
  ): QuestionRecord[] {
    const mainNumbers = new Set<number>();

    return questions.map(question => {
      if (!question.isSubQuestion) {
        mainNumbers.add(question.questionNumber);
        return question;
      }

      if (question.parentQuestionNumber !== null && mainNumbers.has(question.parentQuestionNumber)) {
        return question;
      }

      const demoted: QuestionRecord = {
        ...question,
        isSubQuestion: false,
        parentQuestionNumber: null,
        qualityFlags: question.qualityFlags.includes('orphaned_sub_question')
          ? [...question.qualityFlags]
          : [...question.qualityFlags, 'orphaned_sub_question']
      };
      const { questionType, options } = reclassify(demoted);
      return { ...demoted, questionType, options };
    });
  }

  static getStats(questions: ReadonlyArray<{ isSubQuestion: boolean }>): SubQuestionStats {
    const subQuestions = questions.filter(question => question.isSubQuestion).length;
    const totalQuestions = questions.length;

    return {
      totalQuestions,
      subQuestions,
      mainQuestions: totalQuestions - subQuestions,
      subQuestionPercentage: totalQuestions > 0 ? (subQuestions / totalQuestions) * 100 : 0
    };
  }
}
