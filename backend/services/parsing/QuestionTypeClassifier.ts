/**
 * Question Type Classifier
 *
 * Deterministic, ordered (predicate, tag) rule list. The first rule whose
 * predicate holds decides the type; nothing matching falls through to 'other'.
 */

import type { ClassifiedSpan, LinkedSpan, QualityFlag, QuestionType } from '../../types/index.js';
import type { ParsingConfig } from '../../config/parsingConfig.js';
import {
  OPTION_MARKER_PATTERN,
  TRUE_FALSE_PATTERNS,
  CALCULATION_CUES,
  ESSAY_VERBS,
  containsMultipleChoicePhrase
} from '../../config/questionPatterns.js';
import { collapseWhitespace, letterRatio, numericRatio, tokenize } from '../../utils/TextNormalizationUtils.js';

export type ClassifierSettings = Pick<ParsingConfig, 'essayMinLength' | 'shortAnswerMinLength' | 'shortAnswerMaxLength'>;

export interface ClassificationContext {
  text: string;          // whitespace-collapsed body
  length: number;
  settings: ClassifierSettings;
}

export interface ClassificationRule {
  type: Exclude<QuestionType, 'sub_question'>;
  description: string;
  matches: (context: ClassificationContext) => boolean;
}

// Shorter text cannot be told apart from OCR debris
const MIN_CLASSIFIABLE_LENGTH = 4;
const GARBLED_LETTER_RATIO = 0.3;
const NUMERIC_DOMINANCE_RATIO = 0.5;

/**
 * Number of option labels forming an a, b, c... run in reading order
 */
export function countSequentialOptions(text: string): number {
  const first = 'a'.charCodeAt(0);
  let expected = first;
  let run = 0;
  let longest = 0;

  for (const match of text.matchAll(OPTION_MARKER_PATTERN)) {
    const code = match[1].toLowerCase().charCodeAt(0);
    if (code === expected) {
      run++;
      expected++;
    } else if (code === first) {
      run = 1;
      expected = first + 1;
    }
    longest = Math.max(longest, run);
  }

  return longest;
}

function hasEssayCue(text: string): boolean {
  return ESSAY_VERBS.some(pattern => pattern.test(text));
}

export const CLASSIFICATION_RULES: ReadonlyArray<ClassificationRule> = [
  {
    type: 'multiple_choice',
    description: 'two or more sequential option labels, or an explicit multiple-choice phrase',
    matches: ({ text }) => countSequentialOptions(text) >= 2 || containsMultipleChoicePhrase(text)
  },
  {
    type: 'true_false',
    description: 'explicit True / False option pair',
    matches: ({ text }) =>
      TRUE_FALSE_PATTERNS.some(pattern => pattern.test(text))
      || (/\bTrue\b/.test(text) && /\bFalse\b/.test(text))
  },
  {
    type: 'numerical',
    description: 'dominated by digits and operators, or a calculation cue without essay cues',
    matches: ({ text, length }) =>
      (length >= MIN_CLASSIFIABLE_LENGTH && numericRatio(text) >= NUMERIC_DOMINANCE_RATIO)
      || (CALCULATION_CUES.some(pattern => pattern.test(text)) && !hasEssayCue(text))
  },
  {
    type: 'essay',
    description: 'analytical verb and longer than the essay threshold',
    matches: ({ text, length, settings }) => hasEssayCue(text) && length > settings.essayMinLength
  },
  {
    type: 'short_answer',
    description: 'moderate-length readable text',
    matches: ({ text, length, settings }) =>
      length >= settings.shortAnswerMinLength
      && length <= settings.shortAnswerMaxLength
      && tokenize(text).length >= 2
      && letterRatio(text) >= GARBLED_LETTER_RATIO
  }
];

export class QuestionTypeClassifier {

  /**
   * Classify free text. Never throws; anything unmatched is 'other'.
   */
  static classifyText(rawText: string, settings: ClassifierSettings): Exclude<QuestionType, 'sub_question'> {
    const text = collapseWhitespace(rawText);
    const context: ClassificationContext = { text, length: text.length, settings };

    for (const rule of CLASSIFICATION_RULES) {
      if (rule.matches(context)) {
        return rule.type;
      }
    }
    return 'other';
  }

  /**
   * Option texts following sequential labels: "Capital? (a) Paris (b) Rome" → ["Paris", "Rome"]
   */
  static extractOptions(rawText: string): string[] {
    const text = collapseWhitespace(rawText);
    const matches = Array.from(text.matchAll(OPTION_MARKER_PATTERN));
    if (countSequentialOptions(text) < 2) return [];

    const options: string[] = [];
    matches.forEach((match, position) => {
      if (match.index === undefined) return;
      const start = match.index + match[0].length;
      const next = matches[position + 1];
      const end = next?.index ?? text.length;
      const option = text.slice(start, end).trim();
      if (option.length > 0) {
        options.push(option);
      }
    });
    return options;
  }

  /**
   * Quality flags that depend only on the text shape
   */
  static qualityFlagsFor(rawText: string): QualityFlag[] {
    const text = collapseWhitespace(rawText);
    const flags: QualityFlag[] = [];
    if (text.length < MIN_CLASSIFIABLE_LENGTH * 2) {
      flags.push('too_short');
    }
    if (text.length > 0 && letterRatio(text) < GARBLED_LETTER_RATIO && numericRatio(text) < NUMERIC_DOMINANCE_RATIO) {
      flags.push('possible_ocr_noise');
    }
    return flags;
  }

  /**
   * Classify linked spans. Sub-questions keep the 'sub_question' tag.
   */
  static classify(spans: readonly LinkedSpan[], settings: ClassifierSettings): ClassifiedSpan[] {
    return spans.map((span): ClassifiedSpan => {
      const flags = [...span.flags];
      for (const flag of this.qualityFlagsFor(span.body)) {
        if (!flags.includes(flag)) flags.push(flag);
      }

      if (span.isSubQuestion) {
        return { ...span, flags, questionType: 'sub_question', options: [] };
      }

      const questionType = this.classifyText(span.body, settings);
      return {
        ...span,
        flags,
        questionType,
        options: questionType === 'multiple_choice' ? this.extractOptions(span.body) : []
      };
    });
  }
}
