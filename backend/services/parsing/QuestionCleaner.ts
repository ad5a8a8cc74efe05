/**
 * Quality & Dedup Cleaner
 *
 * Normalizes question text, strips noise lines, drops invalid records and
 * near-duplicates, and reports what was removed. Running it on its own output
 * removes nothing further.
 */

import type {
  CleaningReport,
  CleaningResult,
  QuestionRecord,
  RemovalReason,
  RemovedQuestion
} from '../../types/index.js';
import type { ParsingConfig } from '../../config/parsingConfig.js';
import { SimilarityService } from './SimilarityService.js';
import { generateQuestionHash } from '../../utils/contentHash.js';
import {
  collapseWhitespace,
  joinHyphenatedLineBreaks,
  repairEncodingArtifacts
} from '../../utils/TextNormalizationUtils.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';

export type CleanerConfig = Pick<
  ParsingConfig,
  'noisePatterns' | 'minQuestionLength' | 'minSubQuestionLength' | 'similarityThreshold' | 'similarityMethod'
>;

// Text that is clearly not a question
const NON_QUESTION_PATTERNS: ReadonlyArray<RegExp> = [
  /^page \d+$/i,
  /^answer key\b/i,
  /^table of contents\b/i,
  /^instructions:/i,
  /^exam duration:/i,
  /^total marks:/i
];

// Marker tokens such as "(a)", "ii.", "3)" that carry no content
const MARKER_TOKENS = /\(?\b(?:[a-z]|[ivx]+|\d{1,3})[.)]/gi;

export class QuestionCleaner {

  static isNoiseLine(line: string, noisePatterns: ReadonlyArray<RegExp>): boolean {
    const trimmed = line.trim();
    if (trimmed.length === 0) return false;
    return noisePatterns.some(pattern => pattern.test(trimmed));
  }

  /**
   * Repair encoding artifacts, drop noise lines and collapse whitespace.
   *
   * @example
   * normalizeText("Define GDP\nPage 2 of 9\nin one sentence.", patterns)
   * // "Define GDP in one sentence."
   */
  static normalizeText(text: string, noisePatterns: ReadonlyArray<RegExp>): string {
    const repaired = joinHyphenatedLineBreaks(repairEncodingArtifacts(text));
    const kept = repaired
      .split('\n')
      .filter(line => !this.isNoiseLine(line, noisePatterns));
    const collapsed = collapseWhitespace(kept.join('\n'));

    // The joined text is a single line from now on; it must pass the same check
    return this.isNoiseLine(collapsed, noisePatterns) ? '' : collapsed;
  }

  /**
   * Reason a record must be removed, or null when it is valid
   */
  static validate(question: QuestionRecord, config: CleanerConfig): Exclude<RemovalReason, 'duplicate'> | null {
    const text = question.text;
    // A demoted orphan keeps the rule it was admitted under
    const admittedAsSub = question.isSubQuestion || question.qualityFlags.includes('orphaned_sub_question');
    const minLength = admittedAsSub ? config.minSubQuestionLength : config.minQuestionLength;

    if (text.trim().length < minLength) {
      return 'too_short';
    }

    const residue = text.replace(MARKER_TOKENS, '').replace(/[^A-Za-z0-9]/g, '');
    if (residue.length === 0) {
      return 'invalid';
    }

    if (NON_QUESTION_PATTERNS.some(pattern => pattern.test(text.trim()))) {
      return 'invalid';
    }

    return null;
  }

  static buildReport(totalProcessed: number, removed: readonly RemovedQuestion[]): CleaningReport {
    const count = (reason: RemovalReason) => removed.filter(entry => entry.reason === reason).length;
    const removedDuplicate = count('duplicate');
    const removedTooShort = count('too_short');
    const removedInvalid = count('invalid');
    const totalRemoved = removedDuplicate + removedTooShort + removedInvalid;
    const finalCount = totalProcessed - totalRemoved;
    const retention = totalProcessed > 0 ? (finalCount / totalProcessed) * 100 : 0;

    return {
      totalProcessed,
      removedDuplicate,
      removedTooShort,
      removedInvalid,
      finalCount,
      totalRemoved,
      retentionRate: `${retention.toFixed(1)}%`
    };
  }

  /**
   * A main record that only heads its parts ("Question 1" then "(a)", "(b)")
   * is kept while a valid sub-question links to it.
   */
  static isStructuralParent(question: QuestionRecord, parentNumbers: ReadonlySet<number>): boolean {
    return !question.isSubQuestion
      && parentNumbers.has(question.questionNumber)
      && !NON_QUESTION_PATTERNS.some(pattern => pattern.test(question.text.trim()));
  }

  private static collectParentNumbers(questions: readonly QuestionRecord[]): Set<number> {
    const numbers = new Set<number>();
    for (const question of questions) {
      if (question.isSubQuestion && question.parentQuestionNumber !== null) {
        numbers.add(question.parentQuestionNumber);
      }
    }
    return numbers;
  }

  /**
   * Clean one exam's questions. Input records are not modified.
   */
  static clean(questions: readonly QuestionRecord[], config: CleanerConfig): CleaningResult {
    const removed: RemovedQuestion[] = [];
    const valid: QuestionRecord[] = [];

    // Step 1: normalize and validate
    const checked = questions.map(question => {
      const cleaned: QuestionRecord = {
        ...question,
        text: this.normalizeText(question.text, config.noisePatterns),
        options: question.options.map(option => this.normalizeText(option, config.noisePatterns)).filter(option => option.length > 0),
        topics: [...question.topics],
        qualityFlags: [...question.qualityFlags]
      };
      return { question: cleaned, reason: this.validate(cleaned, config) };
    });

    const parentNumbers = this.collectParentNumbers(
      checked.filter(entry => entry.reason === null).map(entry => entry.question)
    );
    // Headings kept only for their parts, with the reason they would otherwise be removed
    const structural = new Map<number, Exclude<RemovalReason, 'duplicate'>>();

    for (const { question, reason } of checked) {
      if (reason && this.isStructuralParent(question, parentNumbers)) {
        structural.set(question.questionNumber, reason);
      } else if (reason) {
        removed.push({ questionNumber: question.questionNumber, reason });
        continue;
      }
      valid.push(question);
    }

    // Step 2: exact duplicates, then near-duplicates; the first occurrence always survives
    const unique: QuestionRecord[] = [];
    const comparable: QuestionRecord[] = [];
    const seenHashes = new Map<string, number>();

    for (const question of valid) {
      if (structural.has(question.questionNumber)) {
        unique.push(question);
        continue;
      }

      const hash = generateQuestionHash(question.text);
      const exactOf = seenHashes.get(hash);
      if (exactOf !== undefined) {
        removed.push({ questionNumber: question.questionNumber, reason: 'duplicate', duplicateOf: exactOf, similarity: 1 });
        continue;
      }

      const near = this.findNearDuplicate(question, comparable, config);
      if (near) {
        removed.push({ questionNumber: question.questionNumber, reason: 'duplicate', duplicateOf: near.questionNumber, similarity: near.similarity });
        continue;
      }

      seenHashes.set(hash, question.questionNumber);
      unique.push(question);
      comparable.push(question);
    }

    // Step 3: a heading whose parts were all dropped as duplicates goes too
    const survivingParents = this.collectParentNumbers(unique);
    const kept = unique.filter(question => {
      const reason = structural.get(question.questionNumber);
      if (reason === undefined || survivingParents.has(question.questionNumber)) return true;
      removed.push({ questionNumber: question.questionNumber, reason });
      return false;
    });

    const report = this.buildReport(questions.length, removed);
    PipelineLogger.debug('CLEANER', 'Cleaning report', report);

    return {
      questions: kept,
      report,
      removed: removed.sort((a, b) => a.questionNumber - b.questionNumber)
    };
  }

  private static findNearDuplicate(
    question: QuestionRecord,
    kept: readonly QuestionRecord[],
    config: CleanerConfig
  ): { questionNumber: number; similarity: number } | null {
    for (const existing of kept) {
      const similarity = SimilarityService.calculateSimilarity(question.text, existing.text, config.similarityMethod);
      if (similarity >= config.similarityThreshold) {
        return { questionNumber: existing.questionNumber, similarity };
      }
    }
    return null;
  }
}
