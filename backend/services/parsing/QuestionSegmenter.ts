/**
 * Question Segmenter
 *
 * Splits one exam's raw page text into an ordered arena of question spans.
 * Noise lines (headers, footers, page numbers) are left in place for the cleaner.
 */

import type { QuestionSpan, SegmentationResult } from '../../types/index.js';
import {
  MAIN_MARKER_PATTERN,
  ROMAN_MAIN_MARKER_PATTERN,
  SUB_MARKER_PATTERN,
  OPTION_LINE_PATTERN,
  INLINE_MAIN_MARKER_PATTERN,
  containsMultipleChoicePhrase,
  romanToInt
} from '../../config/questionPatterns.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';

export const PAGE_BREAK = '\f';

type SegmenterState = 'BeforeFirstQuestion' | 'InQuestionBody';

interface MarkerMatch {
  marker: string;
  printedNumber: number | null;   // null for sub markers
  rest: string;
}

interface OpenSpan {
  marker: string;
  printedNumber: number | null;
  lines: string[];
}

export class QuestionSegmenter {

  /**
   * Join ordered page texts with a form-feed line marking each page boundary
   */
  static joinPages(pages: readonly string[]): string {
    return pages.join(`\n${PAGE_BREAK}\n`);
  }

  static matchMainMarker(line: string): MarkerMatch | null {
    const match = line.match(MAIN_MARKER_PATTERN);
    if (match) {
      const digits = match[2] ?? match[3];
      return {
        marker: match[1].trim(),
        printedNumber: parseInt(digits, 10),
        rest: line.slice(match[0].length)
      };
    }

    const roman = line.match(ROMAN_MAIN_MARKER_PATTERN);
    if (!roman) return null;
    return {
      marker: roman[1],
      printedNumber: romanToInt(roman[2]),
      rest: line.slice(roman[0].length)
    };
  }

  static matchSubMarker(line: string): MarkerMatch | null {
    const match = line.match(SUB_MARKER_PATTERN);
    if (!match) return null;
    return {
      marker: match[1],
      printedNumber: null,
      rest: line.slice(match[0].length)
    };
  }

  /**
   * Split a marker line that carries further numbered markers: "1. Define GDP. 2. Explain inflation."
   * Only markers numbered above the previous one and followed by a capitalised word count.
   */
  static splitInlineMarkers(first: MarkerMatch): MarkerMatch[] {
    if (first.printedNumber === null) return [first];

    const pieces: MarkerMatch[] = [];
    let current = first;

    for (;;) {
      const currentNumber = current.printedNumber;
      const next = Array.from(current.rest.matchAll(INLINE_MAIN_MARKER_PATTERN)).find(candidate => {
        const value = parseInt(candidate[2] ?? candidate[3], 10);
        return currentNumber !== null && value > currentNumber;
      });

      if (!next || next.index === undefined) {
        pieces.push(current);
        return pieces;
      }

      pieces.push({ ...current, rest: current.rest.slice(0, next.index) });
      current = {
        marker: next[1].trim(),
        printedNumber: parseInt(next[2] ?? next[3], 10),
        rest: current.rest.slice(next.index + next[0].length)
      };
    }
  }

  /**
   * Segment an exam's pages into question spans.
   */
  static segment(pages: readonly string[]): SegmentationResult {
    const lines = this.joinPages(pages).split(/\r?\n/);
    const opened: OpenSpan[] = [];
    const preamble: string[] = [];
    let state: SegmenterState = 'BeforeFirstQuestion';

    for (const line of lines) {
      const current = opened.length > 0 ? opened[opened.length - 1] : null;
      const main = this.matchMainMarker(line);

      if (main) {
        for (const piece of this.splitInlineMarkers(main)) {
          opened.push({ marker: piece.marker, printedNumber: piece.printedNumber, lines: [piece.rest] });
        }
        state = 'InQuestionBody';
        continue;
      }

      const sub = this.matchSubMarker(line);
      const isOptionLine = current !== null
        && OPTION_LINE_PATTERN.test(line)
        && containsMultipleChoicePhrase(current.lines.join('\n'));

      if (sub && !isOptionLine) {
        opened.push({ marker: sub.marker, printedNumber: null, lines: [sub.rest] });
        state = 'InQuestionBody';
        continue;
      }

      if (state === 'BeforeFirstQuestion' || current === null) {
        preamble.push(line);
      } else {
        current.lines.push(line);
      }
    }

    if (opened.length === 0) {
      return this.fallback(lines);
    }

    const spans: QuestionSpan[] = [];
    let lastNumber = 0;

    opened.forEach((open, index) => {
      const questionNumber = open.printedNumber !== null && open.printedNumber > lastNumber
        ? open.printedNumber
        : lastNumber + 1;
      lastNumber = questionNumber;

      spans.push({
        index,
        questionNumber,
        marker: open.marker,
        body: open.lines.join('\n').trim(),
        flags: []
      });
    });

    PipelineLogger.debug('SEGMENTER', `Found ${spans.length} spans`, spans.map(span => span.marker));

    return {
      spans,
      preamble: preamble.join('\n').trim(),
      usedFallback: false
    };
  }

  /**
   * No marker anywhere: the whole text becomes one synthetic question
   */
  private static fallback(lines: string[]): SegmentationResult {
    const body = lines.join('\n').trim();
    const hasContent = body.replace(/\f/g, '').trim().length > 0;

    if (!hasContent) {
      return { spans: [], preamble: '', usedFallback: false };
    }

    PipelineLogger.debug('SEGMENTER', 'No question markers found, using whole text as one question');

    return {
      spans: [{
        index: 0,
        questionNumber: 1,
        marker: null,
        body,
        flags: ['possible_ocr_noise']
      }],
      preamble: '',
      usedFallback: true
    };
  }
}
