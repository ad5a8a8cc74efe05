import { SubQuestionLinker } from './SubQuestionLinker';
import type { QuestionRecord, QuestionSpan } from '../../types/index';

function makeSpan(index: number, questionNumber: number, marker: string | null): QuestionSpan {
  return { index, questionNumber, marker, body: `Body of ${questionNumber}`, flags: [] };
}

function makeRecord(questionNumber: number, overrides: Partial<QuestionRecord> = {}): QuestionRecord {
  return {
    questionNumber,
    marker: `${questionNumber}.`,
    text: `Question text ${questionNumber}`,
    questionType: 'short_answer',
    marks: null,
    difficultyScore: null,
    isSubQuestion: false,
    parentQuestionNumber: null,
    topics: [],
    options: [],
    qualityFlags: [],
    ...overrides
  };
}

describe('SubQuestionLinker', () => {
  it('should tell main markers from sub markers', () => {
    expect(SubQuestionLinker.isMainQuestionMarker('3.')).toBe(true);
    expect(SubQuestionLinker.isMainQuestionMarker('Question 3:')).toBe(true);
    expect(SubQuestionLinker.isSubQuestionMarker('(a)')).toBe(true);
    expect(SubQuestionLinker.isSubQuestionMarker('ii.')).toBe(true);
    expect(SubQuestionLinker.isSubQuestionMarker('3.')).toBe(false);
    expect(SubQuestionLinker.isSubQuestionMarker(null)).toBe(false);
  });

  it('should treat upper-case roman markers as main and lowercase ones as sub', () => {
    expect(SubQuestionLinker.isMainQuestionMarker('II.')).toBe(true);
    expect(SubQuestionLinker.isSubQuestionMarker('II.')).toBe(false);
    expect(SubQuestionLinker.isMainQuestionMarker('ii.')).toBe(false);
    expect(SubQuestionLinker.isSubQuestionMarker('ii.')).toBe(true);

    const linked = SubQuestionLinker.link([
      makeSpan(0, 1, 'I.'),
      makeSpan(1, 2, '(a)'),
      makeSpan(2, 3, 'II.'),
      makeSpan(3, 4, 'i.')
    ]);

    expect(linked.map(span => [span.isSubQuestion, span.parentQuestionNumber])).toEqual([
      [false, null],
      [true, 1],
      [false, null],
      [true, 3]
    ]);
  });

  describe('link', () => {
    it('should link sub-questions to the nearest preceding main question', () => {
      const linked = SubQuestionLinker.link([
        makeSpan(0, 3, '3.'),
        makeSpan(1, 4, '(a)'),
        makeSpan(2, 5, '(b)'),
        makeSpan(3, 6, '4.'),
        makeSpan(4, 7, '(a)')
      ]);

      expect(linked.map(span => [span.isSubQuestion, span.parentQuestionNumber])).toEqual([
        [false, null],
        [true, 3],
        [true, 3],
        [false, null],
        [true, 6]
      ]);
    });

    it('should not link a sub marker that has no main question before it', () => {
      const linked = SubQuestionLinker.link([makeSpan(0, 1, '(a)'), makeSpan(1, 2, null)]);

      expect(linked.every(span => !span.isSubQuestion && span.parentQuestionNumber === null)).toBe(true);
    });

    it('should not modify the input spans', () => {
      const spans = [makeSpan(0, 1, '1.'), makeSpan(1, 2, '(a)')];
      SubQuestionLinker.link(spans);

      expect(spans[1]).toEqual(makeSpan(1, 2, '(a)'));
    });
  });

  describe('repairOrphans', () => {
    it('should demote sub-questions whose parent is missing and reclassify them', () => {
      const reclassify = jest.fn().mockReturnValue({ questionType: 'essay', options: [] });
      const questions = [
        makeRecord(1),
        makeRecord(2, { isSubQuestion: true, parentQuestionNumber: 1, questionType: 'sub_question' }),
        makeRecord(3, { isSubQuestion: true, parentQuestionNumber: 9, questionType: 'sub_question' })
      ];

      const repaired = SubQuestionLinker.repairOrphans(questions, reclassify);

      expect(repaired[1]).toBe(questions[1]);
      expect(repaired[2]).toEqual({
        ...questions[2],
        isSubQuestion: false,
        parentQuestionNumber: null,
        questionType: 'essay',
        qualityFlags: ['orphaned_sub_question']
      });
      expect(reclassify).toHaveBeenCalledTimes(1);
    });
  });

  it('should count main and sub-questions', () => {
    expect(SubQuestionLinker.getStats([{ isSubQuestion: false }, { isSubQuestion: true }])).toEqual({
      totalQuestions: 2,
      subQuestions: 1,
      mainQuestions: 1,
      subQuestionPercentage: 50
    });
  });
});
