import { QuestionSegmenter } from './QuestionSegmenter';

describe('QuestionSegmenter', () => {
  describe('matchMainMarker', () => {
    it('should recognise numbered and "Question N" markers', () => {
      expect(QuestionSegmenter.matchMainMarker('12) Solve for x')).toEqual({ marker: '12)', printedNumber: 12, rest: ' Solve for x' });
      expect(QuestionSegmenter.matchMainMarker('Question 3: Discuss trade.')).toEqual({ marker: 'Question 3:', printedNumber: 3, rest: ' Discuss trade.' });
    });

    it('should read upper-case roman markers as their numeric value', () => {
      expect(QuestionSegmenter.matchMainMarker('IV. Discuss trade.')).toEqual({ marker: 'IV.', printedNumber: 4, rest: ' Discuss trade.' });
      expect(QuestionSegmenter.matchMainMarker('XII. Solve for x')?.printedNumber).toBe(12);
      expect(QuestionSegmenter.matchMainMarker('iv. Discuss trade.')).toBeNull();
      expect(QuestionSegmenter.matchMainMarker('IIII. Not a numeral')).toBeNull();
    });

    it('should not treat years or decimals as markers', () => {
      expect(QuestionSegmenter.matchMainMarker('2023 was a year')).toBeNull();
      expect(QuestionSegmenter.matchMainMarker('3.5 is a number')).toBeNull();
    });
  });

  describe('matchSubMarker', () => {
    it('should recognise lowercase letters and roman numerals', () => {
      expect(QuestionSegmenter.matchSubMarker('(ii) Explain')?.marker).toBe('(ii)');
      expect(QuestionSegmenter.matchSubMarker('iv. Explain')?.marker).toBe('iv.');
      expect(QuestionSegmenter.matchSubMarker('b) Explain')?.marker).toBe('b)');
    });

    it('should leave uppercase option labels alone', () => {
      expect(QuestionSegmenter.matchSubMarker('A) Paris')).toBeNull();
    });
  });

  describe('segment', () => {
    it('should split questions numbered with upper-case roman markers', () => {
      const result = QuestionSegmenter.segment([
        'I. Explain the law of demand. (10 marks)\nII. Discuss monetary policy tools. (10 marks)'
      ]);

      expect(result.usedFallback).toBe(false);
      expect(result.spans).toEqual([
        { index: 0, questionNumber: 1, marker: 'I.', body: 'Explain the law of demand. (10 marks)', flags: [] },
        { index: 1, questionNumber: 2, marker: 'II.', body: 'Discuss monetary policy tools. (10 marks)', flags: [] }
      ]);
    });

    it('should split numbered questions and keep the text before the first as preamble', () => {
      const result = QuestionSegmenter.segment([
        'Midterm Exam\nTotal marks: 20',
        '1. Define GDP. (5 marks)\n2. Explain inflation in detail. (15 marks)'
      ]);

      expect(result.usedFallback).toBe(false);
      expect(result.preamble).toBe('Midterm Exam\nTotal marks: 20');
      expect(result.spans).toEqual([
        { index: 0, questionNumber: 1, marker: '1.', body: 'Define GDP. (5 marks)', flags: [] },
        { index: 1, questionNumber: 2, marker: '2.', body: 'Explain inflation in detail. (15 marks)', flags: [] }
      ]);
    });

    it('should continue a question across a page break', () => {
      const result = QuestionSegmenter.segment(['1. Explain the causes of', 'the 2008 financial crisis.']);

      expect(result.spans).toHaveLength(1);
      expect(result.spans[0].body).toBe('Explain the causes of\n\f\nthe 2008 financial crisis.');
    });

    it('should give sub-questions their own spans and sequential numbers', () => {
      const result = QuestionSegmenter.segment([
        '3. Answer the following about markets.\n(a) Define supply.\n(b) Define demand.\n4. Explain elasticity.'
      ]);

      expect(result.spans.map(span => span.marker)).toEqual(['3.', '(a)', '(b)', '4.']);
      expect(result.spans.map(span => span.questionNumber)).toEqual([3, 4, 5, 6]);
      expect(result.spans[1].body).toBe('Define supply.');
    });

    it('should split several numbered markers on one line', () => {
      const result = QuestionSegmenter.segment(['1. Define GDP. 2. Explain inflation.']);

      expect(result.spans.map(span => [span.questionNumber, span.body])).toEqual([
        [1, 'Define GDP.'],
        [2, 'Explain inflation.']
      ]);
    });

    it('should keep lettered option lines inside a multiple-choice question', () => {
      const result = QuestionSegmenter.segment([
        '5. Which of the following is a fruit?\na) Apple\nb) Carrot\n6. Name a vegetable.'
      ]);

      expect(result.spans).toHaveLength(2);
      expect(result.spans[0].body).toBe('Which of the following is a fruit?\na) Apple\nb) Carrot');
      expect(result.spans[1].questionNumber).toBe(6);
    });

    it('should fall back to one flagged question when no marker is found', () => {
      const result = QuestionSegmenter.segment(['Some text without markers']);

      expect(result.usedFallback).toBe(true);
      expect(result.preamble).toBe('');
      expect(result.spans).toEqual([
        { index: 0, questionNumber: 1, marker: null, body: 'Some text without markers', flags: ['possible_ocr_noise'] }
      ]);
    });

    it('should return no spans for blank pages', () => {
      const result = QuestionSegmenter.segment(['', '  ']);

      expect(result.spans).toEqual([]);
      expect(result.usedFallback).toBe(false);
    });
  });
});
