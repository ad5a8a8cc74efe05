import { ParsingController } from './ParsingController';
import { ExamParsingPipeline } from '../services/parsing/ExamParsingPipeline';
import { InMemoryExamResultStore } from '../services/storage/InMemoryExamResultStore';
import { ParsingError } from '../utils/errorHandler';
import { PipelineLogger } from '../utils/LoggerUtils';

describe('ParsingController', () => {
  let store: InMemoryExamResultStore;
  let controller: ParsingController;

  beforeAll(() => PipelineLogger.setSilent(true));
  afterAll(() => PipelineLogger.setSilent(false));

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    store = new InMemoryExamResultStore();
    controller = new ParsingController(new ExamParsingPipeline(), store);
  });

  afterEach(() => jest.restoreAllMocks());

  describe('validateParseRequest', () => {
    it('should accept a single exam object', () => {
      expect(ParsingController.validateParseRequest({ pages: ['1. Define GDP.'], persist: false })).toEqual({
        exams: [{ pages: ['1. Define GDP.'] }],
        persist: false
      });
    });

    it('should keep optional exam fields', () => {
      const request = ParsingController.validateParseRequest({
        exams: [{ examId: 'e1', filename: 'e1.pdf', courseCode: null, pages: [], coverMetadata: { totalMarksFromCover: '40' } }]
      });

      expect(request.persist).toBe(true);
      expect(request.exams).toEqual([{
        examId: 'e1',
        filename: 'e1.pdf',
        courseCode: null,
        pages: [],
        coverMetadata: { courseCode: undefined, totalMarksFromCover: '40', examDate: undefined }
      }]);
    });

    it('should reject malformed bodies', () => {
      expect(() => ParsingController.validateParseRequest(null)).toThrow('Request body must be a JSON object');
      expect(() => ParsingController.validateParseRequest({ exams: [] })).toThrow('exams must be a non-empty array');
      expect(() => ParsingController.validateParseRequest({ exams: [{ pages: [1] }] })).toThrow('exams[0].pages must be an array of strings');
      expect(() => ParsingController.validateParseRequest({ pages: [], persist: 'yes' })).toThrow('persist must be a boolean');
      expect(() => ParsingController.validateParseRequest({ pages: [], coverMetadata: { totalMarksFromCover: true } }))
        .toThrow('body.coverMetadata.totalMarksFromCover must be a number or a string');
    });
  });

  describe('handleParseRequest', () => {
    it('should parse, serialize and store every exam', async () => {
      const response = await controller.handleParseRequest({
        exams: [{ examId: 'e1', pages: ['1. Question A (10pts)\n2. Question B (30pts)'] }]
      });

      expect(response.success).toBe(true);
      expect(response.totals).toEqual({ examsProcessed: 1, examsFailed: 0, totalQuestions: 2 });
      expect(response.exams[0].exam_id).toBe('e1');
      expect(response.exams[0].total_marks).toBe(40);
      expect(response.exams[0].run_id).toBe(response.runId);
      expect((await store.get('e1'))?.question_count).toBe(2);
    });

    it('should skip the store when persist is false', async () => {
      await controller.handleParseRequest({ examId: 'e2', pages: ['1. Define GDP.'], persist: false });

      expect(store.size()).toBe(0);
    });

    it('should surface validation failures as ParsingError', async () => {
      await expect(controller.handleParseRequest('nope')).rejects.toBeInstanceOf(ParsingError);
    });
  });

  describe('reading stored exams', () => {
    it('should return stored exams and null for unknown ids', async () => {
      await controller.handleParseRequest({ examId: 'e3', pages: ['1. Define GDP. (5 marks)'] });

      expect((await controller.handleGetExam('e3'))?.exam_id).toBe('e3');
      expect(await controller.handleGetExam('unknown')).toBeNull();
      expect(await controller.handleListExams('1')).toHaveLength(1);
    });

    it('should validate ids and limits', async () => {
      await expect(controller.handleGetExam('  ')).rejects.toThrow('examId is required');
      await expect(controller.handleListExams('abc')).rejects.toThrow('limit must be an integer between 1 and 500');
    });
  });
});
