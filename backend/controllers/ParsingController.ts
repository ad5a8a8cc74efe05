import type { Request, Response } from 'express';
import type { BatchParsingResult, CoverMetadata, ExamDocument, ExamResultDocument } from '../types/index.js';
import type { ExamParsingPipeline } from '../services/parsing/ExamParsingPipeline.js';
import type { ExamResultStore } from '../services/storage/ExamResultStore.js';
import { serializeExamResult } from '../services/parsing/ExamResultSerializer.js';
import { ErrorHandler, ParsingError } from '../utils/errorHandler.js';

export const MAX_EXAMS_PER_REQUEST = 100;

export interface ParseRequest {
  exams: ExamDocument[];
  persist: boolean;
}

export interface ParseResponse {
  success: true;
  runId: string;
  totals: BatchParsingResult['totals'];
  exams: ExamResultDocument[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ParsingError('INVALID_INPUT', `${field} must be a string`);
  }
  return value;
}

function nullableString(value: unknown, field: string): string | null | undefined {
  if (value === null) return null;
  return optionalString(value, field);
}

function parseCoverMetadata(value: unknown, field: string): CoverMetadata | null | undefined {
  if (value === undefined || value === null) return value;
  if (!isRecord(value)) {
    throw new ParsingError('INVALID_INPUT', `${field} must be an object`);
  }

  const rawTotal = value['totalMarksFromCover'];
  let totalMarksFromCover: CoverMetadata['totalMarksFromCover'];
  if (rawTotal === undefined || rawTotal === null || typeof rawTotal === 'number' || typeof rawTotal === 'string') {
    totalMarksFromCover = rawTotal;
  } else {
    throw new ParsingError('INVALID_INPUT', `${field}.totalMarksFromCover must be a number or a string`);
  }

  return {
    courseCode: nullableString(value['courseCode'], `${field}.courseCode`),
    totalMarksFromCover,
    examDate: nullableString(value['examDate'], `${field}.examDate`)
  };
}

function parseExamDocument(value: unknown, field: string): ExamDocument {
  if (!isRecord(value)) {
    throw new ParsingError('INVALID_INPUT', `${field} must be an object`);
  }

  const pages = value['pages'];
  if (!Array.isArray(pages)) {
    throw new ParsingError('INVALID_INPUT', `${field}.pages must be an array of strings`);
  }
  const entries: unknown[] = pages;
  const pageTexts: string[] = [];
  for (const page of entries) {
    if (typeof page !== 'string') {
      throw new ParsingError('INVALID_INPUT', `${field}.pages must be an array of strings`);
    }
    pageTexts.push(page);
  }

  const exam: ExamDocument = { pages: pageTexts };
  const examId = optionalString(value['examId'], `${field}.examId`);
  const filename = optionalString(value['filename'], `${field}.filename`);
  const courseCode = nullableString(value['courseCode'], `${field}.courseCode`);
  const coverMetadata = parseCoverMetadata(value['coverMetadata'], `${field}.coverMetadata`);

  if (examId !== undefined) exam.examId = examId;
  if (filename !== undefined) exam.filename = filename;
  if (courseCode !== undefined) exam.courseCode = courseCode;
  if (coverMetadata !== undefined) exam.coverMetadata = coverMetadata;
  return exam;
}

export class ParsingController {
  private readonly pipeline: ExamParsingPipeline;
  private readonly store: ExamResultStore;

  constructor(pipeline: ExamParsingPipeline, store: ExamResultStore) {
    this.pipeline = pipeline;
    this.store = store;
  }

  /**
   * Accepts { exams: [...] } or a single exam object
   */
  static validateParseRequest(body: unknown): ParseRequest {
    if (!isRecord(body)) {
      throw new ParsingError('INVALID_INPUT', 'Request body must be a JSON object');
    }

    const rawPersist = body['persist'];
    let persist = true;
    if (typeof rawPersist === 'boolean') {
      persist = rawPersist;
    } else if (rawPersist !== undefined) {
      throw new ParsingError('INVALID_INPUT', 'persist must be a boolean');
    }

    let exams: ExamDocument[];
    const rawExams = body['exams'];
    if (rawExams === undefined) {
      exams = [parseExamDocument(body, 'body')];
    } else {
      if (!Array.isArray(rawExams) || rawExams.length === 0) {
        throw new ParsingError('INVALID_INPUT', 'exams must be a non-empty array');
      }
      if (rawExams.length > MAX_EXAMS_PER_REQUEST) {
        throw new ParsingError('INVALID_INPUT', `At most ${MAX_EXAMS_PER_REQUEST} exams per request`);
      }
      const entries: unknown[] = rawExams;
      exams = entries.map((entry, index) => parseExamDocument(entry, `exams[${index}]`));
    }

    return { exams, persist };
  }

  async handleParseRequest(body: unknown): Promise<ParseResponse> {
    const request = ParsingController.validateParseRequest(body);
    const batch = this.pipeline.processExams(request.exams);
    const processedAt = new Date();
    const documents = batch.results.map(result => serializeExamResult(result, batch.runId, processedAt));

    if (request.persist) {
      await this.store.saveMany(documents);
      console.log(`💾 [PARSING] Saved ${documents.length} exams to ${this.store.name} store`);
    }

    return { success: true, runId: batch.runId, totals: batch.totals, exams: documents };
  }

  async handleGetExam(examId: string): Promise<ExamResultDocument | null> {
    if (!examId.trim()) {
      throw new ParsingError('INVALID_INPUT', 'examId is required');
    }
    return this.store.get(examId);
  }

  async handleListExams(rawLimit: unknown): Promise<ExamResultDocument[]> {
    if (rawLimit === undefined) {
      return this.store.list();
    }
    const limit = typeof rawLimit === 'string' ? Number(rawLimit) : NaN;
    if (!Number.isInteger(limit) || limit < 1 || limit > 500) {
      throw new ParsingError('INVALID_INPUT', 'limit must be an integer between 1 and 500');
    }
    return this.store.list(limit);
  }

  /**
   * POST /api/parsing/exams
   */
  parseExams = async (req: Request, res: Response): Promise<void> => {
    try {
      const response = await this.handleParseRequest(req.body);
      res.status(200).json(response);
    } catch (error) {
      this.sendError(res, error, 'Parse exams');
    }
  };

  /**
   * GET /api/parsing/exams/:examId
   */
  getExam = async (req: Request, res: Response): Promise<void> => {
    try {
      const document = await this.handleGetExam(req.params['examId'] ?? '');
      if (!document) {
        res.status(404).json({ success: false, error: `Exam not found: ${req.params['examId']}` });
        return;
      }
      res.status(200).json({ success: true, exam: document });
    } catch (error) {
      this.sendError(res, error, 'Get exam');
    }
  };

  /**
   * GET /api/parsing/exams?limit=20
   */
  listExams = async (req: Request, res: Response): Promise<void> => {
    try {
      const exams = await this.handleListExams(req.query['limit']);
      res.status(200).json({ success: true, exams });
    } catch (error) {
      this.sendError(res, error, 'List exams');
    }
  };

  private sendError(res: Response, error: unknown, context: string): void {
    console.error(ErrorHandler.getLogMessage(error, context));
    const status = ErrorHandler.httpStatus(error);
    const message = status === 500 ? 'Internal server error' : ErrorHandler.analyzeError(error).message;
    res.status(status).json({ success: false, error: message });
  }
}
