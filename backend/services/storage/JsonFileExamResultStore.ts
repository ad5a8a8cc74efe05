/**
 * Stores parsed exams in a single JSON file: { "exams": [ ... ] }
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { ExamResultDocument } from '../../types/index.js';
import { DEFAULT_LIST_LIMIT, sortByProcessedAt, type ExamResultStore } from './ExamResultStore.js';
import { isExamResultDocument } from '../parsing/ExamResultSerializer.js';
import { ParsingError } from '../../utils/errorHandler.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';

interface ExamResultFile {
  exams: ExamResultDocument[];
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonFileExamResultStore implements ExamResultStore {
  readonly name = 'json';
  private readonly filePath: string;
  // Writes run one after another so concurrent saves never drop each other
  private queue: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async save(document: ExamResultDocument): Promise<void> {
    await this.saveMany([document]);
  }

  async saveMany(documents: readonly ExamResultDocument[]): Promise<void> {
    const write = this.queue.then(async () => {
      const file = await this.readFileContents();
      const byId = new Map(file.exams.map(exam => [exam.exam_id, exam]));
      for (const document of documents) {
        byId.set(document.exam_id, document);
      }
      await this.writeFileContents({ exams: Array.from(byId.values()) });
      PipelineLogger.debug('STORE', `Saved ${documents.length} exams to ${this.filePath}`);
    });
    // Keep the chain alive after a failed write; the caller still sees the error
    this.queue = write.catch(() => undefined);
    return write;
  }

  async get(examId: string): Promise<ExamResultDocument | null> {
    await this.queue;
    const file = await this.readFileContents();
    return file.exams.find(exam => exam.exam_id === examId) ?? null;
  }

  async list(limit: number = DEFAULT_LIST_LIMIT): Promise<ExamResultDocument[]> {
    await this.queue;
    const file = await this.readFileContents();
    return sortByProcessedAt(file.exams).slice(0, limit);
  }

  private async readFileContents(): Promise<ExamResultFile> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { exams: [] };
      }
      throw new ParsingError('STORE_UNAVAILABLE', `Cannot read ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ParsingError('STORE_UNAVAILABLE', `${this.filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (typeof parsed !== 'object' || parsed === null || !('exams' in parsed) || !Array.isArray(parsed.exams)) {
      throw new ParsingError('STORE_UNAVAILABLE', `${this.filePath} has no "exams" array`);
    }

    const entries: unknown[] = parsed.exams;
    const exams: ExamResultDocument[] = [];
    for (const entry of entries) {
      if (isExamResultDocument(entry)) {
        exams.push(entry);
      } else {
        PipelineLogger.warn('STORE', `Skipping malformed entry in ${this.filePath}`);
      }
    }
    return { exams };
  }

  private async writeFileContents(file: ExamResultFile): Promise<void> {
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      const tempPath = `${this.filePath}.tmp`;
      await writeFile(tempPath, JSON.stringify(file, null, 2), 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      throw new ParsingError('STORE_UNAVAILABLE', `Cannot write ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
