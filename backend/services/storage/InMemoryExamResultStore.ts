import type { ExamResultDocument } from '../../types/index.js';
import { DEFAULT_LIST_LIMIT, sortByProcessedAt, type ExamResultStore } from './ExamResultStore.js';

/**
 * Process-local store, used for tests and when no other store is configured.
 * Documents are copied on the way in and out.
 */
export class InMemoryExamResultStore implements ExamResultStore {
  readonly name = 'memory';
  private readonly documents = new Map<string, ExamResultDocument>();

  async save(document: ExamResultDocument): Promise<void> {
    this.documents.set(document.exam_id, structuredClone(document));
  }

  async saveMany(documents: readonly ExamResultDocument[]): Promise<void> {
    for (const document of documents) {
      await this.save(document);
    }
  }

  async get(examId: string): Promise<ExamResultDocument | null> {
    const document = this.documents.get(examId);
    return document ? structuredClone(document) : null;
  }

  async list(limit: number = DEFAULT_LIST_LIMIT): Promise<ExamResultDocument[]> {
    const all = Array.from(this.documents.values(), document => structuredClone(document));
    return sortByProcessedAt(all).slice(0, limit);
  }

  size(): number {
    return this.documents.size;
  }
}
