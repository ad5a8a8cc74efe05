/**
 * Persistence boundary for parsed exam documents
 */

import type { ExamResultDocument } from '../../types/index.js';

export interface ExamResultStore {
  readonly name: string;
  save(document: ExamResultDocument): Promise<void>;
  saveMany(documents: readonly ExamResultDocument[]): Promise<void>;
  get(examId: string): Promise<ExamResultDocument | null>;
  list(limit?: number): Promise<ExamResultDocument[]>;
}

export const DEFAULT_LIST_LIMIT = 50;

/**
 * Newest first, then by exam id
 */
export function sortByProcessedAt(documents: ExamResultDocument[]): ExamResultDocument[] {
  return documents.sort((a, b) =>
    b.processed_at.localeCompare(a.processed_at) || a.exam_id.localeCompare(b.exam_id)
  );
}
