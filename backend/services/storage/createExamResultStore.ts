import { join } from 'path';
import type { ExamResultStore } from './ExamResultStore.js';
import { InMemoryExamResultStore } from './InMemoryExamResultStore.js';
import { JsonFileExamResultStore } from './JsonFileExamResultStore.js';
import { FirestoreExamResultStore } from './FirestoreExamResultStore.js';
import { getFirestore } from '../../config/firebase.js';
import { ParsingError } from '../../utils/errorHandler.js';

export const STORE_KINDS = ['memory', 'json', 'firestore'] as const;
export type StoreKind = typeof STORE_KINDS[number];

export const DEFAULT_STORE_PATH = join('data', 'parsed-exams.json');

/**
 * Pick the store named by EXAM_STORE (memory | json | firestore)
 */
export function createExamResultStore(env: NodeJS.ProcessEnv = process.env): ExamResultStore {
  const raw = env['EXAM_STORE']?.trim().toLowerCase() || 'memory';
  const kind = STORE_KINDS.find(value => value === raw);

  switch (kind) {
    case 'memory':
      return new InMemoryExamResultStore();
    case 'json':
      return new JsonFileExamResultStore(env['EXAM_STORE_PATH']?.trim() || DEFAULT_STORE_PATH);
    case 'firestore':
      return new FirestoreExamResultStore(getFirestore);
    default:
      throw new ParsingError('INVALID_CONFIG', `EXAM_STORE must be one of ${STORE_KINDS.join(', ')}, got "${raw}"`);
  }
}
