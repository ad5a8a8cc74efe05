/**
 * Firestore-backed store: one document per exam in the parsedExams collection
 */

import type admin from 'firebase-admin';
import type { ExamResultDocument } from '../../types/index.js';
import { DEFAULT_LIST_LIMIT, type ExamResultStore } from './ExamResultStore.js';
import { isExamResultDocument } from '../parsing/ExamResultSerializer.js';
import { ParsingError } from '../../utils/errorHandler.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';

export const COLLECTIONS = {
  PARSED_EXAMS: 'parsedExams'
} as const;

// Firestore batches accept at most 500 writes
const MAX_BATCH_SIZE = 500;

export type FirestoreProvider = () => admin.firestore.Firestore | null;

export class FirestoreExamResultStore implements ExamResultStore {
  readonly name = 'firestore';
  private readonly getDb: FirestoreProvider;

  constructor(getDb: FirestoreProvider) {
    this.getDb = getDb;
  }

  private ensureDb(): admin.firestore.Firestore {
    const db = this.getDb();
    if (!db) {
      throw new ParsingError('STORE_UNAVAILABLE', 'Firestore database not available - check Firebase configuration');
    }
    return db;
  }

  async save(document: ExamResultDocument): Promise<void> {
    const db = this.ensureDb();
    try {
      await db.collection(COLLECTIONS.PARSED_EXAMS).doc(document.exam_id).set(document);
    } catch (error) {
      PipelineLogger.error('STORE', `Failed to save exam ${document.exam_id} to Firestore`, error);
      throw new ParsingError('STORE_UNAVAILABLE', `Firestore save failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  async saveMany(documents: readonly ExamResultDocument[]): Promise<void> {
    const db = this.ensureDb();
    try {
      for (let start = 0; start < documents.length; start += MAX_BATCH_SIZE) {
        const batch = db.batch();
        for (const document of documents.slice(start, start + MAX_BATCH_SIZE)) {
          batch.set(db.collection(COLLECTIONS.PARSED_EXAMS).doc(document.exam_id), document);
        }
        await batch.commit();
      }
    } catch (error) {
      PipelineLogger.error('STORE', `Failed to save ${documents.length} exams to Firestore`, error);
      throw new ParsingError('STORE_UNAVAILABLE', `Firestore batch save failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  async get(examId: string): Promise<ExamResultDocument | null> {
    const db = this.ensureDb();
    try {
      const snapshot = await db.collection(COLLECTIONS.PARSED_EXAMS).doc(examId).get();
      if (!snapshot.exists) {
        return null;
      }
      const data: unknown = snapshot.data();
      return isExamResultDocument(data) ? data : null;
    } catch (error) {
      PipelineLogger.error('STORE', `Failed to retrieve exam ${examId} from Firestore`, error);
      throw new ParsingError('STORE_UNAVAILABLE', `Firestore retrieval failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  async list(limit: number = DEFAULT_LIST_LIMIT): Promise<ExamResultDocument[]> {
    const db = this.ensureDb();
    try {
      const querySnapshot = await db.collection(COLLECTIONS.PARSED_EXAMS)
        .orderBy('processed_at', 'desc')
        .limit(limit)
        .get();

      const results: ExamResultDocument[] = [];
      querySnapshot.forEach(doc => {
        const data: unknown = doc.data();
        if (isExamResultDocument(data)) {
          results.push(data);
        }
      });
      return results;
    } catch (error) {
      PipelineLogger.error('STORE', 'Failed to list exams from Firestore', error);
      throw new ParsingError('STORE_UNAVAILABLE', `Firestore query failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }
}
