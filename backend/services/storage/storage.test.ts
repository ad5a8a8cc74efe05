import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { InMemoryExamResultStore } from './InMemoryExamResultStore';
import { JsonFileExamResultStore } from './JsonFileExamResultStore';
import { FirestoreExamResultStore } from './FirestoreExamResultStore';
import { createExamResultStore } from './createExamResultStore';
import { ParsingError } from '../../utils/errorHandler';
import { PipelineLogger } from '../../utils/LoggerUtils';
import type { ExamResultDocument } from '../../types/index';

function makeDocument(examId: string, processedAt: string): ExamResultDocument {
  return {
    exam_id: examId,
    filename: null,
    course_code: null,
    exam_date: null,
    total_marks: null,
    marks_source: null,
    question_count: 0,
    questions: [],
    cleaning_report: {
      total_processed: 0,
      removed_duplicate: 0,
      removed_too_short: 0,
      removed_invalid: 0,
      final_count: 0,
      total_removed: 0,
      retention_rate: '0.0%'
    },
    review_flags: [],
    issues: [],
    run_id: 'run-1',
    processed_at: processedAt
  };
}

describe('InMemoryExamResultStore', () => {
  it('should save, replace and list documents newest first', async () => {
    const store = new InMemoryExamResultStore();
    await store.saveMany([
      makeDocument('a', '2024-01-01T00:00:00.000Z'),
      makeDocument('b', '2024-01-02T00:00:00.000Z')
    ]);
    await store.save({ ...makeDocument('a', '2024-01-03T00:00:00.000Z'), question_count: 4 });

    expect(store.size()).toBe(2);
    expect((await store.get('a'))?.question_count).toBe(4);
    expect((await store.list()).map(document => document.exam_id)).toEqual(['a', 'b']);
    expect(await store.list(1)).toHaveLength(1);
    expect(await store.get('missing')).toBeNull();
  });

  it('should hand out copies', async () => {
    const store = new InMemoryExamResultStore();
    await store.save(makeDocument('a', '2024-01-01T00:00:00.000Z'));

    const first = await store.get('a');
    if (first) first.review_flags.push('processing_failed');

    expect((await store.get('a'))?.review_flags).toEqual([]);
  });
});

describe('JsonFileExamResultStore', () => {
  let directory: string;

  beforeAll(() => PipelineLogger.setSilent(true));
  afterAll(() => PipelineLogger.setSilent(false));

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'exam-store-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should return nothing before the file exists', async () => {
    const store = new JsonFileExamResultStore(join(directory, 'exams.json'));

    expect(await store.list()).toEqual([]);
    expect(await store.get('a')).toBeNull();
  });

  it('should persist documents under an exams key', async () => {
    const filePath = join(directory, 'nested', 'exams.json');
    const store = new JsonFileExamResultStore(filePath);

    await Promise.all([
      store.save(makeDocument('a', '2024-01-01T00:00:00.000Z')),
      store.save(makeDocument('b', '2024-01-02T00:00:00.000Z'))
    ]);

    const contents: unknown = JSON.parse(await readFile(filePath, 'utf8'));
    expect(contents).toEqual({
      exams: [makeDocument('a', '2024-01-01T00:00:00.000Z'), makeDocument('b', '2024-01-02T00:00:00.000Z')]
    });
    expect((await new JsonFileExamResultStore(filePath).get('b'))?.processed_at).toBe('2024-01-02T00:00:00.000Z');
  });

  it('should skip malformed entries and reject malformed files', async () => {
    const filePath = join(directory, 'exams.json');
    await writeFile(filePath, JSON.stringify({ exams: [{ exam_id: 'broken' }, makeDocument('a', '2024-01-01T00:00:00.000Z')] }));

    expect((await new JsonFileExamResultStore(filePath).list()).map(document => document.exam_id)).toEqual(['a']);

    await writeFile(filePath, 'not json');
    await expect(new JsonFileExamResultStore(filePath).list()).rejects.toBeInstanceOf(ParsingError);
  });
});

describe('FirestoreExamResultStore', () => {
  it('should report an unavailable database', async () => {
    const store = new FirestoreExamResultStore(() => null);

    await expect(store.get('a')).rejects.toThrow('Firestore database not available');
  });
});

describe('createExamResultStore', () => {
  it('should pick the store named in the environment', () => {
    expect(createExamResultStore({}).name).toBe('memory');
    expect(createExamResultStore({ EXAM_STORE: 'json', EXAM_STORE_PATH: 'out/exams.json' }).name).toBe('json');
    expect(createExamResultStore({ EXAM_STORE: 'Firestore' }).name).toBe('firestore');
  });

  it('should reject unknown store kinds', () => {
    expect(() => createExamResultStore({ EXAM_STORE: 'redis' })).toThrow('EXAM_STORE must be one of memory, json, firestore, got "redis"');
  });
});
