/**
 * Parsing Pipeline Configuration
 * Centralized, read-only configuration shared by every exam in a run.
 * Values come from defaults overridden by environment variables.
 */

import { ParsingError } from '../utils/errorHandler.js';

export type SimilarityMethod = 'token_overlap' | 'character_dice';
export type MarksStrictness = 'lenient' | 'strict';

export interface ParsingConfig {
  readonly noisePatterns: ReadonlyArray<RegExp>;
  readonly minQuestionLength: number;
  readonly minSubQuestionLength: number;
  readonly similarityThreshold: number;
  readonly similarityMethod: SimilarityMethod;
  readonly totalMarksBound: number;
  readonly marksStrictness: MarksStrictness;
  readonly essayMinLength: number;
  readonly shortAnswerMinLength: number;
  readonly shortAnswerMaxLength: number;
  readonly parseCoverPage: boolean;
}

/**
 * Lines matching any of these (after trimming) are page furniture, not question text.
 */
export const DEFAULT_NOISE_PATTERN_SOURCES: readonly string[] = [
  '^\\d{1,3}$',                                   // bare page numbers
  '^-\\s*\\d{1,3}\\s*-$',                           // - 3 -
  '^page\\s+\\d+(\\s+of\\s+\\d+)?$',
  '^\\(page\\s+\\d+\\)$',
  '^turn\\s+over\\.?$',
  '^(please\\s+)?see\\s+next\\s+page\\.?$',
  '^continued(\\s+on\\s+next\\s+page)?\\.*$',
  '^(©|\\(c\\))\\s*\\d{4}.*$',
  '^confidential\\.?$',
  '^do\\s+not\\s+write\\s+(in\\s+)?(this|the)\\s+(space|margin|box)\\.?$',
  '^(https?://|www\\.)\\S+$',                   // bare URL
  '^[\\w.+-]+@[\\w-]+(\\.[\\w-]+)+$',            // bare e-mail address
  '^answer\\s+all\\s+questions\\.?$',
  '^end\\s+of\\s+(exam|examination|paper)\\.?$'
];

/**
 * Institution and exam headers. Compiled case-sensitively: only an upper-case
 * header line matches, never a sentence starting with "University".
 */
export const DEFAULT_HEADER_PATTERN_SOURCES: readonly string[] = [
  "^(QUEEN'?S\\s+)?UNIVERSITY\\b[^a-z]*$",
  '^FACULTY\\s+OF\\b[^a-z]*$',
  '^(FINAL|MIDTERM|MID-TERM)\\s+EXAMINATION\\b[^a-z]*$',
  '^INSTRUCTIONS\\s+TO\\s+(STUDENTS|CANDIDATES)\\b[^a-z]*$'
];

export function compileNoisePatterns(sources: readonly string[], flags = 'i'): RegExp[] {
  return sources.map(source => {
    try {
      return new RegExp(source, flags);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ParsingError('INVALID_CONFIG', `Invalid noise pattern "${source}": ${reason}`);
    }
  });
}

export const DEFAULT_PARSING_CONFIG: ParsingConfig = Object.freeze({
  noisePatterns: Object.freeze([
    ...compileNoisePatterns(DEFAULT_NOISE_PATTERN_SOURCES),
    ...compileNoisePatterns(DEFAULT_HEADER_PATTERN_SOURCES, '')
  ]),
  minQuestionLength: 10,
  minSubQuestionLength: 2,
  similarityThreshold: 0.85,
  similarityMethod: 'token_overlap',
  totalMarksBound: 300,
  marksStrictness: 'lenient',
  essayMinLength: 150,
  shortAnswerMinLength: 10,
  shortAnswerMaxLength: 600,
  parseCoverPage: true
});

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ParsingError('INVALID_CONFIG', `${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw.trim().toLowerCase() === 'true';
}

function readEnum<T extends string>(env: NodeJS.ProcessEnv, key: string, allowed: readonly T[], fallback: T): T {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const match = allowed.find(value => value === raw);
  if (!match) {
    throw new ParsingError('INVALID_CONFIG', `${key} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

/**
 * Build a config from defaults plus overrides, validating ranges.
 */
export function createParsingConfig(overrides: Partial<ParsingConfig> = {}): ParsingConfig {
  const config: ParsingConfig = { ...DEFAULT_PARSING_CONFIG, ...overrides };

  if (config.similarityThreshold <= 0 || config.similarityThreshold > 1) {
    throw new ParsingError('INVALID_CONFIG', `similarityThreshold must be in (0, 1], got ${config.similarityThreshold}`);
  }
  if (config.totalMarksBound <= 0) {
    throw new ParsingError('INVALID_CONFIG', `totalMarksBound must be positive, got ${config.totalMarksBound}`);
  }
  if (config.minQuestionLength < 0 || config.minSubQuestionLength < 0) {
    throw new ParsingError('INVALID_CONFIG', 'Minimum lengths must not be negative');
  }
  if (config.shortAnswerMinLength > config.shortAnswerMaxLength) {
    throw new ParsingError('INVALID_CONFIG', 'shortAnswerMinLength must not exceed shortAnswerMaxLength');
  }

  return Object.freeze({
    ...config,
    noisePatterns: Object.freeze([...config.noisePatterns])
  });
}

/**
 * Load parsing config from environment variables (see .env.example)
 */
export function loadParsingConfig(env: NodeJS.ProcessEnv = process.env): ParsingConfig {
  const extraPatterns = (env['PARSING_EXTRA_NOISE_PATTERNS'] || '')
    .split('||')
    .map(source => source.trim())
    .filter(source => source.length > 0);

  return createParsingConfig({
    noisePatterns: [
      ...DEFAULT_PARSING_CONFIG.noisePatterns,
      ...compileNoisePatterns(extraPatterns)
    ],
    minQuestionLength: readNumber(env, 'PARSING_MIN_QUESTION_LENGTH', DEFAULT_PARSING_CONFIG.minQuestionLength),
    minSubQuestionLength: readNumber(env, 'PARSING_MIN_SUB_QUESTION_LENGTH', DEFAULT_PARSING_CONFIG.minSubQuestionLength),
    similarityThreshold: readNumber(env, 'PARSING_SIMILARITY_THRESHOLD', DEFAULT_PARSING_CONFIG.similarityThreshold),
    similarityMethod: readEnum<SimilarityMethod>(env, 'PARSING_SIMILARITY_METHOD', ['token_overlap', 'character_dice'], DEFAULT_PARSING_CONFIG.similarityMethod),
    totalMarksBound: readNumber(env, 'PARSING_TOTAL_MARKS_BOUND', DEFAULT_PARSING_CONFIG.totalMarksBound),
    marksStrictness: readEnum<MarksStrictness>(env, 'PARSING_MARKS_STRICTNESS', ['lenient', 'strict'], DEFAULT_PARSING_CONFIG.marksStrictness),
    parseCoverPage: readBoolean(env, 'PARSING_PARSE_COVER_PAGE', DEFAULT_PARSING_CONFIG.parseCoverPage)
  });
}
