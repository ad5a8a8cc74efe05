/**
 * Unified error handling utilities for the parsing pipeline
 */

import type { ParsingIssue, ParsingIssueCode } from '../types/index.js';

export type ParsingErrorCode = 'INVALID_CONFIG' | 'INVALID_INPUT' | 'STORE_UNAVAILABLE';

/**
 * Raised at the boundaries (config loading, HTTP input, persistence).
 * Pipeline stages never throw this for content problems; those become issues.
 */
export class ParsingError extends Error {
  readonly code: ParsingErrorCode;

  constructor(code: ParsingErrorCode, message: string) {
    super(message);
    this.name = 'ParsingError';
    this.code = code;
  }
}

export interface ErrorInfo {
  message: string;
  isParsingError: boolean;
  code: ParsingErrorCode | null;
}

export class ErrorHandler {
  /**
   * Analyze error and return structured error information
   */
  static analyzeError(error: unknown): ErrorInfo {
    if (error instanceof ParsingError) {
      return { message: error.message, isParsingError: true, code: error.code };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { message, isParsingError: false, code: null };
  }

  /**
   * Get appropriate log message for error type
   */
  static getLogMessage(error: unknown, context: string): string {
    const info = this.analyzeError(error);
    if (info.code === 'INVALID_CONFIG') {
      return `⚙️ [CONFIG ERROR] ${context}: ${info.message}`;
    } else if (info.code === 'INVALID_INPUT') {
      return `⚠️ [INPUT ERROR] ${context}: ${info.message}`;
    } else if (info.code === 'STORE_UNAVAILABLE') {
      return `🗄️ [STORE ERROR] ${context}: ${info.message}`;
    }
    return `❌ [ERROR] ${context} failed: ${info.message}`;
  }

  static toIssue(code: ParsingIssueCode, message: string, questionNumber?: number): ParsingIssue {
    return questionNumber === undefined ? { code, message } : { code, message, questionNumber };
  }

  /**
   * HTTP status for an error surfaced by the controller
   */
  static httpStatus(error: unknown): number {
    const info = this.analyzeError(error);
    if (info.code === 'INVALID_INPUT' || info.code === 'INVALID_CONFIG') return 400;
    if (info.code === 'STORE_UNAVAILABLE') return 503;
    return 500;
  }
}
