/**
 * Text Normalization Utilities
 *
 * Shared normalization for OCR-extracted exam text. Used by the segmenter,
 * classifier and cleaner so every stage sees the same characters.
 */

// BOM, zero-width characters and bidi embedding/override controls
const INVISIBLE_CHARS = /[\ufeff\u200b-\u200d\u202a-\u202e]/g;

// Control characters other than tab, newline, carriage return and form feed
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u0008\u000b\u000e-\u001f\u007f]/g;

/**
 * Repair common OCR/encoding artifacts without touching line structure.
 *
 * @example
 * repairEncodingArtifacts("What’s the “mode” — explain")
 * // "What's the \"mode\" - explain"
 */
export function repairEncodingArtifacts(text: string): string {
  if (!text) return '';

  return text
    .replace(INVISIBLE_CHARS, '')
    .replace(CONTROL_CHARS, ' ')
    .replace(/\r\n?/g, '\n')
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/[\u201c\u201d]/g, '"')
    .replace(/[\u2013\u2014]/g, '-')
    .replace(/\u00a0/g, ' ');
}

/**
 * Join words broken across lines by OCR hyphenation: "calcu-\nlate" → "calculate"
 */
export function joinHyphenatedLineBreaks(text: string): string {
  return text.replace(/([A-Za-z])-[ \t]*\n[ \t]*([a-z])/g, '$1$2');
}

/**
 * Collapse every run of whitespace (including newlines and form feeds) to one space
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Lowercased alphanumeric tokens.
 *
 * @example tokenize("Explain the (10pts) Rule!") // ["explain", "the", "10pts", "rule"]
 */
export function tokenize(text: string | null | undefined): string[] {
  if (!text) return [];
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/**
 * Normalize text for character-level similarity comparison: lowercase, no
 * punctuation, no spaces.
 *
 * @example normalizeTextForComparison("Define  GDP.") // "definegdp"
 */
export function normalizeTextForComparison(text: string | null | undefined): string {
  if (!text) return '';
  return text.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Share of non-space characters that are letters
 */
export function letterRatio(text: string): number {
  const compact = text.replace(/\s+/g, '');
  if (compact.length === 0) return 0;
  const letters = compact.match(/[A-Za-zÀ-ɏ]/g)?.length ?? 0;
  return letters / compact.length;
}

/**
 * Share of non-space characters that are digits or arithmetic operators
 */
export function numericRatio(text: string): number {
  const compact = text.replace(/\s+/g, '');
  if (compact.length === 0) return 0;
  const numeric = compact.match(/[0-9+\-*/=^().,%×÷<>]/g)?.length ?? 0;
  return numeric / compact.length;
}
