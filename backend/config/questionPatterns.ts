/**
 * Question marker and cue patterns shared by the segmenter, linker and classifier
 */

// "7." "7)" "Question 7" "Question 7:" "Q7." "Q 7"
export const MAIN_MARKER_PATTERN = /^\s*((?:question|q)\s*(\d{1,3})\b[.):]?|(\d{1,3})[.)])(?=\s|$)/i;

// "I." "II." "IV." up to XXXIX; case-sensitive so "i." stays a sub label
export const ROMAN_MAIN_MARKER_PATTERN = /^\s*((?=[IVX])(X{0,3}(?:IX|IV|V?I{0,3}))\.)(?=\s|$)/;

const ROMAN_VALUES: Readonly<Record<string, number>> = { I: 1, V: 5, X: 10 };

/**
 * @example romanToInt('XIV') // 14
 */
export function romanToInt(numeral: string): number {
  const digits = numeral.toUpperCase().split('').map(digit => ROMAN_VALUES[digit] ?? 0);
  return digits.reduce((total, value, index) => {
    const next = index + 1 < digits.length ? digits[index + 1] : 0;
    return value < next ? total - value : total + value;
  }, 0);
}

// Roman numerals up to xii, tried before single letters so "ii" is not read as "i"
const SUB_LABEL = '(?:xii|xi|ix|x|viii|vii|vi|iv|v|iii|ii|i|[a-z])';

// "a)" "(a)" "a." "i." "(ii)"; lowercase only, uppercase letters are option labels
export const SUB_MARKER_PATTERN = new RegExp(`^\\s*(\\(${SUB_LABEL}\\)|${SUB_LABEL}[.)])(?=\\s|$)`);

// A line that starts with an option label "a)" "(B)" "c."
export const OPTION_LINE_PATTERN = /^\s*\(?[a-eA-E][.)](?=\s|$)/;

// Second numbered marker later on the same physical line: " 2. Define ..."
export const INLINE_MAIN_MARKER_PATTERN = /\s((?:[Qq]uestion\s+(\d{1,3})[.:]?)|(\d{1,3})[.)])\s+(?=[A-Z])/g;

// Option labels in multiple-choice bodies: "A)" "(a)" "a." "B."
export const OPTION_MARKER_PATTERN = /(?:^|\s)\(?([A-Ea-e])[).](?=\s)/g;

export const MULTIPLE_CHOICE_PHRASES: readonly string[] = [
  'choose the best answer',
  'choose the correct answer',
  'which of the following',
  'select the correct',
  'select the best',
  'all of the above',
  'none of the above'
];

export const TRUE_FALSE_PATTERNS: ReadonlyArray<RegExp> = [
  /\btrue\s+or\s+false\b/i,
  /\btrue\s*\/\s*false\b/i,
  /\bT\s*\/\s*F\b/
];

export const CALCULATION_CUES: ReadonlyArray<RegExp> = [
  /\bcalculate\b/i,
  /\bcompute\b/i,
  /\bsolve\s+for\b/i,
  /\bevaluate\s+the\s+(integral|expression|limit|sum)\b/i,
  /\bfind\s+(the\s+)?(value|result|solution|numerical)\b/i,
  /\bdetermine\s+(the\s+)?(value|number|amount)\b/i
];

export const ESSAY_VERBS: ReadonlyArray<RegExp> = [
  /\bexplain\b/i,
  /\bdiscuss\b/i,
  /\banaly[sz]e\b/i,
  /\bdescribe\b/i,
  /\bcompare\b/i,
  /\bcontrast\b/i,
  /\bcritique\b/i,
  /\bjustify\b/i,
  /\bargue\b/i,
  /\bevaluate\b/i
];

export function containsMultipleChoicePhrase(text: string): boolean {
  const lower = text.toLowerCase();
  return MULTIPLE_CHOICE_PHRASES.some(phrase => lower.includes(phrase));
}
