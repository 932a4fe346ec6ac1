export type TextSpan = {
  start: number;
  end: number;
};

export const normalizeSingleLine = (value: string): string =>
  value
    .replace(/\u00A0/g, " ")
    .replace(/\s+/g, " ")
    .trim();

export const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const WORD_CHAR = /[\p{L}\p{N}]/u;
const WORD = /[\p{L}\p{N}]+(?:['’]\p{L}+)*/gu;
const INFLECTIONS = new Set(["", "s", "es", "d", "ed", "ing"]);

const isWordChar = (ch: string | undefined): boolean => ch !== undefined && WORD_CHAR.test(ch);
const isLower = (ch: string | undefined): boolean =>
  ch !== undefined && ch !== ch.toUpperCase() && ch === ch.toLowerCase();
const isUpper = (ch: string | undefined): boolean =>
  ch !== undefined && ch !== ch.toLowerCase() && ch === ch.toUpperCase();

// A lower→upper transition ("OpenAI") splits a camel-case compound into words.
const isCamelSplit = (text: string, index: number): boolean => isLower(text[index - 1]) && isUpper(text[index]);

const isBoundaryBefore = (text: string, index: number, camelCase: boolean): boolean =>
  !isWordChar(text[index - 1]) || (camelCase && isCamelSplit(text, index));

const isBoundaryAfter = (text: string, index: number, camelCase: boolean): boolean =>
  !isWordChar(text[index]) || (camelCase && isCamelSplit(text, index));

export type FindOptions = {
  /** Also match regular inflections (-s, -es, -d, -ed, -ing) of the last word. */
  inflections?: boolean;
  /** Also accept a camel-case transition as a word boundary. */
  camelCase?: boolean;
};

export const findPhrase = (text: string, phrase: string, options: FindOptions = {}): TextSpan[] => {
  const needle = normalizeSingleLine(phrase);
  if (!needle || !text) {
    return [];
  }

  const body = needle.split(" ").map(escapeRegExp).join("\\s+");
  const pattern = new RegExp(options.inflections ? `${body}(\\p{L}*)` : body, "giu");
  const checkStart = isWordChar(needle[0]);
  const checkEnd = isWordChar(needle[needle.length - 1]);
  const camelCase = options.camelCase ?? false;
  const spans: TextSpan[] = [];

  let match: RegExpExecArray | null = pattern.exec(text);
  while (match) {
    const start = match.index;
    const end = start + match[0].length;
    const suffix = (match[1] ?? "").toLowerCase();

    const suffixAllowed = !options.inflections || INFLECTIONS.has(suffix);
    const startOk = !checkStart || isBoundaryBefore(text, start, camelCase);
    const endOk = !checkEnd || isBoundaryAfter(text, end, camelCase);

    if (suffixAllowed && startOk && endOk) {
      spans.push({ start, end });
    } else {
      pattern.lastIndex = start + 1;
    }

    match = pattern.exec(text);
  }

  return spans;
};

export const tokenizeWords = (text: string): TextSpan[] =>
  Array.from(text.matchAll(WORD), (match) => ({
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }));

export const spansOverlap = (a: TextSpan, b: TextSpan): boolean => a.start < b.end && b.start < a.end;
