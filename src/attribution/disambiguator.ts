import { type Article, articleText } from "../core/article";
import { ConfigError } from "../core/errors";
import type { Mention, RejectionReason } from "../core/mention";
import { type TextSpan, findPhrase, normalizeSingleLine, spansOverlap, tokenizeWords } from "../core/text";
import type { AliasIndex, DisambiguationPolicy } from "./aliasIndex";

export const DEFAULT_WINDOW_WORDS = 10;

export type Verdict = { accepted: true } | { accepted: false; reason: RejectionReason };

export type DisambiguatorOptions = {
  defaultWindowWords?: number;
};

const normalizeTerm = (term: string): string => normalizeSingleLine(term).toLowerCase();

export const validatePolicy = (symbol: string, alias: string, policy: DisambiguationPolicy): string[] => {
  const problems: string[] = [];
  const where = `${symbol} alias "${alias}"`;

  if (policy.ambiguous && policy.cooccurrence.length === 0) {
    problems.push(`${where}: ambiguous alias needs at least one co-occurrence term`);
  }
  if (!policy.ambiguous && policy.cooccurrence.length > 0) {
    problems.push(`${where}: co-occurrence terms only apply to an ambiguous alias`);
  }
  if (policy.windowWords !== undefined && (!Number.isInteger(policy.windowWords) || policy.windowWords < 1)) {
    problems.push(`${where}: windowWords must be a positive integer`);
  }

  const required = new Set(policy.cooccurrence.map(normalizeTerm));
  for (const phrase of policy.negative) {
    const term = normalizeTerm(phrase);
    if (required.has(term)) {
      problems.push(`${where}: "${phrase}" is both a co-occurrence term and a negative pattern`);
    }
    if (term === normalizeTerm(alias)) {
      problems.push(`${where}: negative pattern "${phrase}" would reject every match`);
    }
  }

  return problems;
};

type WordRange = { first: number; last: number };

const wordRange = (words: readonly TextSpan[], span: TextSpan): WordRange | null => {
  let first = -1;
  let last = -1;

  words.forEach((word, index) => {
    if (spansOverlap(word, span)) {
      if (first === -1) {
        first = index;
      }
      last = index;
    }
  });

  return first === -1 ? null : { first, last };
};

const wordDistance = (a: WordRange, b: WordRange): number => {
  if (b.first > a.last) {
    return b.first - a.last;
  }
  if (a.first > b.last) {
    return a.first - b.last;
  }
  return 0;
};

const hasWordBetween = (words: readonly TextSpan[], from: number, to: number): boolean =>
  words.some((word) => word.start >= from && word.end <= to);

const isAdjacent = (words: readonly TextSpan[], a: TextSpan, b: TextSpan): boolean => {
  if (a.end <= b.start) {
    return !hasWordBetween(words, a.end, b.start);
  }
  if (b.end <= a.start) {
    return !hasWordBetween(words, b.end, a.start);
  }
  return true;
};

export class ContextDisambiguator {
  private readonly defaultWindowWords: number;

  constructor(
    private readonly index: AliasIndex,
    options: DisambiguatorOptions = {},
  ) {
    this.defaultWindowWords = options.defaultWindowWords ?? DEFAULT_WINDOW_WORDS;
    if (!Number.isInteger(this.defaultWindowWords) || this.defaultWindowWords < 1) {
      throw new ConfigError(`Disambiguation window must be a positive integer, got ${this.defaultWindowWords}`);
    }

    const problems = index
      .lookup()
      .flatMap((entry) =>
        entry.aliases.flatMap(({ alias, policy }) => (policy ? validatePolicy(entry.symbol, alias, policy) : [])),
      );
    if (problems.length > 0) {
      throw new ConfigError("Invalid disambiguation policy", problems);
    }
  }

  private policyFor(mention: Mention): DisambiguationPolicy | undefined {
    return this.index.get(mention.symbol)?.aliases.find((entry) => entry.alias === mention.matchedAlias)?.policy;
  }

  validateText(mention: Mention, text: string): Verdict {
    const policy = this.policyFor(mention);
    if (!policy) {
      return { accepted: true };
    }

    const span: TextSpan = { start: mention.spanStart, end: mention.spanEnd };
    const words = tokenizeWords(text);

    // Negative patterns are checked first and always win.
    const negativeHit = policy.negative.some((phrase) =>
      findPhrase(text, phrase).some((occurrence) => spansOverlap(occurrence, span) || isAdjacent(words, occurrence, span)),
    );
    if (negativeHit) {
      return { accepted: false, reason: "negative_match" };
    }

    if (!policy.ambiguous) {
      return { accepted: true };
    }

    const mentionWords = wordRange(words, span);
    const window = policy.windowWords ?? this.defaultWindowWords;
    const supported =
      mentionWords !== null &&
      policy.cooccurrence.some((term) =>
        findPhrase(text, term).some((occurrence) => {
          if (spansOverlap(occurrence, span)) {
            return false;
          }
          const termWords = wordRange(words, occurrence);
          return termWords !== null && wordDistance(mentionWords, termWords) <= window;
        }),
      );

    return supported ? { accepted: true } : { accepted: false, reason: "no_context" };
  }

  validate(mention: Mention, article: Article): Verdict {
    return this.validateText(mention, articleText(article));
  }

  disambiguate(mentions: readonly Mention[], article: Article): Mention[] {
    const text = articleText(article);

    return mentions.map((mention) => {
      const verdict = this.validateText(mention, text);
      return Object.freeze(
        verdict.accepted
          ? { ...mention, accepted: true }
          : { ...mention, accepted: false, rejectionReason: verdict.reason },
      );
    });
  }
}

export const acceptedSymbols = (mentions: readonly Mention[]): string[] => [
  ...new Set(mentions.filter((mention) => mention.accepted === true).map((mention) => mention.symbol)),
];
