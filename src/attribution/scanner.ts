import { type Article, articleText } from "../core/article";
import type { Mention } from "../core/mention";
import { findPhrase, spansOverlap } from "../core/text";
import type { AliasIndex } from "./aliasIndex";

type Candidate = Mention & { aliasIndex: number };

const spanLength = (mention: Mention): number => mention.spanEnd - mention.spanStart;

// Longest alias wins an overlap; equal lengths fall back to configuration order.
const preferred = (a: Candidate, b: Candidate): number =>
  spanLength(b) - spanLength(a) || a.aliasIndex - b.aliasIndex || a.spanStart - b.spanStart;

const dropOverlaps = (candidates: Candidate[]): Mention[] => {
  const kept: Candidate[] = [];

  for (const candidate of [...candidates].sort(preferred)) {
    const span = { start: candidate.spanStart, end: candidate.spanEnd };
    const clashes = kept.some((other) => spansOverlap(span, { start: other.spanStart, end: other.spanEnd }));
    if (!clashes) {
      kept.push(candidate);
    }
  }

  return kept
    .sort((a, b) => a.spanStart - b.spanStart)
    .map(({ aliasIndex: _aliasIndex, ...mention }) => mention);
};

export const scanText = (articleId: string, text: string, index: AliasIndex): Mention[] => {
  if (!text.trim()) {
    return [];
  }

  const mentions: Mention[] = [];

  for (const entry of index.lookup()) {
    const candidates: Candidate[] = [];

    entry.aliases.forEach(({ alias, policy }, aliasIndex) => {
      // Only aliases guarded by a policy may match the head of a camel-case compound.
      for (const span of findPhrase(text, alias, { camelCase: policy !== undefined })) {
        candidates.push({
          articleId,
          symbol: entry.symbol,
          matchedAlias: alias,
          spanStart: span.start,
          spanEnd: span.end,
          aliasIndex,
        });
      }
    });

    mentions.push(...dropOverlaps(candidates));
  }

  return mentions;
};

export const scan = (article: Article, index: AliasIndex): Mention[] =>
  scanText(article.id, articleText(article), index);
