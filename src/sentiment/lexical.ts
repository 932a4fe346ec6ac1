import { readFile } from "node:fs/promises";
import { z } from "zod";
import { type Article, articleText } from "../core/article";
import { ConfigError } from "../core/errors";
import { type SentimentResult, labelFromRawCount, normalizeRawCount } from "../core/sentiment";
import { findPhrase } from "../core/text";
import type { ScoreOptions, SentimentScorer } from "./scorer";

const keywordListsSchema = z.object({
  bullish: z.array(z.string().trim().min(1)).min(1),
  bearish: z.array(z.string().trim().min(1)).min(1),
});

export type KeywordLists = z.infer<typeof keywordListsSchema>;

export const loadKeywordLists = async (filePath: string): Promise<KeywordLists> => {
  let parsed: unknown;

  try {
    parsed = JSON.parse(await readFile(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Cannot load keyword lists from ${filePath}`, [String(error)]);
  }

  const result = keywordListsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      `Invalid keyword lists in ${filePath}`,
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  return result.data;
};

const countKeywords = (text: string, keywords: readonly string[]): number =>
  keywords.reduce((total, keyword) => total + findPhrase(text, keyword, { inflections: true }).length, 0);

export const scoreLexically = (text: string, keywords: KeywordLists): SentimentResult => {
  const bullishCount = countKeywords(text, keywords.bullish);
  const bearishCount = countKeywords(text, keywords.bearish);
  const rawScore = bullishCount - bearishCount;

  return {
    score: normalizeRawCount(rawScore),
    label: labelFromRawCount(rawScore),
    strategy: "LEXICAL",
    lexical: { rawScore, bullishCount, bearishCount },
  };
};

export class LexicalScorer implements SentimentScorer {
  readonly strategy = "LEXICAL" as const;
  private readonly keywords: KeywordLists;

  constructor(keywords: KeywordLists) {
    const bullish = new Set(keywords.bullish.map((keyword) => keyword.toLowerCase()));
    const shared = keywords.bearish.filter((keyword) => bullish.has(keyword.toLowerCase()));
    if (shared.length > 0) {
      throw new ConfigError("Keywords listed as both bullish and bearish", shared);
    }

    this.keywords = { bullish: [...keywords.bullish], bearish: [...keywords.bearish] };
  }

  async score(article: Article, options: ScoreOptions = {}): Promise<SentimentResult> {
    options.signal?.throwIfAborted();
    return scoreLexically(articleText(article), this.keywords);
  }
}
