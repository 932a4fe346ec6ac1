import type { Article } from "../core/article";
import type { ScoringStrategy, SentimentResult } from "../core/sentiment";

export type ScoreOptions = {
  signal?: AbortSignal;
};

export interface SentimentScorer {
  readonly strategy: ScoringStrategy;
  score(article: Article, options?: ScoreOptions): Promise<SentimentResult>;
}
