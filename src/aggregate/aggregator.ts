import type { Article } from "../core/article";
import { type Mention, isAccepted } from "../core/mention";
import { type ScoringStrategy, type SentimentLabel, type SentimentResult, labelForScore } from "../core/sentiment";

export const MARKET_KEY = "overall";
export const DEFAULT_TOP_HEADLINES = 5;

// Scores are summed as integers so the totals do not depend on fold order.
const SCORE_UNITS = 1_000_000;

export type Headline = {
  article: Article;
  sentiment: SentimentResult;
};

export type AggregateView = {
  key: string;
  articleCount: number;
  scoreSum: number;
  average: number | null;
  label: SentimentLabel | null;
  topHeadlines: readonly Headline[];
};

export type AggregateSnapshot = {
  strategy: ScoringStrategy;
  market: AggregateView;
  tickers: Readonly<Record<string, AggregateView>>;
};

export type AggregatorOptions = {
  symbols: readonly string[];
  strategy: ScoringStrategy;
  topHeadlines?: number;
};

const publishedMs = (article: Article): number => {
  const ms = Date.parse(article.publishedAt);
  return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
};

export const compareHeadlines = (a: Headline, b: Headline): number => {
  const byMagnitude = Math.abs(b.sentiment.score) - Math.abs(a.sentiment.score);
  if (byMagnitude !== 0) {
    return byMagnitude;
  }

  const aMs = publishedMs(a.article);
  const bMs = publishedMs(b.article);
  if (aMs !== bMs) {
    return bMs > aMs ? 1 : -1;
  }

  if (a.article.id === b.article.id) {
    return 0;
  }
  return a.article.id < b.article.id ? -1 : 1;
};

class RunningAggregate {
  private articleCount = 0;
  private scoreUnits = 0;
  private headlines: Headline[] = [];

  constructor(
    private readonly key: string,
    private readonly limit: number,
  ) {}

  add(article: Article, sentiment: SentimentResult): void {
    this.articleCount += 1;
    this.scoreUnits += Math.round(sentiment.score * SCORE_UNITS);

    if (this.limit === 0) {
      return;
    }
    this.headlines.push({ article, sentiment });
    this.headlines.sort(compareHeadlines);
    if (this.headlines.length > this.limit) {
      this.headlines.length = this.limit;
    }
  }

  view(strategy: ScoringStrategy): AggregateView {
    const scoreSum = this.scoreUnits / SCORE_UNITS;
    const average = this.articleCount === 0 ? null : scoreSum / this.articleCount;

    return {
      key: this.key,
      articleCount: this.articleCount,
      scoreSum,
      average,
      label: average === null ? null : labelForScore(strategy, average),
      topHeadlines: Object.freeze([...this.headlines]),
    };
  }
}

export class Aggregator {
  private readonly strategy: ScoringStrategy;
  private readonly limit: number;
  private readonly market: RunningAggregate;
  private readonly tickers = new Map<string, RunningAggregate>();
  private readonly folded = new Set<string>();

  constructor(options: AggregatorOptions) {
    this.strategy = options.strategy;
    this.limit = options.topHeadlines ?? DEFAULT_TOP_HEADLINES;
    if (!Number.isInteger(this.limit) || this.limit < 0) {
      throw new RangeError(`topHeadlines must be a non-negative integer, got ${this.limit}`);
    }

    this.market = new RunningAggregate(MARKET_KEY, this.limit);
    for (const symbol of options.symbols) {
      this.tickerAggregate(symbol);
    }
  }

  private tickerAggregate(symbol: string): RunningAggregate {
    let aggregate = this.tickers.get(symbol);
    if (!aggregate) {
      aggregate = new RunningAggregate(symbol, this.limit);
      this.tickers.set(symbol, aggregate);
    }
    return aggregate;
  }

  /** Returns false when the article was already folded in this cycle. */
  fold(mentions: readonly Mention[], result: SentimentResult, article: Article): boolean {
    if (result.strategy !== this.strategy) {
      throw new Error(`Cannot fold a ${result.strategy} result into a ${this.strategy} aggregate`);
    }
    if (this.folded.has(article.id)) {
      return false;
    }
    this.folded.add(article.id);

    this.market.add(article, result);

    const symbols = new Set(mentions.filter(isAccepted).map((mention) => mention.symbol));
    for (const symbol of symbols) {
      this.tickerAggregate(symbol).add(article, result);
    }

    return true;
  }

  snapshot(): AggregateSnapshot {
    const tickers: Record<string, AggregateView> = {};
    for (const [symbol, aggregate] of this.tickers) {
      tickers[symbol] = aggregate.view(this.strategy);
    }

    return Object.freeze({
      strategy: this.strategy,
      market: this.market.view(this.strategy),
      tickers: Object.freeze(tickers),
    });
  }
}
