import { type AggregateSnapshot, Aggregator } from "../aggregate/aggregator";
import type { AliasIndex } from "../attribution/aliasIndex";
import type { ContextDisambiguator } from "../attribution/disambiguator";
import { scan } from "../attribution/scanner";
import type { Article } from "../core/article";
import { type DedupMarkFailed, type ScoringFailureReason, ScoringUnavailable, errorMessage } from "../core/errors";
import type { SentimentResult } from "../core/sentiment";
import type { Deduplicator } from "../dedup/deduplicator";
import type { SentimentScorer } from "../sentiment/scorer";

export type ScanCycleInput = {
  articles: readonly Article[];
  index: AliasIndex;
  disambiguator: ContextDisambiguator;
  scorer: SentimentScorer;
  deduplicator: Deduplicator;
  concurrency: number;
  timeoutMs: number;
  topHeadlines?: number;
  signal?: AbortSignal;
};

export type ScanStats = {
  received: number;
  duplicates: number;
  processed: number;
  mentionsAccepted: number;
  mentionsRejected: number;
  scoringUnavailable: number;
  timedOut: number;
  cancelled: number;
  dedupErrors: number;
  markFailures: number;
  errors: number;
};

export type ScanCycleResult = {
  snapshot: AggregateSnapshot;
  stats: ScanStats;
  warnings: string[];
  /** Ids folded into the snapshot, still claimed and not yet marked seen. */
  folded: string[];
};

const emptyStats = (received: number): ScanStats => ({
  received,
  duplicates: 0,
  processed: 0,
  mentionsAccepted: 0,
  mentionsRejected: 0,
  scoringUnavailable: 0,
  timedOut: 0,
  cancelled: 0,
  dedupErrors: 0,
  markFailures: 0,
  errors: 0,
});

export const scoreWithTimeout = (
  scorer: SentimentScorer,
  article: Article,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<SentimentResult> =>
  new Promise<SentimentResult>((resolve, reject) => {
    const controller = new AbortController();

    const cleanup = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };
    const fail = (reason: ScoringFailureReason): void => {
      cleanup();
      controller.abort();
      reject(new ScoringUnavailable(article.id, reason));
    };
    const onAbort = (): void => fail("aborted");
    const timer = setTimeout(() => fail("timeout"), timeoutMs);

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    void scorer.score(article, { signal: controller.signal }).then(
      (result) => {
        cleanup();
        resolve(result);
      },
      (error: unknown) => {
        cleanup();
        reject(
          error instanceof ScoringUnavailable
            ? error
            : new ScoringUnavailable(article.id, controller.signal.aborted ? "aborted" : "failed", { cause: error }),
        );
      },
    );
  });

export async function runScanCycle(input: ScanCycleInput): Promise<ScanCycleResult> {
  const { articles, index, disambiguator, scorer, deduplicator, signal } = input;

  if (!Number.isInteger(input.concurrency) || input.concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${input.concurrency}`);
  }
  if (!(input.timeoutMs > 0)) {
    throw new RangeError(`timeoutMs must be positive, got ${input.timeoutMs}`);
  }

  const aggregator = new Aggregator({
    symbols: index.symbols(),
    strategy: scorer.strategy,
    topHeadlines: input.topHeadlines,
  });
  const stats = emptyStats(articles.length);
  const warnings: string[] = [];
  const folded: string[] = [];

  const warn = (message: string): void => {
    warnings.push(message);
    console.warn(`[scan] ${message}`);
  };

  const processArticle = async (article: Article): Promise<void> => {
    if (signal?.aborted) {
      stats.cancelled += 1;
      return;
    }

    let claimed: boolean;
    try {
      claimed = await deduplicator.claim(article.id);
    } catch (error) {
      stats.dedupErrors += 1;
      warn(`Dedup store unavailable for ${article.id}; article skipped (${errorMessage(error)})`);
      return;
    }
    if (!claimed) {
      stats.duplicates += 1;
      return;
    }

    try {
      const mentions = disambiguator.disambiguate(scan(article, index), article);
      const result = await scoreWithTimeout(scorer, article, input.timeoutMs, signal);

      if (aggregator.fold(mentions, result, article)) {
        folded.push(article.id);
      }
      stats.processed += 1;
      for (const mention of mentions) {
        if (mention.accepted) {
          stats.mentionsAccepted += 1;
        } else {
          stats.mentionsRejected += 1;
        }
      }
    } catch (error) {
      deduplicator.release(article.id);

      if (error instanceof ScoringUnavailable) {
        if (error.reason === "timeout") {
          stats.timedOut += 1;
        } else if (error.reason === "aborted") {
          stats.cancelled += 1;
        } else {
          stats.scoringUnavailable += 1;
        }
        console.warn(`[scan] ${error.message}`, error.cause ?? "");
        return;
      }

      stats.errors += 1;
      console.error(`[scan] failed article_id=${article.id}`, error);
    }
  };

  const workerCount = Math.min(input.concurrency, articles.length);
  let cursor = 0;

  const workers = Array.from({ length: workerCount }, async () => {
    while (true) {
      const currentIndex = cursor;
      cursor += 1;

      if (currentIndex >= articles.length) {
        return;
      }

      const article = articles[currentIndex];
      if (!article) {
        return;
      }

      await processArticle(article);
    }
  });

  await Promise.all(workers);

  return { snapshot: aggregator.snapshot(), stats, warnings, folded };
}

/**
 * Marks the cycle's folded articles as seen. Call only after the cycle's
 * report has been recorded; a failed mark is returned as a warning.
 */
export async function commitFolded(deduplicator: Deduplicator, result: ScanCycleResult): Promise<ScanCycleResult> {
  const failures: DedupMarkFailed[] = [];

  for (const articleId of result.folded) {
    const failure = await deduplicator.commit(articleId);
    if (failure) {
      console.warn(`[scan] ${failure.message}`);
      failures.push(failure);
    }
  }

  return {
    ...result,
    stats: { ...result.stats, markFailures: result.stats.markFailures + failures.length },
    warnings: [...result.warnings, ...failures.map((failure) => failure.message)],
  };
}
