import { type AliasIndex, createAliasIndex, loadTickerTable } from "../attribution/aliasIndex";
import { ContextDisambiguator } from "../attribution/disambiguator";
import { type Config, config } from "../config";
import type { ScoringStrategy } from "../core/sentiment";
import { SupabaseDedupStore, saveScanReport } from "../db/supabase";
import { Deduplicator } from "../dedup/deduplicator";
import { type DedupStore, InMemoryDedupStore } from "../dedup/store";
import { type FeedFailure, type FeedSource, RssFeedSource } from "../feeds/rss";
import { writeReportOutputs } from "../io/output";
import { createScorer } from "../sentiment/factory";
import { loadKeywordLists } from "../sentiment/lexical";
import { createOpenAiScoringModel } from "../sentiment/openaiModel";
import type { SentimentScorer } from "../sentiment/scorer";
import { type ScanCycleResult, commitFolded, runScanCycle } from "./cycle";

export type ScanEngine = {
  index: AliasIndex;
  disambiguator: ContextDisambiguator;
  scorer: SentimentScorer;
};

export type ScanRunOptions = {
  dryRun?: boolean;
  strategy?: ScoringStrategy;
  signal?: AbortSignal;
};

export type ScanRunDeps = {
  feedSource?: FeedSource;
  dedupStore?: DedupStore;
  saveReport?: (result: ScanCycleResult) => Promise<void>;
  outputDir?: string;
};

export type ScanRunSummary = ScanCycleResult & {
  feedFailures: FeedFailure[];
  txtPath: string;
  jsonPath: string;
};

const ensureModelEnv = (): void => {
  if (!config.openaiKey) {
    throw new Error("OPENAI_API_KEY is required for MODEL scoring");
  }
};

export async function createScanEngine(
  strategy: ScoringStrategy = config.scoringStrategy,
  settings: Pick<Config, "tickersFile" | "watchTickers" | "keywordsFile" | "aiModel" | "disambiguationWindowWords"> = config,
): Promise<ScanEngine> {
  const table = await loadTickerTable(settings.tickersFile);
  const watchTickers = settings.watchTickers.length > 0 ? settings.watchTickers : Object.keys(table);
  const index = createAliasIndex(table, watchTickers);
  const disambiguator = new ContextDisambiguator(index, {
    defaultWindowWords: settings.disambiguationWindowWords,
  });

  if (strategy === "MODEL") {
    ensureModelEnv();
    return { index, disambiguator, scorer: createScorer("MODEL", { model: createOpenAiScoringModel(settings.aiModel) }) };
  }

  const keywords = await loadKeywordLists(settings.keywordsFile);
  return { index, disambiguator, scorer: createScorer("LEXICAL", { keywords }) };
}

const createDedupStore = (dryRun: boolean): DedupStore => {
  if (dryRun) {
    return new InMemoryDedupStore();
  }
  return new SupabaseDedupStore();
};

export async function runScan(options: ScanRunOptions = {}, deps: ScanRunDeps = {}): Promise<ScanRunSummary> {
  const dryRun = options.dryRun ?? false;
  const feedSource = deps.feedSource ?? new RssFeedSource(config.feeds, config.feedItemLimit, config.feedTimeoutMs);
  const saveReport = deps.saveReport ?? ((result: ScanCycleResult) => saveScanReport(result));
  const engine = await createScanEngine(options.strategy);

  console.log(`[scan] watching ${engine.index.symbols().join(", ")} (strategy=${engine.scorer.strategy})`);

  const { articles, failures } = await feedSource.fetchArticles(options.signal);
  console.log(`[scan] fetched ${articles.length} articles from ${config.feeds.length} feeds`);

  const deduplicator = new Deduplicator(deps.dedupStore ?? createDedupStore(dryRun));
  const cycleResult = await runScanCycle({
    articles,
    ...engine,
    deduplicator,
    concurrency: config.concurrency,
    timeoutMs: config.scoringTimeoutMs,
    topHeadlines: config.topHeadlines,
    signal: options.signal,
  });

  // Articles become "seen" only once the report holding them is stored.
  if (!dryRun) {
    await saveReport(cycleResult);
  }
  const result = await commitFolded(deduplicator, cycleResult);

  const { stats } = result;
  console.log(
    `[scan] processed=${stats.processed} duplicates=${stats.duplicates} scoringUnavailable=${stats.scoringUnavailable} timedOut=${stats.timedOut} cancelled=${stats.cancelled} markFailures=${stats.markFailures}`,
  );
  for (const [symbol, view] of Object.entries(result.snapshot.tickers)) {
    console.log(`[scan]   ${symbol}: ${view.articleCount} articles`);
  }

  const { txtPath, jsonPath } = await writeReportOutputs(result, deps.outputDir ?? config.outputDir);

  return { ...result, feedFailures: failures, txtPath, jsonPath };
}
