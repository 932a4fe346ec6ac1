import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { AggregateView } from "../aggregate/aggregator";
import type { ScanCycleResult } from "../scan/cycle";

export const OUTPUT_REPORT_TXT_FILE = "report.txt";
export const OUTPUT_REPORT_JSON_FILE = "report.json";

const formatScore = (value: number, digits: number): string => (value > 0 ? "+" : "") + value.toFixed(digits);

const formatHeadlines = (view: AggregateView): string[] =>
	view.topHeadlines.map(({ article, sentiment }, index) =>
		[
			`  ${index + 1}. [${sentiment.label} ${formatScore(sentiment.score, 2)}] ${article.title || "(no title)"}`,
			`     ${article.source}${article.link ? ` | ${article.link}` : ""}`,
		].join("\n"),
	);

const formatAggregate = (title: string, view: AggregateView, emptyMessage: string): string => {
	if (view.average === null || view.label === null) {
		return [title, `  ${emptyMessage}`].join("\n");
	}

	return [
		`${title}: ${view.label} (avg ${formatScore(view.average, 3)}, ${view.articleCount} articles)`,
		...formatHeadlines(view),
	].join("\n");
};

export const formatReportText = (result: ScanCycleResult, generatedAtIso: string): string => {
	const { snapshot, stats, warnings } = result;
	const sections = [
		`Market & Ticker Sentiment Report (${generatedAtIso})`,
		`Strategy: ${snapshot.strategy}`,
		"",
		formatAggregate("Overall market", snapshot.market, "No articles processed."),
	];

	for (const [symbol, view] of Object.entries(snapshot.tickers)) {
		sections.push("", formatAggregate(`[${symbol}]`, view, `No articles mentioning ${symbol}.`));
	}

	sections.push(
		"",
		`Processed ${stats.processed}/${stats.received} (duplicates=${stats.duplicates}, scoringUnavailable=${stats.scoringUnavailable}, timedOut=${stats.timedOut}, cancelled=${stats.cancelled})`,
	);

	if (warnings.length > 0) {
		sections.push("Warnings:", ...warnings.map((warning) => `- ${warning}`));
	}

	return sections.join("\n");
};

export const writeReportOutputs = async (
	result: ScanCycleResult,
	outputDir: string,
	generatedAtIso: string = new Date().toISOString(),
): Promise<{ txtPath: string; jsonPath: string }> => {
	await mkdir(outputDir, { recursive: true });

	const txtPath = join(outputDir, OUTPUT_REPORT_TXT_FILE);
	const jsonPath = join(outputDir, OUTPUT_REPORT_JSON_FILE);

	await Promise.all([
		writeFile(txtPath, `${formatReportText(result, generatedAtIso)}\n`, "utf-8"),
		writeFile(jsonPath, `${JSON.stringify({ generatedAt: generatedAtIso, ...result }, null, 2)}\n`, "utf-8"),
	]);

	return { txtPath, jsonPath };
};
