import type { ScoringStrategy } from "./src/core/sentiment";
import { formatReportText } from "./src/io/output";
import { runScan } from "./src/scan/service";

type CliOptions = {
  dryRun: boolean;
  strategy?: ScoringStrategy;
};

const getArgValue = (argv: string[], key: string): string | undefined => {
  const index = argv.findIndex((arg) => arg === key);
  return index === -1 ? undefined : argv[index + 1];
};

const parseArgs = (argv: string[]): CliOptions => {
  const rawStrategy = getArgValue(argv, "--strategy")?.toUpperCase();

  if (rawStrategy !== undefined && rawStrategy !== "LEXICAL" && rawStrategy !== "MODEL") {
    throw new Error(`\`--strategy\` must be lexical or model. Got: ${rawStrategy.toLowerCase()}`);
  }

  return {
    dryRun: argv.includes("--dry-run"),
    ...(rawStrategy ? { strategy: rawStrategy } : {}),
  };
};

const main = async (): Promise<void> => {
  const options = parseArgs(process.argv.slice(2));
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const summary = await runScan({ ...options, signal: controller.signal });
  console.log(`\n${formatReportText(summary, new Date().toISOString())}`);

  if (summary.feedFailures.length > 0) {
    console.warn(`Feeds failed: ${summary.feedFailures.map((failure) => failure.url).join(", ")}`);
  }
  console.log(`\nSaved: ${summary.txtPath}, ${summary.jsonPath}`);
};

main().catch((error) => {
  console.error("Scan failed:", error);
  process.exit(1);
});
