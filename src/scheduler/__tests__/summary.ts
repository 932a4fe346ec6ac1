import { Aggregator } from "../../aggregate/aggregator";
import type { ScanRunSummary } from "../../scan/service";

export const emptySummary = (processed = 0): ScanRunSummary => ({
  snapshot: new Aggregator({ symbols: [], strategy: "LEXICAL" }).snapshot(),
  stats: {
    received: processed,
    duplicates: 0,
    processed,
    mentionsAccepted: 0,
    mentionsRejected: 0,
    scoringUnavailable: 0,
    timedOut: 0,
    cancelled: 0,
    dedupErrors: 0,
    markFailures: 0,
    errors: 0,
  },
  warnings: [],
  folded: [],
  feedFailures: [],
  txtPath: "out/report.txt",
  jsonPath: "out/report.json",
});
