import * as cron from "node-cron";
import { config } from "../config";
import { type ScanRunSummary, runScan } from "../scan/service";

type ScanSource = "manual" | "cron";

export type TriggerResult =
  | { started: true }
  | {
      started: false;
      reason: "already_running";
      runningSince: string | null;
    };

export type LastScan = {
  source: ScanSource;
  finishedAt: string;
  durationMs: number;
  ok: boolean;
  processed?: number;
  warnings?: string[];
  error?: string;
};

export const createJobController = (runner: (signal: AbortSignal) => Promise<ScanRunSummary> = (signal) => runScan({ signal })) => {
  let isScanRunning = false;
  let scanStartedAtIso: string | null = null;
  let abortController: AbortController | null = null;
  let lastScan: LastScan | null = null;
  let running: Promise<void> | null = null;

  const runScanJob = async (source: ScanSource, startedAtMs: number, signal: AbortSignal): Promise<void> => {
    try {
      const summary = await runner(signal);
      const durationMs = Date.now() - startedAtMs;
      lastScan = {
        source,
        finishedAt: new Date().toISOString(),
        durationMs,
        ok: true,
        processed: summary.stats.processed,
        warnings: summary.warnings,
      };
      console.log(
        `[${new Date().toISOString()}] Scan completed (source=${source}, durationMs=${durationMs}, processed=${summary.stats.processed}, skipped=${summary.stats.scoringUnavailable + summary.stats.timedOut}, warnings=${summary.warnings.length})`,
      );
    } catch (error) {
      const durationMs = Date.now() - startedAtMs;
      lastScan = {
        source,
        finishedAt: new Date().toISOString(),
        durationMs,
        ok: false,
        error: error instanceof Error ? error.message : String(error),
      };
      console.error(`[${new Date().toISOString()}] Scan failed (source=${source}, durationMs=${durationMs})`, error);
    } finally {
      const finishedAt = new Date().toISOString();
      isScanRunning = false;
      scanStartedAtIso = null;
      abortController = null;
      console.log(`[${finishedAt}] Scan lock released (source=${source})`);
    }
  };

  const triggerScan = (source: ScanSource): TriggerResult => {
    if (isScanRunning) {
      return {
        started: false,
        reason: "already_running",
        runningSince: scanStartedAtIso,
      };
    }

    isScanRunning = true;
    const startedAtMs = Date.now();
    scanStartedAtIso = new Date(startedAtMs).toISOString();
    abortController = new AbortController();

    console.log(`[${scanStartedAtIso}] Scan lock acquired (source=${source})`);

    running = runScanJob(source, startedAtMs, abortController.signal);

    return { started: true };
  };

  // Aborts the running scan; unfinished articles stay unmarked and are picked up next time.
  const shutdown = async (): Promise<void> => {
    abortController?.abort();
    await running;
  };

  return {
    triggerScan,
    shutdown,
    getRuntimeState: () => ({
      isScanRunning,
      scanStartedAtIso,
      lastScan,
    }),
  };
};

export type JobController = ReturnType<typeof createJobController>;

export const registerSchedules = (jobController: JobController): void => {
  if (!cron.validate(config.scanSchedule)) {
    throw new Error(`Invalid SCAN_SCHEDULE cron expression: ${config.scanSchedule}`);
  }

  cron.schedule(
    config.scanSchedule,
    () => {
      const result = jobController.triggerScan("cron");
      if (!result.started) {
        console.warn(`Scheduled scan skipped: already running since ${result.runningSince ?? "unknown"}`);
      }
    },
    {
      timezone: config.scheduleTimezone,
    },
  );
};
