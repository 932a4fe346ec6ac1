import { type SupabaseClient, createClient } from "@supabase/supabase-js";
import type { AggregateSnapshot } from "../aggregate/aggregator";
import type { DedupStore } from "../dedup/store";
import type { ScanStats } from "../scan/cycle";

export type ScanReportRow = {
  id: number;
  scanned_at: string;
  strategy: string;
  stats: ScanStats;
  snapshot: AggregateSnapshot;
  warnings: string[];
};

export const getSupabaseClient = (): SupabaseClient => {
  const supabaseUrl = process.env.SUPABASE_URL;
  const supabaseKey = process.env.SUPABASE_SERVICE_KEY;

  if (!supabaseUrl || !supabaseKey) {
    throw new Error("SUPABASE_URL and SUPABASE_SERVICE_KEY environment variables are required");
  }

  return createClient(supabaseUrl, supabaseKey);
};

export class SupabaseDedupStore implements DedupStore {
  constructor(private readonly supabase: SupabaseClient = getSupabaseClient()) {}

  async has(articleId: string): Promise<boolean> {
    const { count, error } = await this.supabase
      .from("seen_articles")
      .select("article_id", { count: "exact", head: true })
      .eq("article_id", articleId);

    if (error) {
      throw new Error(`Failed to check seen_articles: ${error.message}`);
    }

    return (count ?? 0) > 0;
  }

  async mark(articleId: string): Promise<void> {
    const { error } = await this.supabase
      .from("seen_articles")
      .upsert({ article_id: articleId, seen_at: new Date().toISOString() }, {
        onConflict: "article_id",
        ignoreDuplicates: true,
      });

    if (error) {
      throw new Error(`Failed to mark article as seen: ${error.message}`);
    }
  }
}

export async function saveScanReport(
  report: { stats: ScanStats; snapshot: AggregateSnapshot; warnings: string[] },
  supabase: SupabaseClient = getSupabaseClient(),
): Promise<void> {
  const { error } = await supabase.from("scan_reports").insert({
    scanned_at: new Date().toISOString(),
    strategy: report.snapshot.strategy,
    stats: report.stats,
    snapshot: report.snapshot,
    warnings: report.warnings,
  });

  if (error) {
    throw new Error(`Failed to save scan report: ${error.message}`);
  }
}

export async function fetchLatestScanReport(
  supabase: SupabaseClient = getSupabaseClient(),
): Promise<ScanReportRow | null> {
  const { data, error } = await supabase
    .from("scan_reports")
    .select("id, scanned_at, strategy, stats, snapshot, warnings")
    .order("scanned_at", { ascending: false })
    .limit(1)
    .maybeSingle<ScanReportRow>();

  if (error) {
    throw new Error(`Failed to fetch latest scan report: ${error.message}`);
  }

  return data;
}

export async function fetchScanReportsList(
  limit: number,
  offset: number,
  supabase: SupabaseClient = getSupabaseClient(),
): Promise<{ data: ScanReportRow[]; total: number }> {
  const { data, error, count } = await supabase
    .from("scan_reports")
    .select("id, scanned_at, strategy, stats, snapshot, warnings", { count: "exact" })
    .order("scanned_at", { ascending: false })
    .range(offset, offset + limit - 1)
    .returns<ScanReportRow[]>();

  if (error) {
    throw new Error(`Failed to fetch scan reports list: ${error.message}`);
  }

  return {
    data: data ?? [],
    total: count ?? 0,
  };
}
