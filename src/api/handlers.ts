import { config } from "../config";
import { type ScanReportRow, fetchLatestScanReport, fetchScanReportsList } from "../db/supabase";
import type { JobController } from "../scheduler/jobs";

export type ReportReader = {
	fetchLatest: () => Promise<ScanReportRow | null>;
	fetchList: (limit: number, offset: number) => Promise<{ data: ScanReportRow[]; total: number }>;
};

export type ApiHandlerOptions = {
	triggerToken?: string;
	reports?: ReportReader;
};

const defaultReports: ReportReader = {
	fetchLatest: () => fetchLatestScanReport(),
	fetchList: (limit, offset) => fetchScanReportsList(limit, offset),
};

const getBearerToken = (authorizationHeader: string | null): string | null => {
	if (!authorizationHeader) {
		return null;
	}

	const [scheme, token] = authorizationHeader.split(" ");
	if (!scheme || !token || scheme.toLowerCase() !== "bearer") {
		return null;
	}

	return token;
};

const methodNotAllowed = (allow: string): Response =>
	new Response("Method Not Allowed", {
		status: 405,
		headers: { Allow: allow },
	});

export const createApiHandler =
	(jobController: JobController, options: ApiHandlerOptions = { triggerToken: config.triggerToken }) =>
	(req: Request): Promise<Response> | Response => {
		const url = new URL(req.url);
		const triggerToken = options.triggerToken;
		const reports = options.reports ?? defaultReports;

		if (url.pathname === "/health") {
			return new Response("OK", { status: 200 });
		}

		if (url.pathname === "/trigger-scan") {
			if (req.method !== "POST") {
				return methodNotAllowed("POST");
			}

			if (!triggerToken) {
				console.error("TRIGGER_TOKEN is not configured");
				return new Response("Trigger token is not configured", { status: 503 });
			}

			const providedToken = getBearerToken(req.headers.get("authorization"));
			if (!providedToken) {
				return new Response("Unauthorized", {
					status: 401,
					headers: { "WWW-Authenticate": 'Bearer realm="trigger-scan"' },
				});
			}

			if (providedToken !== triggerToken) {
				return new Response("Forbidden", { status: 403 });
			}

			const result = jobController.triggerScan("manual");
			if (!result.started) {
				console.warn(`Manual trigger rejected: scan already running since ${result.runningSince ?? "unknown"}`);
				return new Response("Scan is already running", { status: 409 });
			}

			return new Response("Scan job triggered", { status: 202 });
		}

		if (url.pathname === "/scan/status") {
			if (req.method !== "GET") {
				return methodNotAllowed("GET");
			}

			const state = jobController.getRuntimeState();
			return Response.json({
				running: state.isScanRunning,
				runningSince: state.scanStartedAtIso,
				lastScan: state.lastScan,
			});
		}

		if (url.pathname === "/api/reports/latest") {
			if (req.method !== "GET") {
				return methodNotAllowed("GET");
			}

			return reports
				.fetchLatest()
				.then((report) => {
					if (!report) {
						return new Response("Report not found", { status: 404 });
					}
					return Response.json({ success: true, data: report });
				})
				.catch((error) => {
					console.error("Failed to fetch latest scan report", error);
					return new Response("Failed to fetch latest scan report", { status: 500 });
				});
		}

		if (url.pathname === "/api/reports") {
			if (req.method !== "GET") {
				return methodNotAllowed("GET");
			}

			const page = Number.parseInt(url.searchParams.get("page") ?? "1", 10);
			const pageSize = Math.min(Number.parseInt(url.searchParams.get("pageSize") ?? "20", 10), 100);

			if (Number.isNaN(page) || Number.isNaN(pageSize) || page < 1 || pageSize < 1) {
				return new Response("Invalid pagination parameters", { status: 400 });
			}

			return reports
				.fetchList(pageSize, (page - 1) * pageSize)
				.then((result) => Response.json({ success: true, page, pageSize, ...result }))
				.catch((error) => {
					console.error("Failed to fetch scan reports list", error);
					return new Response("Failed to fetch scan reports list", { status: 500 });
				});
		}

		return new Response("Ticker Sentiment Monitor", { status: 200 });
	};
