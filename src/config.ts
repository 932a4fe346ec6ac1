import { z } from "zod";

export const DEFAULT_FEEDS = [
	"https://feeds.finance.yahoo.com/rss/2.0/headline?s=yhoo,goog&region=US&lang=en-US",
	"https://www.cnbc.com/id/100003114/device/rss/rss.html",
	"https://www.investing.com/rss/news.rss",
	"https://www.marketwatch.com/rss/topstories",
	"https://seekingalpha.com/market_currents.xml",
];

const configSchema = z.object({
	// Server
	port: z.number().default(3000),
	env: z.enum(["development", "production", "test"]).default("development"),

	// Tickers
	watchTickers: z.array(z.string().min(1)).default([]),
	tickersFile: z.string().min(1).default("config/tickers.json"),
	disambiguationWindowWords: z.number().int().positive().default(10),

	// Feeds
	feeds: z.array(z.string().url()).min(1).default(DEFAULT_FEEDS),
	feedItemLimit: z.number().int().positive().default(10),
	feedTimeoutMs: z.number().int().positive().default(15000),

	// Sentiment scoring
	scoringStrategy: z.enum(["LEXICAL", "MODEL"]).default("LEXICAL"),
	keywordsFile: z.string().min(1).default("config/keywords.json"),
	aiModel: z.string().default("gpt-4o-mini"),
	scoringTimeoutMs: z.number().int().positive().default(20000),
	concurrency: z.number().int().positive().default(3),
	topHeadlines: z.number().int().nonnegative().default(5),

	// Schedule (after the US close)
	scanSchedule: z.string().default("5 16 * * 1-5"),
	scheduleTimezone: z.string().default("America/New_York"),

	// Output
	outputDir: z.string().default("out"),

	// Secrets (checked at runtime by the feature that needs them)
	supabaseUrl: z.string().min(1).optional(),
	supabaseKey: z.string().min(1).optional(),
	openaiKey: z.string().min(1).optional(),
	triggerToken: z.string().min(1).optional(),
});

type Config = z.infer<typeof configSchema>;

const parseList = (value: string | undefined): string[] | undefined => {
	if (!value) {
		return undefined;
	}

	const items = value
		.split(",")
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
	return items.length > 0 ? items : undefined;
};

const parseNumber = (value: string | undefined): number | undefined =>
	value === undefined || value.trim() === "" ? undefined : Number(value);

const parseStrategy = (value: string | undefined): string | undefined => value?.trim().toUpperCase() || undefined;

export const createConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
	const raw = {
		// Server
		port: parseNumber(env.PORT),
		env: env.NODE_ENV || "development",

		// Tickers
		watchTickers: parseList(env.WATCH_TICKERS),
		tickersFile: env.TICKERS_FILE,
		disambiguationWindowWords: parseNumber(env.DISAMBIGUATION_WINDOW_WORDS),

		// Feeds
		feeds: parseList(env.RSS_FEEDS),
		feedItemLimit: parseNumber(env.FEED_ITEM_LIMIT),
		feedTimeoutMs: parseNumber(env.FEED_TIMEOUT_MS),

		// Sentiment scoring
		scoringStrategy: parseStrategy(env.SCORING_STRATEGY),
		keywordsFile: env.KEYWORDS_FILE,
		aiModel: env.AI_MODEL,
		scoringTimeoutMs: parseNumber(env.SCORING_TIMEOUT_MS),
		concurrency: parseNumber(env.SCAN_CONCURRENCY),
		topHeadlines: parseNumber(env.TOP_HEADLINES),

		// Schedule
		scanSchedule: env.SCAN_SCHEDULE,
		scheduleTimezone: env.SCHEDULE_TIMEZONE,

		// Output
		outputDir: env.OUTPUT_DIR,

		// Secrets
		supabaseUrl: env.SUPABASE_URL,
		supabaseKey: env.SUPABASE_SERVICE_KEY,
		openaiKey: env.OPENAI_API_KEY,
		triggerToken: env.TRIGGER_TOKEN,
	};

	const result = configSchema.safeParse(raw);

	if (!result.success) {
		console.error("❌ Config validation failed:");
		for (const [key, errors] of Object.entries(result.error.flatten().fieldErrors)) {
			console.error(`  ${key}: ${(errors ?? []).join(", ")}`);
		}
		process.exit(1);
	}

	return result.data;
};

export const config = createConfig();
export type { Config };
