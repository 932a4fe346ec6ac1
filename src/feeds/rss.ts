import type { Article } from "../core/article";
import { toArticleId } from "../core/articleId";
import { errorMessage } from "../core/errors";
import { normalizeSingleLine } from "../core/text";

export type FeedFailure = {
  url: string;
  error: string;
};

export type FeedBatch = {
  articles: Article[];
  failures: FeedFailure[];
};

export interface FeedSource {
  fetchArticles(signal?: AbortSignal): Promise<FeedBatch>;
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

const MAX_CODE_POINT = 0x10ffff;

const fromCodePoint = (codePoint: number, entity: string): string =>
  Number.isInteger(codePoint) && codePoint >= 0 && codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : entity;

const decodeEntities = (value: string): string =>
  value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body.startsWith("#x") || body.startsWith("#X")) {
      return fromCodePoint(Number.parseInt(body.slice(2), 16), entity);
    }
    if (body.startsWith("#")) {
      return fromCodePoint(Number.parseInt(body.slice(1), 10), entity);
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });

const unwrapCdata = (value: string): string => value.replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, "$1");

// Summaries often carry markup, sometimes entity-escaped.
const toPlainText = (value: string): string =>
  normalizeSingleLine(decodeEntities(decodeEntities(unwrapCdata(value)).replace(/<[^>]*>/g, " ")));

const readTag = (block: string, names: readonly string[]): string => {
  for (const name of names) {
    const match = block.match(new RegExp(`<${name}\\b[^>]*>([\\s\\S]*?)</${name}>`, "i"));
    if (match?.[1]) {
      const text = toPlainText(match[1]);
      if (text) {
        return text;
      }
    }
  }

  return "";
};

const readLink = (block: string): string => {
  const text = readTag(block, ["link"]);
  if (text) {
    return text;
  }

  const atomLink = block.match(/<link\b[^>]*\bhref="([^"]+)"[^>]*\/?>/i);
  return atomLink?.[1] ? decodeEntities(atomLink[1]).trim() : "";
};

const toIsoDate = (value: string, fallbackIso: string): string => {
  if (!value) {
    return fallbackIso;
  }

  const ms = Date.parse(value);
  return Number.isNaN(ms) ? fallbackIso : new Date(ms).toISOString();
};

export const parseFeed = (xml: string, feedUrl: string, limit: number, fetchedAtIso: string): Article[] => {
  const firstItemAt = xml.search(/<(item|entry)\b/i);
  const header = firstItemAt === -1 ? xml : xml.slice(0, firstItemAt);
  const source = readTag(header, ["title"]) || feedUrl;

  const itemRegex = /<(item|entry)\b[^>]*>([\s\S]*?)<\/\1>/gi;
  const articles: Article[] = [];

  let match: RegExpExecArray | null = itemRegex.exec(xml);
  while (match && articles.length < limit) {
    const block = match[2] ?? "";
    const title = readTag(block, ["title"]);
    const link = readLink(block);
    const summary = readTag(block, ["description", "summary", "content"]);

    if (title || link) {
      articles.push({
        id: toArticleId(link, title),
        title,
        summary,
        source,
        link,
        publishedAt: toIsoDate(readTag(block, ["pubDate", "published", "updated", "dc:date"]), fetchedAtIso),
      });
    }

    match = itemRegex.exec(xml);
  }

  return articles;
};

export class RssFeedSource implements FeedSource {
  constructor(
    private readonly feeds: readonly string[],
    private readonly itemLimit: number,
    private readonly timeoutMs: number,
  ) {}

  private async fetchFeed(url: string, signal?: AbortSignal): Promise<Article[]> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const response = await fetch(url, {
      headers: { "user-agent": "ticker-sentiment-monitor/0.1" },
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });
    if (!response.ok) {
      throw new Error(`feed request failed: HTTP ${response.status}`);
    }

    return parseFeed(await response.text(), url, this.itemLimit, new Date().toISOString());
  }

  async fetchArticles(signal?: AbortSignal): Promise<FeedBatch> {
    const settled = await Promise.allSettled(this.feeds.map((url) => this.fetchFeed(url, signal)));

    const articles: Article[] = [];
    const failures: FeedFailure[] = [];

    settled.forEach((result, index) => {
      const url = this.feeds[index] ?? "";
      if (result.status === "fulfilled") {
        console.log(`[feeds] ${url}: ${result.value.length} articles`);
        articles.push(...result.value);
        return;
      }

      const error = errorMessage(result.reason);
      console.warn(`[feeds] ${url} failed: ${error}`);
      failures.push({ url, error });
    });

    return { articles, failures };
  }
}
