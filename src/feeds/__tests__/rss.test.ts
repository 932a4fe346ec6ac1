import { afterEach, describe, expect, it, vi } from "vitest";
import { RssFeedSource, parseFeed } from "../rss";

const FETCHED_AT = "2026-10-19T20:00:00.000Z";

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Market Wire</title>
    <link>https://news.example.com</link>
    <item>
      <title><![CDATA[Opendoor &amp; peers rally]]></title>
      <link>https://news.example.com/a?utm_source=rss</link>
      <description>&lt;p&gt;Shares &lt;b&gt;jump&lt;/b&gt; 5%&lt;/p&gt;</description>
      <pubDate>Mon, 19 Oct 2026 14:00:00 GMT</pubDate>
    </item>
    <item>
      <title>Undated story</title>
      <link>https://news.example.com/b</link>
    </item>
    <item>
      <description>Item without title or link</description>
    </item>
  </channel>
</rss>`;

const ATOM = `<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom Wire</title>
  <entry>
    <title>Figma files for IPO</title>
    <link href="https://atom.example.com/figma"/>
    <summary>Design software maker</summary>
    <updated>2026-10-18T09:30:00Z</updated>
  </entry>
</feed>`;

describe("parseFeed", () => {
  it("reads RSS items into articles", () => {
    expect(parseFeed(RSS, "https://news.example.com/rss", 10, FETCHED_AT)).toEqual([
      {
        id: "news.example.com/a",
        title: "Opendoor & peers rally",
        summary: "Shares jump 5%",
        source: "Market Wire",
        link: "https://news.example.com/a?utm_source=rss",
        publishedAt: "2026-10-19T14:00:00.000Z",
      },
      {
        id: "news.example.com/b",
        title: "Undated story",
        summary: "",
        source: "Market Wire",
        link: "https://news.example.com/b",
        publishedAt: FETCHED_AT,
      },
    ]);
  });

  it("reads Atom entries", () => {
    expect(parseFeed(ATOM, "https://atom.example.com/feed", 10, FETCHED_AT)).toEqual([
      {
        id: "atom.example.com/figma",
        title: "Figma files for IPO",
        summary: "Design software maker",
        source: "Atom Wire",
        link: "https://atom.example.com/figma",
        publishedAt: "2026-10-18T09:30:00.000Z",
      },
    ]);
  });

  it("stops at the item limit", () => {
    expect(parseFeed(RSS, "https://news.example.com/rss", 1, FETCHED_AT).map((article) => article.title)).toEqual([
      "Opendoor & peers rally",
    ]);
  });

  it("keeps numeric entities outside the Unicode range as text", () => {
    const xml = "<rss><channel><title>Wire</title><item><title>Bad &#99999999; and &#x110000; but &#x2014; ok</title><link>https://x.example.com/1</link></item></channel></rss>";

    expect(parseFeed(xml, "https://x.example.com/rss", 5, FETCHED_AT).map((article) => article.title)).toEqual([
      "Bad &#99999999; and &#x110000; but \u2014 ok",
    ]);
  });

  it("falls back to the feed URL as the source name", () => {
    const [article] = parseFeed("<rss><channel><item><title>Plain</title></item></channel></rss>", "https://x.example.com/rss", 5, FETCHED_AT);

    expect(article?.source).toBe("https://x.example.com/rss");
    expect(article?.id).toBe("plain|");
  });
});

describe("RssFeedSource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("collects articles from healthy feeds and reports failed ones", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.stubGlobal(
      "fetch",
      vi.fn(async (input: string | URL | Request) =>
        String(input) === "https://news.example.com/rss" ? new Response(RSS) : new Response("unavailable", { status: 503 }),
      ),
    );

    const source = new RssFeedSource(["https://news.example.com/rss", "https://down.example.com/rss"], 10, 1_000);
    const { articles, failures } = await source.fetchArticles();

    expect(articles.map((article) => article.id)).toEqual(["news.example.com/a", "news.example.com/b"]);
    expect(failures).toEqual([{ url: "https://down.example.com/rss", error: "feed request failed: HTTP 503" }]);
  });
});
