import { describe, expect, it } from "vitest";
import type { Article } from "../../core/article";
import { ConfigError } from "../../core/errors";
import { AliasIndex, type DisambiguationPolicy } from "../aliasIndex";
import { ContextDisambiguator, acceptedSymbols } from "../disambiguator";
import { scan } from "../scanner";

const article = (title: string, summary = ""): Article => ({
  id: "a-1",
  title,
  summary,
  source: "Test Wire",
  link: "https://example.com/a-1",
  publishedAt: "2026-10-19T14:00:00.000Z",
});

const openPolicy: DisambiguationPolicy = {
  ambiguous: true,
  cooccurrence: ["Opendoor", "Technologies", "housing"],
  negative: ["OpenAI", "open source", "market is open"],
};

const openIndex = (policy: DisambiguationPolicy = openPolicy): AliasIndex =>
  new AliasIndex([
    {
      symbol: "OPEN",
      canonicalName: "Opendoor Technologies",
      aliases: [{ alias: "Opendoor" }, { alias: "Open", policy }],
    },
  ]);

const verdicts = (disambiguator: ContextDisambiguator, index: AliasIndex, item: Article) =>
  disambiguator
    .disambiguate(scan(item, index), item)
    .map(({ matchedAlias, accepted, rejectionReason }) => ({ matchedAlias, accepted, rejectionReason }));

describe("ContextDisambiguator", () => {
  const index = openIndex();
  const disambiguator = new ContextDisambiguator(index);

  it("accepts the company name of a configured ticker", () => {
    const item = article("Opendoor Technologies beats earnings");
    const mentions = disambiguator.disambiguate(scan(item, index), item);

    expect(mentions).toEqual([
      { articleId: "a-1", symbol: "OPEN", matchedAlias: "Opendoor", spanStart: 0, spanEnd: 8, accepted: true },
    ]);
    expect(acceptedSymbols(mentions)).toEqual(["OPEN"]);
  });

  it("rejects a collision with another company's name", () => {
    const item = article("OpenAI releases new model");
    const mentions = disambiguator.disambiguate(scan(item, index), item);

    expect(mentions).toEqual([
      {
        articleId: "a-1",
        symbol: "OPEN",
        matchedAlias: "Open",
        spanStart: 0,
        spanEnd: 4,
        accepted: false,
        rejectionReason: "negative_match",
      },
    ]);
    expect(acceptedSymbols(mentions)).toEqual([]);
  });

  it("accepts an ambiguous alias with a co-occurrence term nearby", () => {
    expect(verdicts(disambiguator, index, article("Shares of Open jumped after Opendoor Technologies raised guidance"))).toEqual([
      { matchedAlias: "Open", accepted: true, rejectionReason: undefined },
      { matchedAlias: "Opendoor", accepted: true, rejectionReason: undefined },
    ]);
  });

  it("rejects an ambiguous alias without context", () => {
    expect(verdicts(disambiguator, index, article("The Open championship drew record crowds"))).toEqual([
      { matchedAlias: "Open", accepted: false, rejectionReason: "no_context" },
    ]);
  });

  it("lets a negative pattern win over a co-occurrence term", () => {
    expect(verdicts(disambiguator, index, article("Opendoor says the market is open"))).toEqual([
      { matchedAlias: "Opendoor", accepted: true, rejectionReason: undefined },
      { matchedAlias: "Open", accepted: false, rejectionReason: "negative_match" },
    ]);
  });

  it("rejects a negative pattern adjacent to the match but not one further away", () => {
    const adjacentIndex = openIndex({ ambiguous: true, cooccurrence: ["housing"], negative: ["source code"] });
    const adjacent = new ContextDisambiguator(adjacentIndex);

    expect(verdicts(adjacent, adjacentIndex, article("Open source code released"))).toEqual([
      { matchedAlias: "Open", accepted: false, rejectionReason: "negative_match" },
    ]);
    expect(verdicts(adjacent, adjacentIndex, article("Open jumps; source code leak at rival"))).toEqual([
      { matchedAlias: "Open", accepted: false, rejectionReason: "no_context" },
    ]);
  });

  it("measures the co-occurrence window in words", () => {
    const item = article("Open rose on Monday as investors cheered the housing data");

    expect(verdicts(new ContextDisambiguator(index, { defaultWindowWords: 3 }), index, item)).toEqual([
      { matchedAlias: "Open", accepted: false, rejectionReason: "no_context" },
    ]);
    expect(verdicts(disambiguator, index, item)).toEqual([
      { matchedAlias: "Open", accepted: true, rejectionReason: undefined },
    ]);

    const narrowIndex = openIndex({ ...openPolicy, windowWords: 8 });
    expect(verdicts(new ContextDisambiguator(narrowIndex), narrowIndex, item)).toEqual([
      { matchedAlias: "Open", accepted: true, rejectionReason: undefined },
    ]);
  });

  it("gives the same verdict for the same text and policy", () => {
    const item = article("Open slides while OpenAI raises money", "open source models rally");
    const [mention] = scan(item, index);
    if (!mention) {
      throw new Error("expected a mention");
    }

    const first = disambiguator.validate(mention, item);
    expect(disambiguator.validate(mention, item)).toEqual(first);
    expect(new ContextDisambiguator(openIndex()).validate(mention, { ...item, id: "a-2" })).toEqual(first);
  });

  it("accepts aliases without a policy unconditionally", () => {
    const plain = new AliasIndex([{ symbol: "AAPL", canonicalName: "Apple", aliases: [{ alias: "Apple" }] }]);
    const item = article("Apple pie sales climb");

    expect(verdicts(new ContextDisambiguator(plain), plain, item)).toEqual([
      { matchedAlias: "Apple", accepted: true, rejectionReason: undefined },
    ]);
  });

  describe("policy validation", () => {
    const invalidPolicies: Array<[string, DisambiguationPolicy]> = [
      ["an ambiguous alias without co-occurrence terms", { ambiguous: true, cooccurrence: [], negative: [] }],
      ["co-occurrence terms on a non-ambiguous alias", { ambiguous: false, cooccurrence: ["Opendoor"], negative: [] }],
      ["a term in both lists", { ambiguous: true, cooccurrence: ["Opendoor"], negative: ["opendoor"] }],
      ["a negative pattern equal to the alias", { ambiguous: false, cooccurrence: [], negative: ["OPEN"] }],
      ["a non-positive window", { ambiguous: true, cooccurrence: ["Opendoor"], negative: [], windowWords: 0 }],
    ];

    it.each(invalidPolicies)("rejects %s", (_name, policy) => {
      expect(() => new ContextDisambiguator(openIndex(policy))).toThrow(ConfigError);
    });

    it("rejects a non-positive default window", () => {
      expect(() => new ContextDisambiguator(index, { defaultWindowWords: 0 })).toThrow(ConfigError);
    });
  });
});
