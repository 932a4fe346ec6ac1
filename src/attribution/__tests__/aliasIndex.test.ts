import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigError } from "../../core/errors";
import { AliasIndex, createAliasIndex, parseTickerTable } from "../aliasIndex";

describe("AliasIndex", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rejects a duplicate symbol", () => {
    expect(
      () =>
        new AliasIndex([
          { symbol: "AAPL", canonicalName: "Apple", aliases: [{ alias: "Apple" }] },
          { symbol: "AAPL", canonicalName: "Apple Inc.", aliases: [{ alias: "AAPL" }] },
        ]),
    ).toThrow(ConfigError);
  });

  it("rejects an empty alias list", () => {
    expect(() => new AliasIndex([{ symbol: "AAPL", canonicalName: "Apple", aliases: [] }])).toThrow(
      "Ticker AAPL has no aliases",
    );
  });

  it("rejects an alias listed twice for one ticker under different casing", () => {
    expect(
      () =>
        new AliasIndex([
          {
            symbol: "OPEN",
            canonicalName: "Opendoor Technologies",
            aliases: [
              { alias: "OPEN" },
              { alias: "Open", policy: { ambiguous: false, cooccurrence: [], negative: ["OpenAI"] } },
            ],
          },
        ]),
    ).toThrow('Ticker OPEN lists alias "Open" more than once');
  });

  it("returns entries in configuration order and supports reverse lookup", () => {
    const index = new AliasIndex([
      { symbol: "GOOGL", canonicalName: "Alphabet Class A", aliases: [{ alias: "Alphabet" }, { alias: "Google" }] },
      { symbol: "GOOG", canonicalName: "Alphabet Class C", aliases: [{ alias: "Alphabet" }] },
    ]);

    expect(index.lookup().map((entry) => entry.symbol)).toEqual(["GOOGL", "GOOG"]);
    expect(index.entriesContainingAlias("  alphabet ").map((entry) => entry.symbol)).toEqual(["GOOGL", "GOOG"]);
    expect(index.entriesContainingAlias("google").map((entry) => entry.symbol)).toEqual(["GOOGL"]);
    expect(index.entriesContainingAlias("amazon")).toEqual([]);
    expect(index.get("GOOG")?.canonicalName).toBe("Alphabet Class C");
  });

  it("is immutable after construction", () => {
    const index = new AliasIndex([{ symbol: "AAPL", canonicalName: "Apple", aliases: [{ alias: "Apple" }] }]);

    expect(Object.isFrozen(index.lookup())).toBe(true);
    expect(Object.isFrozen(index.get("AAPL"))).toBe(true);
  });
});

describe("parseTickerTable", () => {
  it("reports every schema problem as a ConfigError", () => {
    try {
      parseTickerTable({ AAPL: { aliases: "Apple" } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError && error.issues[0]?.startsWith("AAPL.aliases")).toBe(true);
    }
  });
});

describe("createAliasIndex", () => {
  const table = parseTickerTable({
    OPEN: {
      name: "Opendoor Technologies",
      aliases: [
        "Opendoor",
        { alias: "Open", ambiguous: true, cooccurrence: ["Opendoor"], negative: ["OpenAI"], windowWords: 5 },
        { alias: "Opendoor Inc" },
      ],
    },
    AAPL: { name: "Apple Inc.", aliases: ["Apple"] },
  });

  it("keeps only watched tickers and attaches alias policies", () => {
    const index = createAliasIndex(table, [" open "]);

    expect(index.symbols()).toEqual(["OPEN"]);
    expect(index.get("OPEN")).toEqual({
      symbol: "OPEN",
      canonicalName: "Opendoor Technologies",
      aliases: [
        { alias: "Opendoor" },
        {
          alias: "Open",
          policy: { ambiguous: true, cooccurrence: ["Opendoor"], negative: ["OpenAI"], windowWords: 5 },
        },
        { alias: "Opendoor Inc" },
      ],
    });
  });

  it("falls back to symbol-only matching for an unknown ticker", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const index = createAliasIndex(table, ["AAPL", "zzz", "AAPL"]);

    expect(index.symbols()).toEqual(["AAPL", "ZZZ"]);
    expect(index.get("ZZZ")).toEqual({ symbol: "ZZZ", canonicalName: "ZZZ", aliases: [{ alias: "ZZZ" }] });
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
