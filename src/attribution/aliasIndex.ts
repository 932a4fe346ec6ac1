import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError } from "../core/errors";
import { normalizeSingleLine } from "../core/text";

export type DisambiguationPolicy = {
  ambiguous: boolean;
  cooccurrence: string[];
  negative: string[];
  windowWords?: number;
};

export type AliasEntry = {
  readonly alias: string;
  readonly policy?: DisambiguationPolicy;
};

export type TickerEntry = {
  readonly symbol: string;
  readonly canonicalName: string;
  readonly aliases: readonly AliasEntry[];
};

const policySchema = z.object({
  alias: z.string().trim().min(1),
  ambiguous: z.boolean().default(false),
  cooccurrence: z.array(z.string().trim().min(1)).default([]),
  negative: z.array(z.string().trim().min(1)).default([]),
  windowWords: z.number().int().optional(),
});

const tickerTableSchema = z.record(
  z.string().trim().min(1),
  z.object({
    name: z.string().trim().min(1).optional(),
    aliases: z.array(z.union([z.string().trim().min(1), policySchema])),
  }),
);

export type TickerTable = z.infer<typeof tickerTableSchema>;

const normalizeAlias = (alias: string): string => normalizeSingleLine(alias).toLowerCase();

export class AliasIndex {
  private readonly entries: readonly TickerEntry[];
  private readonly bySymbol: ReadonlyMap<string, TickerEntry>;
  private readonly byAlias: ReadonlyMap<string, readonly TickerEntry[]>;

  constructor(entries: readonly TickerEntry[]) {
    const bySymbol = new Map<string, TickerEntry>();
    const byAlias = new Map<string, TickerEntry[]>();

    for (const entry of entries) {
      if (bySymbol.has(entry.symbol)) {
        throw new ConfigError(`Duplicate ticker symbol: ${entry.symbol}`);
      }
      if (entry.aliases.length === 0) {
        throw new ConfigError(`Ticker ${entry.symbol} has no aliases`);
      }

      const frozen: TickerEntry = Object.freeze({
        symbol: entry.symbol,
        canonicalName: entry.canonicalName,
        aliases: Object.freeze(entry.aliases.map((alias) => Object.freeze({ ...alias }))),
      });
      bySymbol.set(entry.symbol, frozen);

      const ownAliases = new Set<string>();
      for (const { alias } of entry.aliases) {
        const key = normalizeAlias(alias);
        if (!key) {
          throw new ConfigError(`Ticker ${entry.symbol} has a blank alias`);
        }
        if (ownAliases.has(key)) {
          throw new ConfigError(`Ticker ${entry.symbol} lists alias "${alias}" more than once`);
        }
        ownAliases.add(key);

        const bucket = byAlias.get(key) ?? [];
        if (!bucket.includes(frozen)) {
          bucket.push(frozen);
        }
        byAlias.set(key, bucket);
      }
    }

    this.entries = Object.freeze([...bySymbol.values()]);
    this.bySymbol = bySymbol;
    this.byAlias = byAlias;
  }

  lookup(): readonly TickerEntry[] {
    return this.entries;
  }

  get(symbol: string): TickerEntry | undefined {
    return this.bySymbol.get(symbol);
  }

  entriesContainingAlias(normalizedText: string): readonly TickerEntry[] {
    return this.byAlias.get(normalizeAlias(normalizedText)) ?? [];
  }

  symbols(): string[] {
    return this.entries.map((entry) => entry.symbol);
  }
}

export const parseTickerTable = (raw: unknown): TickerTable => {
  const result = tickerTableSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError("Invalid ticker table", issues);
  }

  return result.data;
};

export const loadTickerTable = async (filePath: string): Promise<TickerTable> => {
  let content: string;

  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read ticker table ${filePath}`, [String(error)]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Ticker table ${filePath} is not valid JSON`, [String(error)]);
  }

  return parseTickerTable(parsed);
};

const toAliasEntry = (alias: TickerTable[string]["aliases"][number]): AliasEntry => {
  if (typeof alias === "string") {
    return { alias };
  }

  const { alias: text, ambiguous, cooccurrence, negative, windowWords } = alias;
  if (!ambiguous && cooccurrence.length === 0 && negative.length === 0) {
    return { alias: text };
  }

  return {
    alias: text,
    policy: {
      ambiguous,
      cooccurrence,
      negative,
      ...(windowWords === undefined ? {} : { windowWords }),
    },
  };
};

export const createAliasIndex = (table: TickerTable, watchTickers: readonly string[]): AliasIndex => {
  const entries: TickerEntry[] = [];

  const symbols = new Set(watchTickers.map((symbol) => symbol.trim().toUpperCase()).filter(Boolean));

  for (const symbol of symbols) {
    const configured = table[symbol];
    if (!configured) {
      console.warn(`[tickers] ${symbol} is not in the ticker table; matching the symbol only`);
      entries.push({ symbol, canonicalName: symbol, aliases: [{ alias: symbol }] });
      continue;
    }

    entries.push({
      symbol,
      canonicalName: configured.name ?? symbol,
      aliases: configured.aliases.map(toAliasEntry),
    });
  }

  return new AliasIndex(entries);
};
