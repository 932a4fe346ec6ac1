export type SentimentLabel = "VERY_BULLISH" | "BULLISH" | "NEUTRAL" | "BEARISH" | "VERY_BEARISH";

export type ScoringStrategy = "LEXICAL" | "MODEL";

export type SentimentResult = {
  /** Normalized to [-1, 1]. */
  score: number;
  label: SentimentLabel;
  strategy: ScoringStrategy;
  lexical?: {
    rawScore: number;
    bullishCount: number;
    bearishCount: number;
  };
};

export const LEXICAL_CLAMP = 5;

export const labelFromRawCount = (raw: number): SentimentLabel => {
  if (raw > 2) {
    return "VERY_BULLISH";
  }
  if (raw > 0) {
    return "BULLISH";
  }
  if (raw < -2) {
    return "VERY_BEARISH";
  }
  if (raw < 0) {
    return "BEARISH";
  }
  return "NEUTRAL";
};

export const labelFromModelScore = (score: number): SentimentLabel => {
  if (score > 0.5) {
    return "VERY_BULLISH";
  }
  if (score > 0.1) {
    return "BULLISH";
  }
  if (score < -0.5) {
    return "VERY_BEARISH";
  }
  if (score < -0.1) {
    return "BEARISH";
  }
  return "NEUTRAL";
};

export const normalizeRawCount = (raw: number): number =>
  Math.max(-LEXICAL_CLAMP, Math.min(LEXICAL_CLAMP, raw)) / LEXICAL_CLAMP;

// Aggregates hold normalized means; lexical thresholds apply to the raw-count scale.
export const labelForScore = (strategy: ScoringStrategy, score: number): SentimentLabel =>
  strategy === "LEXICAL" ? labelFromRawCount(score * LEXICAL_CLAMP) : labelFromModelScore(score);
