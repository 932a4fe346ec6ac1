import { type Article, articleText } from "../core/article";
import { ScoringUnavailable } from "../core/errors";
import { type SentimentResult, labelFromModelScore } from "../core/sentiment";
import type { ScoreOptions, SentimentScorer } from "./scorer";

export const MODEL_INPUT_MAX_CHARS = 512;

export interface ScoringModel {
  /** Resolves to a sentiment value in [-1, 1]. */
  infer(text: string, options?: { signal?: AbortSignal }): Promise<number>;
}

export class ModelScorer implements SentimentScorer {
  readonly strategy = "MODEL" as const;

  constructor(private readonly model: ScoringModel) {}

  async score(article: Article, options: ScoreOptions = {}): Promise<SentimentResult> {
    const text = articleText(article).slice(0, MODEL_INPUT_MAX_CHARS);
    if (!text) {
      return { score: 0, label: "NEUTRAL", strategy: "MODEL" };
    }

    let value: number;
    try {
      value = await this.model.infer(text, { signal: options.signal });
    } catch (error) {
      if (error instanceof ScoringUnavailable) {
        throw error;
      }
      const reason = options.signal?.aborted ? "aborted" : "failed";
      throw new ScoringUnavailable(article.id, reason, { cause: error });
    }

    if (!Number.isFinite(value) || value < -1 || value > 1) {
      throw new ScoringUnavailable(article.id, "failed", {
        cause: new RangeError(`Model returned ${value}, expected a value in [-1, 1]`),
      });
    }

    return { score: value, label: labelFromModelScore(value), strategy: "MODEL" };
  }
}
