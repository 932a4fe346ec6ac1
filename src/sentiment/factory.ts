import type { ScoringStrategy } from "../core/sentiment";
import { type KeywordLists, LexicalScorer } from "./lexical";
import { ModelScorer, type ScoringModel } from "./model";
import type { SentimentScorer } from "./scorer";

export type ScorerDeps = {
  keywords?: KeywordLists;
  model?: ScoringModel;
};

export const createScorer = (strategy: ScoringStrategy, deps: ScorerDeps): SentimentScorer => {
  if (strategy === "LEXICAL") {
    if (!deps.keywords) {
      throw new Error("Lexical scoring requires keyword lists");
    }
    return new LexicalScorer(deps.keywords);
  }

  if (!deps.model) {
    throw new Error("Model scoring requires a scoring model");
  }
  return new ModelScorer(deps.model);
};
