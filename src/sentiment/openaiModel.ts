import { openai } from "@ai-sdk/openai";
import { Output, generateText } from "ai";
import { z } from "zod";
import type { ScoringModel } from "./model";

const classificationSchema = z.object({
  positive: z.number().min(0).max(1),
  negative: z.number().min(0).max(1),
  neutral: z.number().min(0).max(1),
});

export type SentimentClassification = z.infer<typeof classificationSchema>;

export const classificationToScore = ({ positive, negative }: SentimentClassification): number =>
  Math.max(-1, Math.min(1, positive - negative));

export const createOpenAiScoringModel = (modelId: string): ScoringModel => ({
  async infer(text, options = {}) {
    const { output } = await generateText({
      model: openai(modelId),
      output: Output.object({ schema: classificationSchema }),
      temperature: 0,
      abortSignal: options.signal,
      system:
        "You are a financial sentiment classifier. Return the probability that the news text is positive, negative or neutral for the market. The three probabilities sum to 1.",
      prompt: text,
    });

    return classificationToScore(output);
  },
});
