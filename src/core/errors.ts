export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n  ${issues.join("\n  ")}` : message);
    this.name = "ConfigError";
  }
}

export type ScoringFailureReason = "failed" | "timeout" | "aborted";

export class ScoringUnavailable extends Error {
  constructor(
    readonly articleId: string,
    readonly reason: ScoringFailureReason,
    options?: { cause?: unknown },
  ) {
    super(`Sentiment scoring unavailable for ${articleId} (${reason})`, options);
    this.name = "ScoringUnavailable";
  }
}

export class DedupMarkFailed extends Error {
  constructor(
    readonly articleId: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to record ${articleId} as seen; it may be delivered again`, options);
    this.name = "DedupMarkFailed";
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
