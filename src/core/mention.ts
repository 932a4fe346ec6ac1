export type RejectionReason = "negative_match" | "no_context";

export type Mention = {
  articleId: string;
  symbol: string;
  matchedAlias: string;
  spanStart: number;
  spanEnd: number;
  accepted?: boolean;
  rejectionReason?: RejectionReason;
};

export type AcceptedMention = Mention & { accepted: true };

export const isAccepted = (mention: Mention): mention is AcceptedMention => mention.accepted === true;
