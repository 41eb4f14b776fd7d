import type { QaRecord } from "./record";

export type MatchStage =
  | "short_answer"
  | "exact"
  | "compact"
  | "similarity_high"
  | "keyword_ranked"
  | "similarity_low";

export type AnswerResult =
  | {
      status: "found";
      answer: string;
      stage: MatchStage;
      score: number;
      /** Absent for short-answer overrides, which have no stored record */
      record?: QaRecord;
    }
  | { status: "not_found" }
  | { status: "too_short" }
  | { status: "store_unavailable" };

export type AnswerStatus = AnswerResult["status"];
