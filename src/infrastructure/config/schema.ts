import { z } from "zod";

export const LogLevelSchema = z
  .enum(["silent", "error", "warn", "info", "debug"])
  .default("info");

export const StoreSchema = z.object({
  kind: z.enum(["lancedb", "memory"]).default("lancedb"),
  path: z.string().min(1).default("lancedb"),
  table: z.string().min(1).default("qa_records"),
});

const Score = z.number().min(0).max(1);

export const MatcherSchema = z
  .object({
    /** Normalized queries shorter than this are rejected as too short */
    minQuestionLength: z.number().int().min(1).default(2),
    highThreshold: Score.default(0.7),
    keywordThreshold: Score.default(0.5),
    lowThreshold: Score.default(0.5),
    /** Added to the similarity score per query keyword found in a candidate */
    keywordBonus: z.number().min(0).default(0.05),
    /** How many of the longest keywords select the candidate window */
    candidateKeywords: z.number().int().positive().default(3),
    candidateLimit: z.number().int().positive().default(50),
    /** Window of the last-resort stage, which queries every keyword */
    wideCandidateLimit: z.number().int().positive().default(200),
    stageTimeoutMs: z.number().int().min(0).default(5_000),
    /** Canned answers keyed by question, checked before the store */
    shortAnswers: z.record(z.string().min(1), z.string().min(1)).default({}),
  })
  .refine((m) => m.lowThreshold <= m.highThreshold, {
    message: "lowThreshold must not exceed highThreshold",
    path: ["lowThreshold"],
  });

export const SimilaritySchema = z.object({
  sequenceWeight: z.number().min(0).default(0.2),
  overlapWeight: z.number().min(0).default(0.6),
  lengthWeight: z.number().min(0).default(0.2),
  importantWordBonus: z.number().min(0).default(0.05),
});

export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema,
  store: StoreSchema.default({}),
  matcher: MatcherSchema.default({}),
  similarity: SimilaritySchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type MatcherConfig = AppConfig["matcher"];
