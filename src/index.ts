export { normalizeQuestion, compactQuestion } from "./infrastructure/text/normalize";
export {
  extractKeywords,
  createLexicon,
  DEFAULT_LEXICON,
  type Lexicon,
} from "./infrastructure/text/keywords";
export {
  similarity,
  sequenceRatio,
  DEFAULT_SIMILARITY_WEIGHTS,
  type SimilarityWeights,
} from "./infrastructure/text/similarity";
export { parseQaText, type QaPair } from "./infrastructure/text/qa-parse";
export { StagedMatcher, type StagedMatcherArgs } from "./application/match/staged-matcher";
export {
  QaIngestService,
  type IngestOutcome,
  type ImportStats,
} from "./application/ingest/qa-ingest";
export { createQaRuntime, type QaRuntime } from "./application/runtime";
export { InMemoryQaStore } from "./infrastructure/store/memory";
export { createQaStore } from "./infrastructure/store/factory";
export { loadConfig } from "./infrastructure/config/load";
export type { AppConfig, MatcherConfig } from "./infrastructure/config/schema";
export type { AnswerResult, MatchStage } from "./domain/qa/answer";
export type { QaRecord, QaSubmission } from "./domain/qa/record";
export type { QaRecordStore } from "./domain/qa/store";
export { createLogger, type Logger } from "./cli/logging";
