import type { Logger } from "../../cli/logging";
import { silentLogger } from "../../cli/logging";
import { toAppError } from "../../domain/common/errors";
import type { AnswerResult, MatchStage } from "../../domain/qa/answer";
import type { QaRecord } from "../../domain/qa/record";
import type { QaRecordStore } from "../../domain/qa/store";
import { withTimeout } from "../../infrastructure/async/timeout";
import type { MatcherConfig } from "../../infrastructure/config/schema";
import {
  DEFAULT_LEXICON,
  extractKeywords,
  longestKeywords,
  type Lexicon,
} from "../../infrastructure/text/keywords";
import {
  compactQuestion,
  normalizeQuestion,
  splitWords,
} from "../../infrastructure/text/normalize";
import {
  DEFAULT_SIMILARITY_WEIGHTS,
  similarity,
  type SimilarityWeights,
} from "../../infrastructure/text/similarity";

export type StageOutcome =
  | { kind: "hit"; answer: string; score: number; record: QaRecord }
  | { kind: "miss" }
  | { kind: "fault"; error: unknown };

type PreparedQuery = {
  normalized: string;
  compact: string;
  keywords: string[];
};

type Scored = { record: QaRecord; score: number };

type Stage = {
  name: Exclude<MatchStage, "short_answer">;
  run(query: PreparedQuery, window: CandidateWindows): Promise<StageOutcome>;
};

/** Candidate lists fetched once per request and shared by the later stages. */
type CandidateWindows = {
  narrow(): Promise<QaRecord[]>;
  wide(): Promise<QaRecord[]>;
};

export type StagedMatcherArgs = {
  store: QaRecordStore;
  config: MatcherConfig;
  weights?: SimilarityWeights;
  lexicon?: Lexicon;
  logger?: Logger;
};

/**
 * Resolves a raw question to a stored answer with progressively looser
 * strategies, stopping at the first accepted match:
 *
 * 1) short-answer overrides
 * 2) exact normalized match
 * 3) compact match (whitespace/underscores ignored)
 * 4) similarity over the keyword candidate window, high threshold
 * 5) keyword-count ranking plus similarity, keyword threshold
 * 6) similarity over a wider window, low threshold
 *
 * A stage that throws or times out counts as a fault and the cascade moves
 * on. findAnswer never rejects.
 */
export class StagedMatcher {
  private readonly store: QaRecordStore;
  private readonly config: MatcherConfig;
  private readonly weights: SimilarityWeights;
  private readonly lexicon: Lexicon;
  private readonly logger: Logger;
  private readonly shortAnswers: Map<string, string>;
  private readonly stages: Stage[];

  constructor(args: StagedMatcherArgs) {
    this.store = args.store;
    this.config = args.config;
    this.weights = args.weights ?? DEFAULT_SIMILARITY_WEIGHTS;
    this.lexicon = args.lexicon ?? DEFAULT_LEXICON;
    this.logger = (args.logger ?? silentLogger).child("matcher");

    this.shortAnswers = new Map();
    for (const [question, answer] of Object.entries(this.config.shortAnswers)) {
      const key = normalizeQuestion(question);
      if (key) this.shortAnswers.set(key, answer);
    }

    this.stages = [
      { name: "exact", run: (q) => this.exactStage(q) },
      { name: "compact", run: (q) => this.compactStage(q) },
      {
        name: "similarity_high",
        run: async (q, w) =>
          this.accept(this.bestBySimilarity(q, await w.narrow()), this.config.highThreshold),
      },
      {
        name: "keyword_ranked",
        run: async (q, w) =>
          this.accept(this.bestByKeywords(q, await w.narrow()), this.config.keywordThreshold),
      },
      {
        name: "similarity_low",
        run: async (q, w) =>
          this.accept(this.bestBySimilarity(q, await w.wide()), this.config.lowThreshold),
      },
    ];
  }

  async findAnswer(rawQuestion: string): Promise<AnswerResult> {
    try {
      return await this.cascade(rawQuestion);
    } catch (error) {
      this.logger.error(`lookup failed: ${toAppError(error).message}`);
      return { status: "store_unavailable" };
    }
  }

  private async cascade(rawQuestion: string): Promise<AnswerResult> {
    if (!this.store.isAvailable) return { status: "store_unavailable" };

    const normalized = normalizeQuestion(rawQuestion);
    this.logger.debug(`normalized "${rawQuestion}" -> "${normalized}"`);
    if (normalized.length < this.config.minQuestionLength) {
      return { status: "too_short" };
    }

    const canned = this.shortAnswers.get(normalized);
    if (canned !== undefined) {
      return { status: "found", answer: canned, stage: "short_answer", score: 1 };
    }

    const query: PreparedQuery = {
      normalized,
      compact: compactQuestion(normalized),
      keywords: extractKeywords(normalized, this.lexicon),
    };
    const windows = this.candidateWindows(query);

    let faults = 0;
    for (const stage of this.stages) {
      const outcome = await this.runStage(stage, query, windows);
      if (outcome.kind === "fault") {
        faults += 1;
        this.logger.warn(`stage ${stage.name} failed: ${toAppError(outcome.error).message}`);
        continue;
      }
      if (outcome.kind === "hit") {
        this.logger.info(
          `stage ${stage.name} matched "${outcome.record.question}" score=${outcome.score.toFixed(3)}`,
        );
        return {
          status: "found",
          answer: outcome.answer,
          stage: stage.name,
          score: outcome.score,
          record: outcome.record,
        };
      }
    }

    return faults === this.stages.length
      ? { status: "store_unavailable" }
      : { status: "not_found" };
  }

  private async runStage(
    stage: Stage,
    query: PreparedQuery,
    windows: CandidateWindows,
  ): Promise<StageOutcome> {
    try {
      return await withTimeout(
        () => stage.run(query, windows),
        this.config.stageTimeoutMs,
        `stage ${stage.name}`,
      );
    } catch (error) {
      return { kind: "fault", error };
    }
  }

  private candidateWindows(query: PreparedQuery): CandidateWindows {
    const cache = new Map<string, QaRecord[]>();
    const load = async (key: string, keywords: string[], limit: number) => {
      const hit = cache.get(key);
      if (hit) return hit;
      if (keywords.length === 0) return [];
      const records = await this.store.queryContainingAny(keywords, limit);
      cache.set(key, records);
      return records;
    };

    const narrowKeywords = longestKeywords(query.keywords, this.config.candidateKeywords);
    return {
      narrow: () => load("narrow", narrowKeywords, this.config.candidateLimit),
      wide: () => load("wide", query.keywords, this.config.wideCandidateLimit),
    };
  }

  private async exactStage(query: PreparedQuery): Promise<StageOutcome> {
    const record = await this.store.queryExact(query.normalized);
    return record
      ? { kind: "hit", answer: record.answer, score: 1, record }
      : { kind: "miss" };
  }

  private async compactStage(query: PreparedQuery): Promise<StageOutcome> {
    const candidates = await this.store.queryContainingAny(
      this.compactNeedles(query),
      this.config.candidateLimit,
    );
    const record = candidates.find(
      (c) => compactQuestion(c.questionNormalized) === query.compact,
    );
    return record
      ? { kind: "hit", answer: record.answer, score: 1, record }
      : { kind: "miss" };
  }

  /**
   * The query's longest tokens find records split the same way or joined
   * further. The leading and trailing fragments of the compact query find
   * records that split a word the query writes joined ("ibu kota" for
   * "ibukota").
   */
  private compactNeedles(query: PreparedQuery): string[] {
    const tokens = [...new Set(splitWords(query.normalized))];
    const needles = longestKeywords(tokens, this.config.candidateKeywords);
    const size = this.lexicon.minTokenLength;
    if (query.compact.length > size) {
      needles.push(query.compact.slice(0, size), query.compact.slice(-size));
    }
    return [...new Set(needles)];
  }

  private bestBySimilarity(query: PreparedQuery, candidates: QaRecord[]): Scored | undefined {
    let best: Scored | undefined;
    for (const record of candidates) {
      const score = this.score(query, record);
      if (!best || score > best.score) best = { record, score };
    }
    return best;
  }

  /**
   * Picks the candidate containing the most query keywords, the higher score
   * breaking ties. Its score is the similarity plus `keywordBonus` per
   * contained keyword.
   */
  private bestByKeywords(query: PreparedQuery, candidates: QaRecord[]): Scored | undefined {
    let best: (Scored & { matches: number }) | undefined;
    for (const record of candidates) {
      const matches = query.keywords.filter((k) => record.questionNormalized.includes(k)).length;
      const score = Math.min(1, this.score(query, record) + this.config.keywordBonus * matches);
      if (
        !best ||
        matches > best.matches ||
        (matches === best.matches && score > best.score)
      ) {
        best = { record, score, matches };
      }
    }
    return best;
  }

  private accept(best: Scored | undefined, threshold: number): StageOutcome {
    if (!best || best.score <= threshold) return { kind: "miss" };
    return { kind: "hit", answer: best.record.answer, score: best.score, record: best.record };
  }

  private score(query: PreparedQuery, record: QaRecord): number {
    return similarity(query.normalized, record.questionNormalized, this.weights, this.lexicon);
  }
}
