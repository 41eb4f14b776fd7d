import { randomUUID } from "node:crypto";
import type { Logger } from "../../cli/logging";
import { silentLogger } from "../../cli/logging";
import { toAppError } from "../../domain/common/errors";
import {
  QaSubmissionSchema,
  type QaRecord,
  type QaSubmission,
} from "../../domain/qa/record";
import type { QaRecordStore } from "../../domain/qa/store";
import { normalizeQuestion } from "../../infrastructure/text/normalize";
import { parseQaText } from "../../infrastructure/text/qa-parse";

export type IngestOutcome =
  | { status: "added"; record: QaRecord }
  | { status: "duplicate"; questionNormalized: string }
  | { status: "invalid"; reason: string };

export type ImportStats = {
  added: number;
  duplicates: number;
  invalid: number;
};

export type QaIngestServiceArgs = {
  store: QaRecordStore;
  logger?: Logger;
  /** Injected for deterministic ids and timestamps in tests */
  newId?: () => string;
  now?: () => number;
};

/**
 * Write path for question/answer pairs. The question is normalized with the
 * same function the matcher uses, then inserted unless a record with that
 * normalized form already exists.
 *
 * The duplicate check and the insert are separate store calls; two concurrent
 * submissions of the same question can both land.
 */
export class QaIngestService {
  private readonly store: QaRecordStore;
  private readonly logger: Logger;
  private readonly newId: () => string;
  private readonly now: () => number;

  constructor(args: QaIngestServiceArgs) {
    this.store = args.store;
    this.logger = (args.logger ?? silentLogger).child("ingest");
    this.newId = args.newId ?? randomUUID;
    this.now = args.now ?? Date.now;
  }

  async add(submission: QaSubmission): Promise<IngestOutcome> {
    const parsed = QaSubmissionSchema.safeParse(submission);
    if (!parsed.success) {
      return {
        status: "invalid",
        reason: parsed.error.issues.map((i) => i.message).join("; "),
      };
    }

    const { question, answer, source } = parsed.data;
    const questionNormalized = normalizeQuestion(question);
    if (!questionNormalized) {
      return { status: "invalid", reason: "question has no letters or digits" };
    }

    const record: QaRecord = {
      id: this.newId(),
      question,
      questionNormalized,
      answer,
      source,
      createdAtMs: this.now(),
    };

    const inserted = await this.store.insertIfAbsent(record);
    if (!inserted) {
      this.logger.info(`duplicate question skipped: "${questionNormalized}"`);
      return { status: "duplicate", questionNormalized };
    }
    this.logger.debug(`added ${record.id} "${questionNormalized}" source=${source}`);
    return { status: "added", record };
  }

  /**
   * Adds pairs one by one. A store failure on one pair is logged and counted
   * as invalid; the rest of the batch continues.
   */
  async importPairs(submissions: QaSubmission[]): Promise<ImportStats> {
    const stats: ImportStats = { added: 0, duplicates: 0, invalid: 0 };
    for (const submission of submissions) {
      let outcome: IngestOutcome;
      try {
        outcome = await this.add(submission);
      } catch (error) {
        this.logger.warn(`insert failed: ${toAppError(error).message}`);
        outcome = { status: "invalid", reason: toAppError(error).message };
      }
      if (outcome.status === "added") stats.added += 1;
      else if (outcome.status === "duplicate") stats.duplicates += 1;
      else stats.invalid += 1;
    }
    this.logger.info(
      `import complete: added=${stats.added} duplicates=${stats.duplicates} invalid=${stats.invalid}`,
    );
    return stats;
  }

  /** Pairs parsed out of free text, e.g. OCR output of a question sheet. */
  async importText(text: string, source = "ocr"): Promise<ImportStats> {
    const pairs = parseQaText(text);
    return this.importPairs(pairs.map((p) => ({ ...p, source })));
  }
}
