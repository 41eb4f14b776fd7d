import { z } from "zod";

export const QaSourceSchema = z.string().min(1).default("manual");

/**
 * A stored question/answer unit. Records are created once by the ingest path
 * and never updated afterwards.
 */
export const QaRecordSchema = z.object({
  id: z.string().min(1),
  /** Verbatim user text */
  question: z.string().min(1),
  /** normalizeQuestion(question) at write time; the only search key */
  questionNormalized: z.string().min(1),
  answer: z.string().min(1),
  /** Provenance tag (manual, import, ocr, ...); not used for matching */
  source: z.string().min(1),
  createdAtMs: z.number().int().min(0),
});

export type QaRecord = z.infer<typeof QaRecordSchema>;

export const QaSubmissionSchema = z.object({
  question: z.string().refine((s) => s.trim().length > 0, "question must not be empty"),
  answer: z.string().refine((s) => s.trim().length > 0, "answer must not be empty"),
  source: QaSourceSchema,
});

export type QaSubmission = z.input<typeof QaSubmissionSchema>;
