import type { QaRecord } from "./record";

/**
 * Append-only question/answer table queried by the matcher.
 *
 * Ordering of `queryContainingAny` results only needs to be stable within one
 * call; the matcher breaks score ties by that order.
 */
export interface QaRecordStore {
  readonly isAvailable: boolean;

  /** Returns false when a record with the same normalized question exists. */
  insertIfAbsent(record: QaRecord): Promise<boolean>;

  queryExact(normalized: string): Promise<QaRecord | undefined>;

  /**
   * Records whose normalized question contains at least one of the keywords
   * as a substring.
   */
  queryContainingAny(keywords: string[], limit: number): Promise<QaRecord[]>;
}
