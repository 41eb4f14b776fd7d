import type { QaRecord } from "../../domain/qa/record";
import type { QaRecordStore } from "../../domain/qa/store";

/**
 * Process-local store, iterated in insertion order. Used for `store.kind:
 * memory` and as the stand-in behind the matcher in tests.
 */
export class InMemoryQaStore implements QaRecordStore {
  private readonly records: QaRecord[] = [];
  private readonly byNormalized = new Map<string, QaRecord>();
  private available: boolean;

  constructor(options: { records?: QaRecord[]; available?: boolean } = {}) {
    this.available = options.available ?? true;
    for (const record of options.records ?? []) {
      if (!this.byNormalized.has(record.questionNormalized)) this.append(record);
    }
  }

  get isAvailable(): boolean {
    return this.available;
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  get size(): number {
    return this.records.length;
  }

  async insertIfAbsent(record: QaRecord): Promise<boolean> {
    if (this.byNormalized.has(record.questionNormalized)) return false;
    this.append(record);
    return true;
  }

  async queryExact(normalized: string): Promise<QaRecord | undefined> {
    return this.byNormalized.get(normalized);
  }

  async queryContainingAny(keywords: string[], limit: number): Promise<QaRecord[]> {
    const needles = keywords.filter(Boolean);
    if (needles.length === 0 || limit <= 0) return [];
    const out: QaRecord[] = [];
    for (const record of this.records) {
      if (needles.some((k) => record.questionNormalized.includes(k))) {
        out.push(record);
        if (out.length >= limit) break;
      }
    }
    return out;
  }

  private append(record: QaRecord): void {
    this.records.push(record);
    this.byNormalized.set(record.questionNormalized, record);
  }
}
