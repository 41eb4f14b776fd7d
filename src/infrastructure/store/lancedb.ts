import * as lancedb from "@lancedb/lancedb";
import type { Connection, Table } from "@lancedb/lancedb";
import type { Logger } from "../../cli/logging";
import { silentLogger } from "../../cli/logging";
import { StoreError } from "../../domain/common/errors";
import { QaRecordSchema, type QaRecord } from "../../domain/qa/record";
import type { QaRecordStore } from "../../domain/qa/store";
import { buildContainsAnyClause, escapeSqlString } from "./sql";

export type LanceDbConfig = {
  path: string;
  table: string;
  logger?: Logger;
};

/** Row layout of the LanceDB table */
type QaRow = {
  id: string;
  question: string;
  question_normalized: string;
  answer: string;
  source: string;
  created_at_ms: number;
};

function toRow(record: QaRecord): QaRow {
  return {
    id: record.id,
    question: record.question,
    question_normalized: record.questionNormalized,
    answer: record.answer,
    source: record.source,
    created_at_ms: record.createdAtMs,
  };
}

function fromRow(row: Record<string, unknown>) {
  return QaRecordSchema.safeParse({
    id: row["id"],
    question: row["question"],
    questionNormalized: row["question_normalized"],
    answer: row["answer"],
    source: row["source"],
    createdAtMs: Number(row["created_at_ms"]),
  });
}

export class LanceDbQaStore implements QaRecordStore {
  private readonly path: string;
  private readonly tableName: string;
  private readonly logger: Logger;
  private db?: Connection;
  private table?: Table;
  private _connected = false;

  constructor(config: LanceDbConfig) {
    if (!config.path || config.path.trim() === "") {
      throw new StoreError({ store: "lancedb", message: "LanceDB path cannot be empty" });
    }
    if (!config.table || config.table.trim() === "") {
      throw new StoreError({ store: "lancedb", message: "LanceDB table name cannot be empty" });
    }
    this.path = config.path;
    this.tableName = config.table;
    this.logger = (config.logger ?? silentLogger).child("lancedb");
  }

  get isAvailable(): boolean {
    return this._connected && this.db !== undefined;
  }

  async connect(): Promise<void> {
    try {
      const db = await lancedb.connect(this.path);
      const names = await db.tableNames();
      // Created on first insert otherwise
      this.table = names.includes(this.tableName)
        ? await db.openTable(this.tableName)
        : undefined;
      this.db = db;
      this._connected = true;
    } catch (error) {
      this._connected = false;
      this.db = undefined;
      this.table = undefined;
      throw new StoreError({
        store: "lancedb",
        operation: "connect",
        message: `Failed to open LanceDB at "${this.path}": ${error instanceof Error ? error.message : String(error)}`,
        cause: error,
      });
    }
  }

  async insertIfAbsent(record: QaRecord): Promise<boolean> {
    if (!this.db) {
      throw new StoreError({
        store: "lancedb",
        operation: "insert",
        message: "LanceDB not connected. Call connect() first.",
      });
    }
    if (!this.table) {
      this.table = await this.db.createTable(this.tableName, [toRow(record)]);
      return true;
    }
    if (await this.queryExact(record.questionNormalized)) return false;
    await this.table.add([toRow(record)]);
    return true;
  }

  async queryExact(normalized: string): Promise<QaRecord | undefined> {
    if (!this.table) return undefined;
    const rows = await this.table
      .query()
      .where(`question_normalized = '${escapeSqlString(normalized)}'`)
      .limit(1)
      .toArray();
    return this.firstRecord(rows);
  }

  async queryContainingAny(keywords: string[], limit: number): Promise<QaRecord[]> {
    if (!this.table || limit <= 0) return [];
    const clause = buildContainsAnyClause("question_normalized", keywords);
    if (!clause) return [];
    const rows = await this.table.query().where(clause).limit(limit).toArray();
    const out: QaRecord[] = [];
    for (const row of rows) {
      const record = this.toRecord(row);
      if (record) out.push(record);
    }
    return out;
  }

  private firstRecord(rows: unknown[]): QaRecord | undefined {
    const [first] = rows;
    return first === undefined ? undefined : this.toRecord(first);
  }

  private toRecord(row: unknown): QaRecord | undefined {
    if (typeof row !== "object" || row === null) return undefined;
    const fields: Record<string, unknown> = { ...row };
    const parsed = fromRow(fields);
    if (parsed.success) return parsed.data;
    this.logger.warn(`dropped malformed row id=${String(fields["id"])}`);
    return undefined;
  }
}
