import type { Logger } from "../../cli/logging";
import { silentLogger } from "../../cli/logging";
import { toAppError } from "../../domain/common/errors";
import type { QaRecordStore } from "../../domain/qa/store";
import type { AppConfig } from "../config/schema";
import { InMemoryQaStore } from "./memory";

/**
 * Opens the configured store. A LanceDB store that fails to open is returned
 * disconnected (`isAvailable` false) so lookups report the store as
 * unavailable.
 */
export async function createQaStore(
  config: Pick<AppConfig, "store">,
  logger: Logger = silentLogger,
): Promise<QaRecordStore> {
  if (config.store.kind === "memory") {
    return new InMemoryQaStore();
  }

  // Loaded lazily so the native binding is only required for persistent stores
  const { LanceDbQaStore } = await import("./lancedb");
  const store = new LanceDbQaStore({
    path: config.store.path,
    table: config.store.table,
    logger,
  });
  try {
    await store.connect();
  } catch (error) {
    logger.child("store").error(toAppError(error).message);
  }
  return store;
}
