import type { Logger } from "../cli/logging";
import type { QaRecordStore } from "../domain/qa/store";
import type { AppConfig } from "../infrastructure/config/schema";
import { createQaStore } from "../infrastructure/store/factory";
import { QaIngestService } from "./ingest/qa-ingest";
import { StagedMatcher } from "./match/staged-matcher";

export type QaRuntime = {
  store: QaRecordStore;
  matcher: StagedMatcher;
  ingest: QaIngestService;
};

/**
 * Wires the store, matcher and ingest service from config. Pass `store` to
 * reuse an existing adapter instead of opening one.
 */
export async function createQaRuntime(
  config: AppConfig,
  logger: Logger,
  store?: QaRecordStore,
): Promise<QaRuntime> {
  const qaStore = store ?? (await createQaStore(config, logger));
  return {
    store: qaStore,
    matcher: new StagedMatcher({
      store: qaStore,
      config: config.matcher,
      weights: config.similarity,
      logger,
    }),
    ingest: new QaIngestService({ store: qaStore, logger }),
  };
}
