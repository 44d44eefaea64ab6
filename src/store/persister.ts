import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { PaperRecord, SaveResult } from "../types";
import { RecordStore, StoreConnector } from "./types";

type PersisterState =
  | { mode: "pending" }
  | { mode: "healthy"; store: RecordStore }
  | { mode: "degraded"; reason: string };

export interface PersisterDeps {
  connect: StoreConnector;
  logger: Logger;
  metrics: MetricsRegistry;
  now?: () => Date;
}

/**
 * Writes records to the store, opening it on first use. A failed open puts the
 * persister in degraded mode for the rest of the run: no reconnect attempts,
 * every save reports a soft failure.
 */
export class RecordPersister {
  private state: PersisterState = { mode: "pending" };

  constructor(private readonly deps: PersisterDeps) {}

  get degraded(): boolean {
    return this.state.mode === "degraded";
  }

  save(record: PaperRecord): SaveResult {
    const { logger, metrics } = this.deps;
    const store = this.ensureStore();
    if (!store) {
      metrics.incrementCounter("persist_failed", 1);
      return { status: "soft_failure", reason: this.state.mode === "degraded" ? this.state.reason : "store unavailable" };
    }

    try {
      const createdAt = (this.deps.now ?? (() => new Date()))().toISOString();
      const id = store.save(record, createdAt);
      metrics.incrementCounter("persist_ok", 1);
      logger.debug("persist_ok", { id, page: record.page, title: record.title });
      return { status: "ack", id };
    } catch (error) {
      metrics.incrementCounter("persist_failed", 1);
      logger.warn("persist_insert_failed", { page: record.page, title: record.title, error: errorMessage(error) });
      return { status: "soft_failure", reason: errorMessage(error) };
    }
  }

  close(): void {
    if (this.state.mode === "healthy") {
      this.state.store.close();
      this.state = { mode: "degraded", reason: "store closed" };
    }
  }

  private ensureStore(): RecordStore | undefined {
    if (this.state.mode === "healthy") {
      return this.state.store;
    }
    if (this.state.mode === "degraded") {
      return undefined;
    }

    try {
      const store = this.deps.connect();
      this.state = { mode: "healthy", store };
      this.deps.logger.info("persist_store_ready");
      return store;
    } catch (error) {
      this.state = { mode: "degraded", reason: errorMessage(error) };
      this.deps.logger.warn("persist_store_unavailable_continuing_without_storage", { error: errorMessage(error) });
      return undefined;
    }
  }
}
