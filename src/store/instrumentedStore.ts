import type { Logger } from "../lib/log";
import { metrics } from "../lib/metrics";
import {
  StoreError,
  type DocumentFields,
  type Predicate,
  type QueryOptions,
  type QueryPage,
  type RemoteStoreClient,
  type StoreOp,
  type StoredDocument,
  type WriteOptions,
} from "./types";

/** Wraps a store with request counters, latency histograms and debug logging. Errors pass through unchanged. */
export class InstrumentedStore implements RemoteStoreClient {
  readonly name: string;

  constructor(private readonly inner: RemoteStoreClient, private readonly logger: Logger) {
    this.name = inner.name;
  }

  getDocument(collection: string, id: string): Promise<StoredDocument | null> {
    return this.observe("get", collection, () => this.inner.getDocument(collection, id));
  }

  query(collection: string, predicates: Predicate[], options?: QueryOptions): Promise<QueryPage> {
    return this.observe("query", collection, () => this.inner.query(collection, predicates, options));
  }

  setDocument(collection: string, id: string, fields: DocumentFields, options?: WriteOptions): Promise<void> {
    return this.observe("set", collection, () => this.inner.setDocument(collection, id, fields, options));
  }

  deleteDocument(collection: string, id: string): Promise<void> {
    return this.observe("delete", collection, () => this.inner.deleteDocument(collection, id));
  }

  private async observe<T>(op: StoreOp, collection: string, call: () => Promise<T>): Promise<T> {
    const started = Date.now();
    let outcome = "ok";
    try {
      return await call();
    } catch (err) {
      outcome = err instanceof StoreError ? err.code : "Unknown";
      throw err;
    } finally {
      const labels = { store: this.name, op, outcome };
      const elapsedMs = Date.now() - started;
      metrics.storeRequestsTotal.inc(labels);
      metrics.storeRequestDurationSeconds.observe(labels, elapsedMs / 1000);
      this.logger.debug("store_call", { store: this.name, op, collection, outcome, latencyMs: elapsedMs });
    }
  }
}
