import { Hono } from "hono";

import type { DispatcherMetrics } from "@/engine/dispatcher";
import type { JournalMetrics } from "@/engine/journal";

const MAX_DURATIONS = 1000;

export interface MetricsStore {
  incrementHttpRequests: () => void;
  recordDuration: (durationMs: number) => void;
  snapshot: () => { httpRequestsTotal: number; httpRequestDuration: readonly number[] };
}

export const createMetricsStore = (): MetricsStore => {
  let httpRequestsTotal = 0;
  const httpRequestDuration: number[] = [];

  return {
    incrementHttpRequests: () => {
      httpRequestsTotal++;
    },
    recordDuration: (durationMs) => {
      httpRequestDuration.push(durationMs);
      if (httpRequestDuration.length > MAX_DURATIONS) {
        httpRequestDuration.shift();
      }
    },
    snapshot: () => ({ httpRequestsTotal, httpRequestDuration }),
  };
};

export interface MetricsSources {
  dispatcher: { getMetrics: () => DispatcherMetrics };
  journal: { getMetrics: () => JournalMetrics };
}

const bucket = (durations: readonly number[], limitMs: number): number =>
  durations.filter((duration) => duration < limitMs).length;

export const createMetricsRoute = (store: MetricsStore, sources: MetricsSources): Hono => {
  const metrics = new Hono();

  metrics.get("/", (c) => {
    const { httpRequestsTotal, httpRequestDuration } = store.snapshot();
    const commands = sources.dispatcher.getMetrics();
    const journal = sources.journal.getMetrics();

    const prometheusFormat = `
# HELP http_requests_total Total number of HTTP requests
# TYPE http_requests_total counter
http_requests_total ${httpRequestsTotal}

# HELP http_request_duration_seconds HTTP request duration in seconds
# TYPE http_request_duration_seconds histogram
http_request_duration_seconds_bucket{le="0.1"} ${bucket(httpRequestDuration, 100)}
http_request_duration_seconds_bucket{le="0.5"} ${bucket(httpRequestDuration, 500)}
http_request_duration_seconds_bucket{le="1.0"} ${bucket(httpRequestDuration, 1000)}
http_request_duration_seconds_bucket{le="+Inf"} ${httpRequestDuration.length}

# HELP engine_commands_processed_total Engine commands that committed
# TYPE engine_commands_processed_total counter
engine_commands_processed_total ${commands.processed}

# HELP engine_commands_failed_total Engine commands that were rejected or failed
# TYPE engine_commands_failed_total counter
engine_commands_failed_total ${commands.failed}

# HELP engine_commands_pending Engine commands waiting in market queues
# TYPE engine_commands_pending gauge
engine_commands_pending ${commands.pending}

# HELP journal_batches_persisted_total Ledger change sets written to the database
# TYPE journal_batches_persisted_total counter
journal_batches_persisted_total ${journal.persisted}

# HELP journal_batches_failed_total Ledger change sets that failed to persist
# TYPE journal_batches_failed_total counter
journal_batches_failed_total ${journal.failed}
`.trim();

    return c.text(prometheusFormat, 200, {
      "Content-Type": "text/plain; version=0.0.4",
    });
  });

  return metrics;
};
