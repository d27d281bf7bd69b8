import { Hono } from "hono";

import type { HedgeExecution } from "@/domains/state";
import type { CycleMetricsSink, CycleReport } from "@/worker/orchestrator";

const DURATION_BUCKETS_MS = [100, 500, 1000] as const;
const CYCLE_BUCKETS_MS = [1000, 5000, 30000] as const;
const MAX_SAMPLES = 1000;

/**
 * In-process Prometheus store. The worker writes cycle results through
 * CycleMetricsSink; the HTTP middleware records request timings.
 */
export interface MetricsStore extends CycleMetricsSink {
  recordHttpRequest(durationMs: number): void;
  render(): string;
}

const pushSample = (samples: number[], value: number): void => {
  samples.push(value);
  // Keep only the last samples to bound memory
  if (samples.length > MAX_SAMPLES) {
    samples.shift();
  }
};

const formatLabels = (labels: Record<string, string>): string => {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return "";
  }
  return `{${entries.map(([key, value]) => `${key}="${value}"`).join(",")}}`;
};

/** Cumulative `le` buckets in seconds, then `_sum` and `_count` */
const histogramLines = (
  name: string,
  samplesMs: readonly number[],
  bucketsMs: readonly number[],
): string[] => [
  ...bucketsMs.map(
    (bucket) =>
      `${name}_bucket{le="${(bucket / 1000).toFixed(1)}"} ${samplesMs.filter((d) => d <= bucket).length}`,
  ),
  `${name}_bucket{le="+Inf"} ${samplesMs.length}`,
  `${name}_sum ${samplesMs.reduce((total, d) => total + d, 0) / 1000}`,
  `${name}_count ${samplesMs.length}`,
];

export const createMetricsStore = (): MetricsStore => {
  let httpRequestsTotal = 0;
  const httpDurations: number[] = [];
  const cycleDurations: number[] = [];
  const cyclesByStatus = new Map<string, number>();
  const executionsByOutcome = new Map<string, number>();
  let lastReport: CycleReport | null = null;

  const increment = (counts: Map<string, number>, key: string): void => {
    counts.set(key, (counts.get(key) ?? 0) + 1);
  };

  return {
    recordHttpRequest: (durationMs: number): void => {
      httpRequestsTotal++;
      pushSample(httpDurations, durationMs);
    },

    recordCycle: (report: CycleReport): void => {
      increment(cyclesByStatus, report.status);
      pushSample(cycleDurations, report.durationMs);
      lastReport = report;
    },

    recordExecution: (execution: HedgeExecution): void => {
      increment(
        executionsByOutcome,
        formatLabels({
          status: execution.status,
          reason: execution.reason,
          ...(execution.rejectReason ? { reject_reason: execution.rejectReason } : {}),
        }),
      );
    },

    render: (): string => {
      const lines: string[] = [
        "# HELP http_requests_total Total number of HTTP requests",
        "# TYPE http_requests_total counter",
        `http_requests_total ${httpRequestsTotal}`,
        "",
        "# HELP http_request_duration_seconds HTTP request duration in seconds",
        "# TYPE http_request_duration_seconds histogram",
        ...histogramLines("http_request_duration_seconds", httpDurations, DURATION_BUCKETS_MS),
        "",
        "# HELP hedger_cycles_total Completed and aborted hedge cycles",
        "# TYPE hedger_cycles_total counter",
        ...[...cyclesByStatus].map(
          ([status, count]) => `hedger_cycles_total${formatLabels({ status })} ${count}`,
        ),
        "",
        "# HELP hedger_cycle_duration_seconds Hedge cycle duration in seconds",
        "# TYPE hedger_cycle_duration_seconds histogram",
        ...histogramLines("hedger_cycle_duration_seconds", cycleDurations, CYCLE_BUCKETS_MS),
        "",
        "# HELP hedger_executions_total Hedge executions by terminal status",
        "# TYPE hedger_executions_total counter",
        ...[...executionsByOutcome].map(
          ([labels, count]) => `hedger_executions_total${labels} ${count}`,
        ),
      ];

      if (lastReport) {
        const gauges: [string, string, number][] = [
          ["hedger_aggregate_delta", "Aggregate LP delta in base units", lastReport.aggregateDelta],
          ["hedger_current_hedge", "Signed hedge size in base units", lastReport.currentHedge],
          ["hedger_net_exposure", "LP delta plus hedge in base units", lastReport.netExposure],
          ["hedger_total_value_quote", "LP value in quote units", lastReport.totalValueQuote],
          ["hedger_daily_trades", "Hedge trades executed today", lastReport.dailyTradeCount],
          ["hedger_positions", "Positions assessed in the last cycle", lastReport.positionCount],
        ];
        for (const [name, help, value] of gauges) {
          lines.push("", `# HELP ${name} ${help}`, `# TYPE ${name} gauge`, `${name} ${value}`);
        }
      }

      return lines.join("\n");
    },
  };
};

export const createMetricsRoute = (store: MetricsStore): Hono => {
  const metrics = new Hono();

  metrics.get("/", (c) =>
    c.text(store.render(), 200, {
      "Content-Type": "text/plain; version=0.0.4",
    }),
  );

  return metrics;
};
