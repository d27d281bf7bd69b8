import type { HedgeExecution } from "@/domains/state";

/**
 * Audit trail of hedge executions. `save` is an upsert keyed by the
 * execution id, so an execution can be written once per transition or
 * once at the end.
 */
export interface HedgeExecutionRepository {
  save(execution: HedgeExecution): Promise<void>;
  findById(id: string): Promise<HedgeExecution | null>;
  /** Newest first */
  listRecent(limit: number): Promise<HedgeExecution[]>;
  /** Filled executions created at or after `since` */
  countFilledSince(since: Date): Promise<number>;
}
