import type { HedgeExecution } from "@/domains/state";

import type { HedgeExecutionRepository } from "../../ports/hedge-execution-repository";

export interface InMemoryHedgeExecutionRepository extends HedgeExecutionRepository {
  /** Saved executions in insertion order */
  all(): HedgeExecution[];
}

/**
 * Process-local audit trail, used when no database is configured.
 * Keeps at most `maxEntries` executions, dropping the oldest.
 */
export const createInMemoryHedgeExecutionRepository = (
  maxEntries = 1000,
): InMemoryHedgeExecutionRepository => {
  const executions = new Map<string, HedgeExecution>();

  return {
    save: async (execution) => {
      executions.set(execution.id, execution);
      for (const id of executions.keys()) {
        if (executions.size <= maxEntries) {
          break;
        }
        executions.delete(id);
      }
    },

    findById: async (id) => executions.get(id) ?? null,

    listRecent: async (limit) =>
      [...executions.values()]
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
        .slice(0, limit),

    countFilledSince: async (since) =>
      [...executions.values()].filter(
        (execution) =>
          execution.status === "FILLED" && execution.createdAt.getTime() >= since.getTime(),
      ).length,

    all: () => [...executions.values()],
  };
};
