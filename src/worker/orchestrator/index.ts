export { createCycleRunner } from "./cycle-runner";
export type {
  CycleExecutionSummary,
  CycleMetricsSink,
  CycleReport,
  CycleRunner,
  CycleRunnerDeps,
  CycleStatus,
  EmergencyCloseOptions,
} from "./types";
export { CycleError } from "./types";
