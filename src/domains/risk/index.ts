// Types
export type {
  RiskClassification,
  RiskClassificationInput,
  RiskLevel,
  RiskMetrics,
  RiskReport,
  RiskSummary,
} from "./types";

export { escalateRiskLevel, isRiskLevel, riskLevelSchema } from "./types";

// Config
export type { HedgerConfig, RiskConfig, RiskThresholds, TimeInForce } from "./config";
export {
  DEFAULT_HEDGER_CONFIG,
  DEFAULT_RISK_THRESHOLDS,
  HedgerConfigError,
  HedgerConfigSchema,
  parseHedgerConfig,
  RiskThresholdsSchema,
  timeInForceSchema,
} from "./config";

// Classification and assessment
export { classifyRisk } from "./classify";
export { assessPosition, calculateDeltaRatio, type AssessmentContext } from "./assess";
export { buildRiskReport, summarizeRisk } from "./summary";
