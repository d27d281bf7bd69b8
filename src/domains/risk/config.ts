/**
 * Hedger configuration: sizing limits, execution bounds and risk
 * classification thresholds.
 *
 * Sizes are in units of the hedged base asset (e.g. ETH). Ratios and
 * losses are fractions (0.05 = 5%).
 */

import * as v from "valibot";

const positiveNumber = v.pipe(v.number(), v.finite(), v.gtValue(0));

const fraction = v.pipe(v.number(), v.gtValue(0), v.ltValue(1));

export const RiskThresholdsSchema = v.pipe(
  v.object({
    /** Impermanent loss above which a position is HIGH risk */
    highImpermanentLoss: positiveNumber,
    /** Impermanent loss above which a position is MEDIUM risk */
    moderateImpermanentLoss: positiveNumber,
    /** |delta * price| / value above which a position is HIGH risk */
    highDeltaRatio: positiveNumber,
    moderateDeltaRatio: positiveNumber,
    /** Net loss as a fraction of value above which a position is HIGH risk */
    highLossRatio: positiveNumber,
  }),
  v.check(
    (thresholds) => thresholds.moderateImpermanentLoss <= thresholds.highImpermanentLoss,
    "moderateImpermanentLoss must not exceed highImpermanentLoss",
  ),
  v.check(
    (thresholds) => thresholds.moderateDeltaRatio <= thresholds.highDeltaRatio,
    "moderateDeltaRatio must not exceed highDeltaRatio",
  ),
);

export type RiskThresholds = v.InferOutput<typeof RiskThresholdsSchema>;

export const timeInForceSchema = v.picklist(["Ioc", "Gtc"] as const);

export type TimeInForce = v.InferOutput<typeof timeInForceSchema>;

export const HedgerConfigSchema = v.object({
  /** Net exposure the hedger steers towards; 0 is delta-neutral */
  targetDelta: v.pipe(v.number(), v.finite()),
  /** Deadband: no action while |net exposure| stays below this */
  deltaThreshold: positiveNumber,
  /** Delta ratio that flags a position for rebalancing */
  rebalanceThreshold: positiveNumber,
  /** Ceiling for a single order and for the adjustment */
  maxPositionSize: positiveNumber,
  minOrderSize: positiveNumber,
  maxDailyTrades: v.pipe(v.number(), v.integer(), v.minValue(1)),
  slippageTolerance: fraction,
  maxLeverage: positiveNumber,
  timeInForce: timeInForceSchema,
  varConfidence: fraction,
  varHorizonDays: positiveNumber,
  /** Annualized volatility estimate of the base asset */
  volatility: positiveNumber,
  thresholds: RiskThresholdsSchema,
});

export type HedgerConfig = v.InferOutput<typeof HedgerConfigSchema>;

/**
 * Subset of the hedger config the risk assessment reads.
 */
export type RiskConfig = Pick<
  HedgerConfig,
  "rebalanceThreshold" | "varConfidence" | "varHorizonDays" | "thresholds"
>;

export const DEFAULT_RISK_THRESHOLDS: RiskThresholds = {
  highImpermanentLoss: 0.05,
  moderateImpermanentLoss: 0.02,
  highDeltaRatio: 0.5,
  moderateDeltaRatio: 0.05,
  highLossRatio: 0.02,
};

export const DEFAULT_HEDGER_CONFIG: HedgerConfig = {
  targetDelta: 0,
  deltaThreshold: 0.1,
  rebalanceThreshold: 0.05,
  maxPositionSize: 10,
  minOrderSize: 0.01,
  maxDailyTrades: 100,
  slippageTolerance: 0.005,
  maxLeverage: 1,
  timeInForce: "Ioc",
  varConfidence: 0.95,
  varHorizonDays: 1,
  volatility: 0.5,
  thresholds: DEFAULT_RISK_THRESHOLDS,
};

export class HedgerConfigError extends Error {
  public readonly code = "INVALID_HEDGER_CONFIG";

  constructor(public readonly issues: string[]) {
    super(`Invalid hedger configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "HedgerConfigError";
  }
}

/**
 * Validate hedger configuration. Any missing or non-positive threshold is
 * reported; startup treats the error as fatal.
 */
export const parseHedgerConfig = (input: unknown): HedgerConfig => {
  const result = v.safeParse(HedgerConfigSchema, input);
  if (result.success) {
    return result.output;
  }
  throw new HedgerConfigError(
    result.issues.map((issue) => `${v.getDotPath(issue) ?? "(root)"}: ${issue.message}`),
  );
};
