/**
 * Risk classification types, schemas, and type guards.
 */

import * as v from "valibot";

// --- Risk Levels ---

/**
 * Risk levels ordered by severity: LOW < MEDIUM < HIGH.
 */
export type RiskLevel = "LOW" | "MEDIUM" | "HIGH";

const RISK_LEVEL_SEVERITY: Record<RiskLevel, number> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
};

/**
 * The more severe of two levels. Severity never decreases.
 */
export const escalateRiskLevel = (current: RiskLevel, next: RiskLevel): RiskLevel =>
  RISK_LEVEL_SEVERITY[next] > RISK_LEVEL_SEVERITY[current] ? next : current;

// --- Classification ---

export interface RiskClassificationInput {
  impermanentLoss: number;
  deltaRatio: number;
  netPnlQuote: number;
  valueQuote: number;
}

export interface RiskClassification {
  level: RiskLevel;
  reasons: string[];
}

// --- Per-position and aggregate metrics ---

/**
 * Risk metrics for one position in one cycle. Amounts are human units;
 * `*Quote` values are in token1.
 */
export interface RiskMetrics {
  positionId: string;
  price: number;
  delta: number;
  gamma: number;
  amount0: number;
  amount1: number;
  valueQuote: number;
  /** Fraction of value */
  impermanentLoss: number;
  impermanentLossQuote: number;
  feesQuote: number;
  netPnlQuote: number;
  valueAtRiskQuote: number;
  downsideRiskQuote: number;
  deltaRatio: number;
  needsRebalance: boolean;
  riskLevel: RiskLevel;
  reasons: string[];
}

export interface RiskSummary {
  positionCount: number;
  /** Sum of per-position deltas */
  aggregateDelta: number;
  totalValueQuote: number;
  totalImpermanentLossQuote: number;
  totalFeesQuote: number;
  totalNetPnlQuote: number;
  highestRiskLevel: RiskLevel;
  rebalanceRequested: boolean;
}

/**
 * Flat record for logs. Impermanent loss is in percent.
 */
export interface RiskReport {
  positionId: string;
  riskLevel: RiskLevel;
  valueQuote: number;
  impermanentLossPercent: number;
  impermanentLossQuote: number;
  feesQuote: number;
  netPnlQuote: number;
  valueAtRiskQuote: number;
  downsideRiskQuote: number;
  delta: number;
  gamma: number;
  deltaRatio: number;
  needsRebalance: boolean;
  reasons: string;
}

// --- Valibot Schemas ---

export const riskLevelSchema = v.picklist(["LOW", "MEDIUM", "HIGH"] as const);

// --- Type Guards ---

export const isRiskLevel = (value: unknown): value is RiskLevel => v.is(riskLevelSchema, value);
