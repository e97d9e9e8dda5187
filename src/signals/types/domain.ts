/**
 * Domain types for signal pages.
 */

export const SIGNAL_KINDS = [
  "ipo-debut",
  "high-risk-derivative-play",
  "pre-market-mover",
  "split-announcement",
  "credit-spread",
  "crypto-yield-play",
  "regulatory-catalyst",
  "earnings-momentum",
  "unusual-derivative-flow",
  "short-squeeze",
] as const;

export type SignalKind = (typeof SIGNAL_KINDS)[number];

export const PRIORITY_LEVELS = [
  "elevated-urgent",
  "elevated-hot",
  "informational-watch",
  "normal",
] as const;

export type PriorityLevel = (typeof PRIORITY_LEVELS)[number];

export const TRAJECTORY_PATTERNS = [
  "momentum",
  "volatile",
  "breakout",
  "decline",
] as const;

export type TrajectoryPattern = (typeof TRAJECTORY_PATTERNS)[number];

export type BorderVariant = "solid" | "dashed";

export type BackgroundSpec =
  | { type: "flat"; color: string }
  | { type: "gradient"; value: string };

export interface KindStyle {
  badgeClass: string;
  background: BackgroundSpec;
  accentColor: string;
  displayName: string;
}

export interface KeyStatistic {
  displayValue: string;
  label: string;
  isFavorable: boolean;
}

export interface StrategyNote {
  title: string;
  description: string;
  linkText: string;
  linkUrl: string;
}

/**
 * One "now-centered" trajectory: 20 historical points ending at now,
 * followed by 20 forward points per scenario band.
 */
export interface ChartSeries {
  historical: number[];
  bandUpper: number[];
  bandBase: number[];
  bandLower: number[];
  eventLabel: string;
  accentColor: string;
}

/** A series once attached to a record; frozen from then on. */
export interface AttachedChartSeries {
  readonly historical: readonly number[];
  readonly bandUpper: readonly number[];
  readonly bandBase: readonly number[];
  readonly bandLower: readonly number[];
  readonly eventLabel: string;
  readonly accentColor: string;
}

export interface SignalRecord {
  readonly ticker: string;
  readonly displayName: string;
  readonly kind: SignalKind;
  readonly currentPrice: number;
  readonly priceChangeAbsolute: number;
  readonly priceChangePercent: number;
  readonly priority: PriorityLevel;
  readonly keyStatistics: readonly Readonly<KeyStatistic>[];
  readonly strategy?: Readonly<StrategyNote>;
  readonly chartSeries?: AttachedChartSeries;
  readonly timestampLabel: string;
  readonly notificationsDefaultOn: boolean;
  readonly riskStyleEnabled: boolean;
  readonly borderVariant: BorderVariant;
}

export interface SignalSummary {
  ticker: string;
  displayName: string;
  kind: SignalKind;
  priority: PriorityLevel;
  currentPrice: number;
  priceChangePercent: number;
  timestamp: string;
  filename: string;
}

export interface WrittenPage {
  filename: string;
  filePath: string;
  absolutePath: string;
  fileSize: number;
}
