/**
 * Validated construction of signal records. Every required field and every
 * default is enforced here, once; the compositor trusts what it receives.
 */
import { z } from "zod";
import { getKindStyle } from "../catalog";
import { SignalInputError } from "../errors";
import {
  AttachedChartSeries,
  ChartSeries,
  PRIORITY_LEVELS,
  SIGNAL_KINDS,
  SignalRecord,
} from "../types/domain";
import { DEFAULT_ACCENT_COLOR, SERIES_LENGTH } from "./synthesize_trajectory";

export const DEFAULT_LINK_TEXT = "Learn more →";
export const DEFAULT_LINK_URL = "https://example.com/strategy";
export const DEFAULT_TIMESTAMP_LABEL = "Just now";

const seriesSchema = z.array(z.number().finite()).length(SERIES_LENGTH);

export const KeyStatisticSchema = z.object({
  displayValue: z.string(),
  label: z.string(),
  isFavorable: z.boolean().default(true),
});

export const StrategyNoteSchema = z.object({
  title: z.string().min(1),
  description: z.string(),
  linkText: z.string().default(DEFAULT_LINK_TEXT),
  linkUrl: z.string().default(DEFAULT_LINK_URL),
});

export const ChartSeriesSchema = z.object({
  historical: seriesSchema,
  bandUpper: seriesSchema,
  bandBase: seriesSchema,
  bandLower: seriesSchema,
  eventLabel: z.string(),
  accentColor: z.string().default(DEFAULT_ACCENT_COLOR),
});

export const SignalRecordInputSchema = z.object({
  ticker: z.string().min(1),
  displayName: z.string().min(1),
  kind: z.enum(SIGNAL_KINDS),
  currentPrice: z.number().finite(),
  priceChangeAbsolute: z.number().finite(),
  priceChangePercent: z.number().finite(),
  priority: z.enum(PRIORITY_LEVELS).default("normal"),
  keyStatistics: z.array(KeyStatisticSchema).default([]),
  strategy: StrategyNoteSchema.optional(),
  chartSeries: ChartSeriesSchema.optional(),
  timestampLabel: z.string().default(DEFAULT_TIMESTAMP_LABEL),
  notificationsDefaultOn: z.boolean().default(true),
  riskStyleEnabled: z.boolean().default(false),
  borderVariant: z.enum(["solid", "dashed"]).default("solid"),
});

export type SignalRecordInput = z.input<typeof SignalRecordInputSchema>;

export function createSignalRecord(input: unknown): SignalRecord {
  const parsed = SignalRecordInputSchema.safeParse(input);
  if (!parsed.success) {
    throw SignalInputError.fromZod("Invalid signal record", parsed.error);
  }

  const data = parsed.data;
  const accentColor = getKindStyle(data.kind).accentColor;

  return Object.freeze({
    ticker: data.ticker,
    displayName: data.displayName,
    kind: data.kind,
    currentPrice: data.currentPrice,
    priceChangeAbsolute: data.priceChangeAbsolute,
    priceChangePercent: data.priceChangePercent,
    priority: data.priority,
    keyStatistics: Object.freeze(
      data.keyStatistics.map(stat => Object.freeze({ ...stat }))
    ),
    strategy: data.strategy ? Object.freeze({ ...data.strategy }) : undefined,
    chartSeries: data.chartSeries
      ? attachSeries(data.chartSeries, accentColor)
      : undefined,
    timestampLabel: data.timestampLabel,
    notificationsDefaultOn: data.notificationsDefaultOn,
    riskStyleEnabled: data.riskStyleEnabled,
    borderVariant: data.borderVariant,
  });
}

// The series is copied so later edits to the caller's arrays cannot leak in
function attachSeries(
  series: ChartSeries,
  accentColor: string
): AttachedChartSeries {
  return Object.freeze({
    historical: Object.freeze([...series.historical]),
    bandUpper: Object.freeze([...series.bandUpper]),
    bandBase: Object.freeze([...series.bandBase]),
    bandLower: Object.freeze([...series.bandLower]),
    eventLabel: series.eventLabel,
    accentColor,
  });
}
