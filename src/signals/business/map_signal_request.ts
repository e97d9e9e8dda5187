/**
 * Business logic: turn a loose form/API payload into a validated signal
 * record, synthesizing its chart from the requested pattern.
 */
import { z } from "zod";
import { SignalInputError } from "../errors";
import {
  KeyStatistic,
  PRIORITY_LEVELS,
  SIGNAL_KINDS,
  SignalRecord,
} from "../types/domain";
import {
  SignalRecordInput,
  createSignalRecord,
} from "./create_signal_record";
import { synthesizeTrajectory } from "./synthesize_trajectory";

// Numbers arrive as numbers or numeric strings from HTML forms
function numeric(fallback: number) {
  return z.preprocess(
    value => (value === undefined || value === null || value === "" ? fallback : value),
    z.coerce.number().finite()
  );
}

const RequestStatSchema = z.object({
  value: z.string().optional(),
  label: z.string().optional(),
  isFavorable: z.boolean().optional(),
});

export const SignalRequestSchema = z.object({
  ticker: z
    .string()
    .trim()
    .default("STOCK")
    .transform(value => value.toUpperCase()),
  companyName: z.string().trim().default("Unknown Company"),
  signalType: z.enum(SIGNAL_KINDS).default("earnings-momentum"),
  priority: z.enum(PRIORITY_LEVELS).default("normal"),
  currentPrice: numeric(100),
  changePercent: numeric(0),
  stats: z.array(RequestStatSchema).default([]),
  strategyTitle: z.string().trim().optional(),
  strategyDesc: z.string().trim().optional(),
  strategyLinkText: z.string().optional(),
  strategyLinkUrl: z.string().optional(),
  chartPattern: z.string().default("momentum"),
  eventLabel: z.string().trim().optional(),
  timestamp: z.string().default("Just now"),
  isRisky: z.boolean().default(false),
  borderStyle: z.enum(["solid", "dashed"]).default("solid"),
  notifications: z.boolean().default(true),
});

export type SignalRequest = z.output<typeof SignalRequestSchema>;

export interface MapSignalRequestDependencies {
  random?: () => number;
}

export function parseSignalRequest(payload: unknown): SignalRequest {
  const parsed = SignalRequestSchema.safeParse(payload ?? {});
  if (!parsed.success) {
    throw SignalInputError.fromZod("Invalid signal request", parsed.error);
  }
  return parsed.data;
}

export function mapSignalRequest(
  payload: unknown,
  deps: MapSignalRequestDependencies = {}
): SignalRecord {
  const request = parseSignalRequest(payload);

  const chartSeries = synthesizeTrajectory(
    request.ticker,
    request.currentPrice,
    request.chartPattern,
    { eventLabel: request.eventLabel || undefined, random: deps.random }
  );

  const input: SignalRecordInput = {
    ticker: request.ticker,
    displayName: request.companyName,
    kind: request.signalType,
    currentPrice: request.currentPrice,
    priceChangeAbsolute: request.currentPrice * (request.changePercent / 100),
    priceChangePercent: request.changePercent,
    priority: request.priority,
    keyStatistics: toKeyStatistics(request.stats),
    strategy: toStrategyNote(request),
    chartSeries,
    timestampLabel: request.timestamp,
    notificationsDefaultOn: request.notifications,
    riskStyleEnabled: request.isRisky,
    borderVariant: request.borderStyle,
  };
  return createSignalRecord(input);
}

// Rows missing a value or a label are dropped, not rejected
function toKeyStatistics(stats: SignalRequest["stats"]): KeyStatistic[] {
  return stats.flatMap(stat =>
    stat.value && stat.label
      ? [
          {
            displayValue: stat.value,
            label: stat.label,
            isFavorable: stat.isFavorable ?? true,
          },
        ]
      : []
  );
}

function toStrategyNote(
  request: SignalRequest
): SignalRecordInput["strategy"] {
  if (!request.strategyTitle || !request.strategyDesc) return undefined;
  return {
    title: request.strategyTitle,
    description: request.strategyDesc,
    linkText: request.strategyLinkText || undefined,
    linkUrl: request.strategyLinkUrl || undefined,
  };
}
