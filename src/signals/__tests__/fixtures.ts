import type { SignalRecordInput } from "@src/signals/business/create_signal_record";
import { SERIES_LENGTH } from "@src/signals/business/synthesize_trajectory";
import type { ChartSeries } from "@src/signals/types/domain";

export function fixedSeries(price: number, eventLabel = "Test event"): ChartSeries {
  const flat = Array.from({ length: SERIES_LENGTH }, () => price);
  return {
    historical: [...flat],
    bandUpper: flat.map((p, i) => p + i),
    bandBase: [...flat],
    bandLower: flat.map((p, i) => p - i),
    eventLabel,
    accentColor: "#00ff88",
  };
}

export function ipoInput(
  overrides: Partial<SignalRecordInput> = {}
): SignalRecordInput {
  return {
    ticker: "CRCL",
    displayName: "Circle Internet Group",
    kind: "ipo-debut",
    currentPrice: 69,
    priceChangeAbsolute: 38,
    priceChangePercent: 122.6,
    priority: "elevated-hot",
    keyStatistics: [
      { displayValue: "168%", label: "Day 1 Pop" },
      { displayValue: "$18B", label: "Valuation", isFavorable: false },
      { displayValue: "45M", label: "Volume", isFavorable: false },
    ],
    strategy: {
      title: "IPO Momentum Play",
      description: "Priced at $31 and opened at $69. Watch the first pullback.",
      linkText: "IPO strategy guide →",
      linkUrl: "https://example.com/ipo-guide",
    },
    timestampLabel: "Just now",
    ...overrides,
  };
}

export function minimalInput(
  overrides: Partial<SignalRecordInput> = {}
): SignalRecordInput {
  return {
    ticker: "MINI",
    displayName: "Minimal Holdings",
    kind: "earnings-momentum",
    currentPrice: 10,
    priceChangeAbsolute: -0.5,
    priceChangePercent: -4.8,
    ...overrides,
  };
}
