/**
 * Business logic: synthesize a plausible price path into "now" and three
 * forward scenario bands out of it.
 */
import { SignalInputError } from "../errors";
import {
  ChartSeries,
  TRAJECTORY_PATTERNS,
  TrajectoryPattern,
} from "../types/domain";

export const SERIES_LENGTH = 20;
export const DEFAULT_ACCENT_COLOR = "#00ff88";

export interface SynthesizeTrajectoryOptions {
  eventLabel?: string;
  accentColor?: string;
  /** Uniform source on [0, 1); defaults to Math.random */
  random?: () => number;
}

export function resolvePattern(name: string): TrajectoryPattern {
  const normalized = String(name ?? "").trim().toLowerCase();
  return TRAJECTORY_PATTERNS.find(p => p === normalized) ?? "decline";
}

export function defaultEventLabel(currentPrice: number): string {
  return `Signal @ $${currentPrice.toFixed(2)}`;
}

export function synthesizeTrajectory(
  symbol: string,
  currentPrice: number,
  patternName: string,
  options: SynthesizeTrajectoryOptions = {}
): ChartSeries {
  if (!Number.isFinite(currentPrice) || currentPrice <= 0) {
    throw new SignalInputError(
      `currentPrice for ${symbol} must be a positive number`,
      [`currentPrice: got ${currentPrice}`]
    );
  }

  const random = options.random ?? Math.random;
  const noise = (amplitude: number) => amplitude * (2 * random() - 1);
  const pattern = resolvePattern(patternName);

  return {
    historical: buildHistory(pattern, currentPrice, noise),
    ...buildBands(currentPrice),
    eventLabel: options.eventLabel ?? defaultEventLabel(currentPrice),
    accentColor: options.accentColor ?? DEFAULT_ACCENT_COLOR,
  };
}

function buildHistory(
  pattern: TrajectoryPattern,
  price: number,
  noise: (amplitude: number) => number
): number[] {
  const points: number[] = [];
  for (let i = 0; i < SERIES_LENGTH; i += 1) {
    points.push(historyPoint(pattern, price, i, noise));
  }
  return points;
}

function historyPoint(
  pattern: TrajectoryPattern,
  price: number,
  i: number,
  noise: (amplitude: number) => number
): number {
  switch (pattern) {
    case "momentum": {
      // Run-up from 0.8P, then hovering at P
      if (i < 15) return 0.8 * price + 0.2 * price * (i / 15) + noise(2);
      return price + noise(3);
    }
    case "volatile":
      return price + Math.sin(i * 0.5) * price * 0.1 + noise(5);
    case "breakout": {
      // Plateau at 0.9P; the ramp lands on P at the last point
      if (i < 15) return 0.9 * price + noise(2);
      return 0.9 * price + 0.1 * price * ((i - 14) / 5);
    }
    case "decline":
      return 1.2 * price - 0.2 * price * (i / (SERIES_LENGTH - 1)) + noise(2);
  }
}

function buildBands(
  price: number
): Pick<ChartSeries, "bandUpper" | "bandBase" | "bandLower"> {
  const bandUpper: number[] = [];
  const bandBase: number[] = [];
  const bandLower: number[] = [];

  for (let i = 0; i < SERIES_LENGTH; i += 1) {
    const progress = i / SERIES_LENGTH;
    bandUpper.push(price + price * 0.3 * progress + Math.pow(i, 1.1));
    bandBase.push(price + price * 0.1 * progress);
    bandLower.push(price - price * 0.2 * progress - Math.pow(i, 1.05));
  }

  return { bandUpper, bandBase, bandLower };
}
