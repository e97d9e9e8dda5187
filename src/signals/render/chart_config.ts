import type { ChartConfiguration, ChartDataset } from "chart.js";
import type { AttachedChartSeries } from "../types/domain";

export type BandChartConfiguration = ChartConfiguration<
  "line",
  (number | null)[],
  number
>;

type BandDataset = ChartDataset<"line", (number | null)[]>;

const BULL_BAND_COLOR = "rgba(0, 255, 136, 0.35)";
const BULL_FILL_COLOR = "rgba(0, 255, 136, 0.08)";
const BEAR_BAND_COLOR = "rgba(255, 71, 87, 0.35)";
const BEAR_FILL_COLOR = "rgba(255, 71, 87, 0.08)";

function pad(count: number): null[] {
  return Array.from({ length: count }, () => null);
}

/**
 * Scenario-band chart: the historical line fills the left half of a shared
 * axis (-N..-1), the three forward bands the right half (0..N-1). Upper and
 * lower bands shade toward the base line (dataset index 2).
 */
export function buildBandChartConfig(
  series: AttachedChartSeries,
  accentColor: string
): BandChartConfiguration {
  const history = series.historical.length;
  const forward = series.bandBase.length;
  const labels = Array.from(
    { length: history + forward },
    (_, i) => i - history
  );

  const historical: BandDataset = {
    label: "Historical",
    data: [...series.historical, ...pad(forward)],
    borderColor: accentColor,
    backgroundColor: "transparent",
    borderWidth: 2,
    pointRadius: 0,
    tension: 0.3,
    fill: false,
  };
  const upper: BandDataset = {
    label: "Upper Band",
    data: [...pad(history), ...series.bandUpper],
    borderColor: BULL_BAND_COLOR,
    backgroundColor: BULL_FILL_COLOR,
    borderDash: [5, 5],
    borderWidth: 1,
    pointRadius: 0,
    fill: "+1",
  };
  const base: BandDataset = {
    label: "Base Case",
    data: [...pad(history), ...series.bandBase],
    borderColor: accentColor,
    backgroundColor: "transparent",
    borderDash: [5, 5],
    borderWidth: 2,
    pointRadius: 0,
    fill: false,
  };
  const lower: BandDataset = {
    label: "Lower Band",
    data: [...pad(history), ...series.bandLower],
    borderColor: BEAR_BAND_COLOR,
    backgroundColor: BEAR_FILL_COLOR,
    borderDash: [5, 5],
    borderWidth: 1,
    pointRadius: 0,
    fill: "-1",
  };

  return {
    type: "line",
    data: {
      labels,
      datasets: [historical, upper, base, lower],
    },
    options: {
      responsive: true,
      maintainAspectRatio: false,
      animation: false,
      plugins: {
        legend: { display: false },
        tooltip: { enabled: false },
      },
      scales: {
        x: { display: false, grid: { display: false } },
        y: { display: false, grid: { display: false } },
      },
      elements: {
        point: { radius: 0 },
        line: { borderWidth: 2 },
      },
      interaction: { intersect: false },
    },
  };
}
