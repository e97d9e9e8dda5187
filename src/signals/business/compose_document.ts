/**
 * Business logic: map one signal record onto a complete, self-contained
 * HTML page. Pure and deterministic: identical record and options give
 * byte-identical output.
 */
import { getKindStyle, getPriorityLabel } from "../catalog";
import { buildBandChartConfig } from "../render/chart_config";
import { CLIENT_SCRIPT } from "../render/client_script";
import {
  escapeHtml,
  formatPrice,
  formatSignedAmount,
  formatSignedPercent,
  serializeForScript,
  toDomId,
} from "../render/html";
import { buildStylesheet } from "../render/stylesheet";
import type { KindStyle, SignalRecord } from "../types/domain";

export const MAX_KEY_STATISTICS = 3;
export const PREDICTION_CAPTION = "← now | prediction →";

export interface ComposeOptions {
  brandName?: string;
  chartScriptUrl?: string;
  backHref?: string;
}

export const DEFAULT_COMPOSE_OPTIONS: Readonly<Required<ComposeOptions>> = {
  brandName: "SignalDesk",
  chartScriptUrl:
    "https://cdnjs.cloudflare.com/ajax/libs/Chart.js/4.4.0/chart.umd.js",
  backHref: "../summary.html",
};

export function composeSignalDocument(
  record: SignalRecord,
  options: ComposeOptions = {}
): string {
  const brandName = options.brandName ?? DEFAULT_COMPOSE_OPTIONS.brandName;
  const chartScriptUrl =
    options.chartScriptUrl ?? DEFAULT_COMPOSE_OPTIONS.chartScriptUrl;
  const backHref = options.backHref ?? DEFAULT_COMPOSE_OPTIONS.backHref;

  const style = getKindStyle(record.kind);
  const title = `${record.ticker} - ${record.strategy?.title ?? style.displayName}`;

  const head = [
    '<meta charset="UTF-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
    `<title>${escapeHtml(title)}</title>`,
    record.chartSeries
      ? `<script src="${escapeHtml(chartScriptUrl)}"></script>`
      : "",
    `<style>\n${buildStylesheet(record, style.accentColor)}\n</style>`,
  ];

  const card = [
    `<div class="${cardClasses(record).join(" ")}">`,
    renderPriorityBadge(record),
    renderSignalHeader(record, style),
    renderChartSection(record, style),
    renderKeyStatistics(record),
    renderStrategy(record),
    renderFooter(record),
    "</div>",
  ];

  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    ...compact(head),
    "</head>",
    "<body>",
    renderPageHeader(brandName, backHref),
    ...compact(card),
    `<script>\n${CLIENT_SCRIPT}\n</script>`,
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

export function cardClasses(record: SignalRecord): string[] {
  const classes = ["signal-card"];
  if (record.riskStyleEnabled) classes.push("elevated-risk");
  if (record.borderVariant === "dashed") classes.push("dashed-border");
  return classes;
}

function compact(parts: string[]): string[] {
  return parts.filter(part => part !== "");
}

function renderPageHeader(brandName: string, backHref: string): string {
  return `<div class="header">
  <div class="logo">${escapeHtml(brandName)}</div>
  <a href="${escapeHtml(backHref)}" class="back-button haptic">
    <svg width="16" height="16" viewBox="0 0 24 24" fill="none" stroke="currentColor" stroke-width="2"><path d="M19 12H5M12 19l-7-7 7-7"/></svg>
    Back
  </a>
</div>`;
}

function renderPriorityBadge(record: SignalRecord): string {
  const label = getPriorityLabel(record.priority);
  if (record.priority === "normal" || !label) return "";
  return `<div class="hot-label">${escapeHtml(label)}</div>`;
}

function renderSignalHeader(record: SignalRecord, style: KindStyle): string {
  const changeClass = record.priceChangePercent > 0 ? "positive" : "negative";
  return `<div class="signal-header">
  <div class="ticker-main">
    <span class="ticker">${escapeHtml(record.ticker)}</span>
    <span class="strategy-badge ${style.badgeClass}">${escapeHtml(style.displayName)}</span>
  </div>
  <div class="company-name">${escapeHtml(record.displayName)}</div>
  <div class="price-row">
    <span class="price">$${formatPrice(record.currentPrice)}</span>
    <span class="change ${changeClass}" title="${formatSignedAmount(record.priceChangeAbsolute)}">${formatSignedPercent(record.priceChangePercent)}</span>
  </div>
</div>`;
}

function renderChartSection(record: SignalRecord, style: KindStyle): string {
  const series = record.chartSeries;
  if (!series) return "";

  const canvasId = toDomId("chart", record.ticker);
  const config = buildBandChartConfig(series, style.accentColor);
  return `<div class="chart-section">
  <canvas id="${canvasId}"></canvas>
  <script type="application/json" data-chart-for="${canvasId}">${serializeForScript(config)}</script>
  <div class="event-label">${escapeHtml(series.eventLabel)}</div>
  <div class="prediction-indicator">${PREDICTION_CAPTION}</div>
</div>`;
}

function renderKeyStatistics(record: SignalRecord): string {
  const stats = record.keyStatistics.slice(0, MAX_KEY_STATISTICS);
  if (stats.length === 0) return "";

  const blocks = stats.map(stat => {
    const valueClass = stat.isFavorable ? "stat-value positive" : "stat-value";
    return `  <div class="stat">
    <div class="${valueClass}">${escapeHtml(stat.displayValue)}</div>
    <div class="stat-label">${escapeHtml(stat.label)}</div>
  </div>`;
  });
  return `<div class="key-stats">\n${blocks.join("\n")}\n</div>`;
}

function renderStrategy(record: SignalRecord): string {
  const strategy = record.strategy;
  if (!strategy) return "";

  return `<div class="strategy-info">
  <div class="strategy-title">${escapeHtml(strategy.title)}</div>
  <div class="strategy-desc">${escapeHtml(strategy.description)}</div>
  <a href="${escapeHtml(strategy.linkUrl)}" class="strategy-link">${escapeHtml(strategy.linkText)}</a>
</div>`;
}

function renderFooter(record: SignalRecord): string {
  const toggleClass = record.notificationsDefaultOn
    ? "toggle on haptic"
    : "toggle haptic";
  return `<div class="signal-footer">
  <div class="notify-toggle">
    <span>Exit alert</span>
    <div class="${toggleClass}" onclick="toggleNotify(this)">
      <div class="toggle-knob"></div>
    </div>
  </div>
  <span>${escapeHtml(record.timestampLabel)}</span>
</div>`;
}
