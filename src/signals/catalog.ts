import type { KindStyle, PriorityLevel, SignalKind } from "./types/domain";

const HOT_GRADIENT = "linear-gradient(135deg, #ff4757, #ff6348)";
const HIGH_RISK_GRADIENT = "linear-gradient(135deg, #ff00ff, #ff4757)";

export const SIGNAL_KIND_STYLES: Readonly<Record<SignalKind, KindStyle>> = {
  "ipo-debut": {
    badgeClass: "ipo-debut",
    background: { type: "gradient", value: HOT_GRADIENT },
    accentColor: "#ff4757",
    displayName: "IPO Debut",
  },
  "high-risk-derivative-play": {
    badgeClass: "yolo-play",
    background: { type: "gradient", value: HIGH_RISK_GRADIENT },
    accentColor: "#ff00ff",
    displayName: "High-Risk Calls",
  },
  "pre-market-mover": {
    badgeClass: "pre-market",
    background: { type: "flat", color: "#ffd93d" },
    accentColor: "#ffd93d",
    displayName: "Pre-Market",
  },
  "split-announcement": {
    badgeClass: "stock-split",
    background: { type: "flat", color: "#3498db" },
    accentColor: "#3498db",
    displayName: "Stock Split",
  },
  "credit-spread": {
    badgeClass: "option-spread",
    background: { type: "flat", color: "#e74c3c" },
    accentColor: "#e74c3c",
    displayName: "Credit Spread",
  },
  "crypto-yield-play": {
    badgeClass: "crypto-play",
    background: { type: "flat", color: "#f7931a" },
    accentColor: "#f7931a",
    displayName: "Crypto Yield",
  },
  "regulatory-catalyst": {
    badgeClass: "fda-event",
    background: { type: "flat", color: "#16a085" },
    accentColor: "#16a085",
    displayName: "Regulatory Catalyst",
  },
  "earnings-momentum": {
    badgeClass: "post-market",
    background: { type: "flat", color: "#95a5a6" },
    accentColor: "#95a5a6",
    displayName: "Earnings Momentum",
  },
  "unusual-derivative-flow": {
    badgeClass: "indicator-signal",
    background: { type: "flat", color: "#d35400" },
    accentColor: "#d35400",
    displayName: "Unusual Options",
  },
  "short-squeeze": {
    badgeClass: "yolo-play",
    background: { type: "gradient", value: HIGH_RISK_GRADIENT },
    accentColor: "#ff00ff",
    displayName: "Short Squeeze",
  },
};

export const PRIORITY_LABELS: Readonly<Record<PriorityLevel, string>> = {
  "elevated-urgent": "⚡ URGENT",
  "elevated-hot": "🔥 HOT",
  "informational-watch": "👀 WATCH",
  normal: "",
};

// Flat badge backgrounds light enough to need dark text
const DARK_TEXT_BADGES = new Set(["pre-market", "crypto-play"]);

export function getKindStyle(kind: SignalKind): KindStyle {
  return SIGNAL_KIND_STYLES[kind];
}

export function getPriorityLabel(priority: PriorityLevel): string {
  return PRIORITY_LABELS[priority];
}

export function badgeNeedsDarkText(badgeClass: string): boolean {
  return DARK_TEXT_BADGES.has(badgeClass);
}
