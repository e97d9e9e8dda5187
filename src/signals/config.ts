import { getStage, getString } from "../util/env";
import {
  ComposeOptions,
  DEFAULT_COMPOSE_OPTIONS,
} from "./business/compose_document";

export interface SignalConfig {
  outputDir: string;
  compose: Required<ComposeOptions>;
  stage: string;
}

export function loadSignalConfig(): SignalConfig {
  return {
    outputDir: getString("SIGNAL_OUTPUT_DIR", "signals"),
    compose: {
      brandName: getString(
        "SIGNAL_BRAND_NAME",
        DEFAULT_COMPOSE_OPTIONS.brandName
      ),
      chartScriptUrl: getString(
        "CHART_SCRIPT_URL",
        DEFAULT_COMPOSE_OPTIONS.chartScriptUrl
      ),
      backHref: getString("SIGNAL_BACK_HREF", DEFAULT_COMPOSE_OPTIONS.backHref),
    },
    stage: getStage(),
  };
}
