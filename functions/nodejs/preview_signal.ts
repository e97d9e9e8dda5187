// Lambda handler previewing the record a generate request would render,
// without writing anything.
//
// Endpoint: POST /api/preview
// Body: same payload as /api/generate
// Returns:
//   200 { success: true, preview }
//   400 { success: false, error, issues } on malformed JSON or invalid fields
import { mapSignalRequest } from "@src/signals/business/map_signal_request";
import { SignalInputError } from "@src/signals/errors";
import type { SignalRecord } from "@src/signals/types/domain";
import { withRequestContext } from "@src/util/logger";
import {
  ApiEvent,
  InvalidJsonBodyError,
  LambdaContext,
  parseJsonBody,
  response,
} from "./lib/http";

const PREVIEW_DESCRIPTION_LIMIT = 200;

export const handler = async (event: ApiEvent, context: LambdaContext = {}) => {
  const logger = withRequestContext("functions/preview_signal", context);
  try {
    const record = mapSignalRequest(parseJsonBody(event));
    return response(200, { success: true, preview: toPreview(record) });
  } catch (err) {
    if (err instanceof InvalidJsonBodyError) {
      return response(400, { success: false, error: err.message, issues: [] });
    }
    if (err instanceof SignalInputError) {
      return response(400, {
        success: false,
        error: err.message,
        issues: err.issues,
      });
    }
    logger.error({ err }, "preview_signal error");
    return response(500, { success: false, error: "Internal server error" });
  }
};

function toPreview(record: SignalRecord) {
  const strategy = record.strategy;
  return {
    ticker: record.ticker,
    displayName: record.displayName,
    kind: record.kind,
    priority: record.priority,
    currentPrice: record.currentPrice,
    priceChangePercent: record.priceChangePercent,
    keyStatistics: record.keyStatistics,
    strategy: strategy
      ? {
          title: strategy.title,
          description: truncate(strategy.description, PREVIEW_DESCRIPTION_LIMIT),
        }
      : null,
    timestamp: record.timestampLabel,
    riskStyleEnabled: record.riskStyleEnabled,
  };
}

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}
