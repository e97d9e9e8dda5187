// Lambda handler rendering one signal page into the configured output dir.
//
// Endpoint: POST /api/generate
// Body: { ticker, companyName, signalType, priority, currentPrice, changePercent,
//         stats, strategyTitle, strategyDesc, strategyLinkText, strategyLinkUrl,
//         chartPattern, eventLabel, timestamp, isRisky, borderStyle, notifications }
// Behavior:
//   - Maps the payload onto a validated record (chart synthesized from chartPattern).
//   - Writes <TICKER>_<kind>_<YYYYMMDD_HHMMSS>.html under SIGNAL_OUTPUT_DIR.
// Returns:
//   200 { success, filename, filePath, absolutePath, fileSize, signal }
//   400 on malformed JSON or invalid fields; 500 when the page cannot be written.
import { mapSignalRequest } from "@src/signals/business/map_signal_request";
import { loadSignalConfig } from "@src/signals/config";
import { SignalInputError, SignalOutputError } from "@src/signals/errors";
import {
  buildSignalSummary,
  formatFileStamp,
  signalPageFilename,
  writeSignalPage,
} from "@src/signals/infrastructure/signal_page_store";
import { withRequestContext } from "@src/util/logger";
import {
  ApiEvent,
  InvalidJsonBodyError,
  LambdaContext,
  parseJsonBody,
  response,
} from "./lib/http";

export const handler = async (event: ApiEvent, context: LambdaContext = {}) => {
  const logger = withRequestContext("functions/generate_signal", context);
  try {
    const record = mapSignalRequest(parseJsonBody(event));
    const config = loadSignalConfig();

    const page = await writeSignalPage(record, {
      outputDir: config.outputDir,
      filename: signalPageFilename(record, formatFileStamp(new Date())),
      compose: config.compose,
    });
    logger.info(
      { ticker: record.ticker, kind: record.kind, fileSize: page.fileSize },
      "signal page generated"
    );

    return response(200, {
      success: true,
      ...page,
      signal: buildSignalSummary(record, page.filename),
    });
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
    logger.error({ err }, "generate_signal error");
    const message =
      err instanceof SignalOutputError ? err.message : "Internal server error";
    return response(500, { success: false, error: message });
  }
};
