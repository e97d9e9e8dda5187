// Lambda handler serving one rendered signal page.
//
// Endpoint: GET /api/pages/{filename}
// Query: download=1 to receive the page as an attachment
// Returns:
//   200 text/html page
//   400 when filename is missing or is not a bare *.html name
//   404 when no such page exists in SIGNAL_OUTPUT_DIR
import { loadSignalConfig } from "@src/signals/config";
import { SignalInputError } from "@src/signals/errors";
import { readSignalPage } from "@src/signals/infrastructure/signal_page_store";
import { isEnoent } from "@src/util/fs_errors";
import { withRequestContext } from "@src/util/logger";
import {
  ApiEvent,
  LambdaContext,
  htmlResponse,
  isTruthyFlag,
  response,
} from "./lib/http";

export const handler = async (event: ApiEvent, context: LambdaContext = {}) => {
  const logger = withRequestContext("functions/get_signal_page", context);
  const rawName = event.pathParameters?.filename;
  if (!rawName) {
    return response(400, { success: false, error: "filename is required" });
  }

  let filename: string;
  try {
    filename = decodeURIComponent(rawName);
  } catch (err) {
    logger.debug({ err, rawName }, "undecodable filename");
    return response(400, { success: false, error: "filename is not valid" });
  }

  try {
    const html = await readSignalPage(loadSignalConfig().outputDir, filename);
    const download = isTruthyFlag(event.queryStringParameters?.download);
    return htmlResponse(200, html, download ? filename : undefined);
  } catch (err) {
    if (err instanceof SignalInputError) {
      return response(400, {
        success: false,
        error: err.message,
        issues: err.issues,
      });
    }
    if (isEnoent(err)) {
      return response(404, { success: false, error: "Signal page not found" });
    }
    logger.error({ err, filename }, "get_signal_page error");
    return response(500, { success: false, error: "Internal server error" });
  }
};
