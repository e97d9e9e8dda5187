// Lambda handler listing rendered signal pages, newest first.
//
// Endpoint: GET /api/files
// Returns:
//   200 { success, files: [{ filename, size, modifiedAt, viewUrl }], totalCount }
import { loadSignalConfig } from "@src/signals/config";
import { listSignalPages } from "@src/signals/infrastructure/signal_page_store";
import { withRequestContext } from "@src/util/logger";
import { LambdaContext, response } from "./lib/http";

export const handler = async (_event: unknown, context: LambdaContext = {}) => {
  const logger = withRequestContext("functions/list_signal_pages", context);
  try {
    const files = await listSignalPages(loadSignalConfig().outputDir);
    return response(200, { success: true, files, totalCount: files.length });
  } catch (err) {
    logger.error({ err }, "list_signal_pages error");
    return response(500, { success: false, error: "Internal server error" });
  }
};
