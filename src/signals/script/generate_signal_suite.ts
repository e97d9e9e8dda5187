// Load envs from .env
// npm run signals:suite -- [--data data/signal_suite.json] [--out signals]
import "dotenv/config";
import path from "node:path";
import {
  buildSuiteRecords,
  loadSignalSuite,
} from "../business/load_signal_suite";
import { loadSignalConfig } from "../config";
import {
  writeSignalPage,
  writeSignalSummary,
} from "../infrastructure/signal_page_store";
import { getLogger } from "../../util/logger";
import { getArg } from "./args";

const DEFAULT_SUITE_PATH = path.resolve(
  __dirname,
  "../../../data/signal_suite.json"
);

async function main() {
  const logger = getLogger("signals/generate_signal_suite");
  const argv = process.argv.slice(2);
  const config = loadSignalConfig();
  const dataPath = getArg(argv, "data") ?? DEFAULT_SUITE_PATH;
  const outputDir = getArg(argv, "out") ?? config.outputDir;

  const records = buildSuiteRecords(await loadSignalSuite(dataPath));
  logger.info(
    { count: records.length, outputDir, stage: config.stage },
    "rendering signal suite"
  );

  let totalBytes = 0;
  for (const record of records) {
    const page = await writeSignalPage(record, {
      outputDir,
      compose: config.compose,
    });
    totalBytes += page.fileSize;
    logger.info(
      { filename: page.filename, fileSize: page.fileSize },
      `rendered ${record.ticker} (${record.kind})`
    );
  }

  const summaryPath = await writeSignalSummary(outputDir, records);
  logger.info(
    { pages: records.length, totalBytes, summaryPath },
    "signal suite complete"
  );
}

main().catch(err => {
  getLogger("signals/generate_signal_suite").error({ err }, "suite failed");
  process.exitCode = 1;
});
