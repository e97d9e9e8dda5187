import { randomUUID } from "node:crypto";
import {
  mkdir,
  readFile,
  readdir,
  rename,
  rm,
  stat,
  writeFile,
} from "node:fs/promises";
import path from "node:path";
import { getLogger } from "../../util/logger";
import { isEnoent } from "../../util/fs_errors";
import {
  ComposeOptions,
  composeSignalDocument,
} from "../business/compose_document";
import { SignalInputError, SignalOutputError } from "../errors";
import type {
  SignalRecord,
  SignalSummary,
  WrittenPage,
} from "../types/domain";

export const SUMMARY_FILENAME = "signals_summary.json";
export const PAGE_ROUTE = "/api/pages";

export interface WriteSignalPageOptions {
  outputDir: string;
  filename?: string;
  compose?: ComposeOptions;
}

export interface StoredSignalPage {
  filename: string;
  size: number;
  modifiedAt: string;
  viewUrl: string;
}

export interface SignalSummaryFile {
  generatedAt: string;
  totalSignals: number;
  signals: SignalSummary[];
}

export function signalPageFilename(
  record: Pick<SignalRecord, "ticker" | "kind">,
  suffix?: string
): string {
  const stem = suffix
    ? `${record.ticker}_${record.kind}_${suffix}`
    : `${record.ticker}_${record.kind}`;
  return `${stem.replace(/[^A-Za-z0-9._-]/g, "_")}.html`;
}

/** UTC `YYYYMMDD_HHMMSS`, used to keep repeated renders of one signal apart. */
export function formatFileStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function signalPageUrl(filename: string): string {
  return `${PAGE_ROUTE}/${encodeURIComponent(filename)}`;
}

/** A bare `.html` file name: no directory part, nothing to resolve upward. */
export function isSignalPageFilename(filename: string): boolean {
  return (
    filename.length > ".html".length &&
    filename.endsWith(".html") &&
    !filename.includes("\\") &&
    path.basename(filename) === filename
  );
}

/**
 * Writes through a sibling temp file and a rename, so the destination holds
 * either the previous content or one complete page. Each call owns its temp
 * file; concurrent writers to one path only meet at the rename.
 */
async function writeAtomically(filePath: string, content: string) {
  const tmpPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(tmpPath, content, "utf8");
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true }).catch(cleanupErr => {
      getLogger("signals/signal_page_store").warn(
        { tmpPath, err: cleanupErr },
        "temp file cleanup failed"
      );
    });
    throw new SignalOutputError(filePath, err);
  }
}

export async function writeSignalPage(
  record: SignalRecord,
  options: WriteSignalPageOptions
): Promise<WrittenPage> {
  const logger = getLogger("signals/signal_page_store");
  const filename = options.filename ?? signalPageFilename(record);
  const filePath = path.join(options.outputDir, filename);

  const html = composeSignalDocument(record, options.compose);
  await writeAtomically(filePath, html);

  const { size } = await stat(filePath);
  logger.debug(
    { ticker: record.ticker, kind: record.kind, filePath, size },
    "signal page written"
  );

  return {
    filename,
    filePath,
    absolutePath: path.resolve(filePath),
    fileSize: size,
  };
}

export function buildSignalSummary(
  record: SignalRecord,
  filename: string = signalPageFilename(record)
): SignalSummary {
  return {
    ticker: record.ticker,
    displayName: record.displayName,
    kind: record.kind,
    priority: record.priority,
    currentPrice: record.currentPrice,
    priceChangePercent: record.priceChangePercent,
    timestamp: record.timestampLabel,
    filename,
  };
}

export async function writeSignalSummary(
  outputDir: string,
  records: readonly SignalRecord[],
  generatedAt: Date = new Date()
): Promise<string> {
  const summary: SignalSummaryFile = {
    generatedAt: generatedAt.toISOString(),
    totalSignals: records.length,
    signals: records.map(record => buildSignalSummary(record)),
  };
  const filePath = path.join(outputDir, SUMMARY_FILENAME);
  await writeAtomically(filePath, `${JSON.stringify(summary, null, 2)}\n`);
  return filePath;
}

export async function listSignalPages(
  outputDir: string
): Promise<StoredSignalPage[]> {
  let names: string[];
  try {
    names = await readdir(outputDir);
  } catch (err) {
    if (isEnoent(err)) return [];
    throw err;
  }

  const pages = await Promise.all(
    names
      .filter(name => name.endsWith(".html"))
      .map(async filename => {
        const info = await stat(path.join(outputDir, filename));
        return {
          filename,
          size: info.size,
          modifiedAt: info.mtime.toISOString(),
          viewUrl: signalPageUrl(filename),
        };
      })
  );

  return pages.sort((a, b) => b.modifiedAt.localeCompare(a.modifiedAt));
}

export async function readSignalPage(
  outputDir: string,
  filename: string
): Promise<string> {
  if (!isSignalPageFilename(filename)) {
    throw new SignalInputError("Invalid page filename", [
      `filename: ${filename}`,
    ]);
  }
  return readFile(path.join(outputDir, filename), "utf8");
}
