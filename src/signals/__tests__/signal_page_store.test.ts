import { mkdtemp, readFile, readdir, rm, utimes, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { composeSignalDocument } from "@src/signals/business/compose_document";
import { createSignalRecord } from "@src/signals/business/create_signal_record";
import { SignalInputError, SignalOutputError } from "@src/signals/errors";
import {
  SUMMARY_FILENAME,
  SignalSummaryFile,
  buildSignalSummary,
  formatFileStamp,
  isSignalPageFilename,
  listSignalPages,
  readSignalPage,
  signalPageFilename,
  writeSignalPage,
  writeSignalSummary,
} from "@src/signals/infrastructure/signal_page_store";
import { fixedSeries, ipoInput, minimalInput } from "./fixtures";

describe("signal page store", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "signal-pages-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("names pages by ticker and kind", () => {
    expect(signalPageFilename({ ticker: "CRCL", kind: "ipo-debut" })).toBe(
      "CRCL_ipo-debut.html"
    );
    expect(
      signalPageFilename({ ticker: "BRK/B", kind: "split-announcement" }, "v2")
    ).toBe("BRK_B_split-announcement_v2.html");
  });

  it("stamps files in UTC", () => {
    expect(formatFileStamp(new Date(Date.UTC(2025, 0, 5, 7, 8, 9)))).toBe(
      "20250105_070809"
    );
  });

  it("writes the composed page and reports its size", async () => {
    const record = createSignalRecord(ipoInput({ chartSeries: fixedSeries(69) }));
    const page = await writeSignalPage(record, {
      outputDir: path.join(dir, "nested"),
      compose: { brandName: "Test Desk" },
    });

    const html = await readFile(page.filePath, "utf8");
    expect(page.filename).toBe("CRCL_ipo-debut.html");
    expect(page.absolutePath).toBe(path.resolve(dir, "nested", "CRCL_ipo-debut.html"));
    expect(html).toBe(composeSignalDocument(record, { brandName: "Test Desk" }));
    expect(page.fileSize).toBe(Buffer.byteLength(html, "utf8"));
    expect(await readdir(path.join(dir, "nested"))).toEqual([
      "CRCL_ipo-debut.html",
    ]);
  });

  it("replaces an existing page in place", async () => {
    const first = createSignalRecord(minimalInput({ timestampLabel: "first" }));
    const second = createSignalRecord(minimalInput({ timestampLabel: "second" }));
    await writeSignalPage(first, { outputDir: dir, filename: "page.html" });
    const page = await writeSignalPage(second, {
      outputDir: dir,
      filename: "page.html",
    });

    const html = await readFile(page.filePath, "utf8");
    expect(html).toContain("<span>second</span>");
    expect(await readdir(dir)).toEqual(["page.html"]);
  });

  it("keeps concurrent writes to one file whole", async () => {
    const records = Array.from({ length: 8 }, (_, i) =>
      createSignalRecord(minimalInput({ timestampLabel: `writer ${i}` }))
    );
    const results = await Promise.allSettled(
      records.map(record =>
        writeSignalPage(record, { outputDir: dir, filename: "same.html" })
      )
    );

    expect(results.map(r => r.status)).toEqual(Array(8).fill("fulfilled"));
    const html = await readFile(path.join(dir, "same.html"), "utf8");
    const candidates = records.map(record => composeSignalDocument(record));
    expect(candidates).toContain(html);
    expect(await readdir(dir)).toEqual(["same.html"]);
  });

  it("raises an output error when the destination is unusable", async () => {
    const blocker = path.join(dir, "blocker");
    await writeFile(blocker, "not a directory", "utf8");
    const record = createSignalRecord(minimalInput());

    const attempt = writeSignalPage(record, { outputDir: blocker });
    await expect(attempt).rejects.toBeInstanceOf(SignalOutputError);
    await expect(attempt).rejects.toThrow(
      `Failed to write signal page ${path.join(blocker, "MINI_earnings-momentum.html")}`
    );
  });

  it("writes a summary of rendered records", async () => {
    const records = [
      createSignalRecord(ipoInput()),
      createSignalRecord(minimalInput()),
    ];
    const generatedAt = new Date("2025-06-05T14:30:00.000Z");
    const filePath = await writeSignalSummary(dir, records, generatedAt);

    expect(filePath).toBe(path.join(dir, SUMMARY_FILENAME));
    const summary: SignalSummaryFile = JSON.parse(await readFile(filePath, "utf8"));
    expect(summary.generatedAt).toBe("2025-06-05T14:30:00.000Z");
    expect(summary.totalSignals).toBe(2);
    expect(summary.signals[0]).toEqual({
      ticker: "CRCL",
      displayName: "Circle Internet Group",
      kind: "ipo-debut",
      priority: "elevated-hot",
      currentPrice: 69,
      priceChangePercent: 122.6,
      timestamp: "Just now",
      filename: "CRCL_ipo-debut.html",
    });
    expect(summary.signals[1].filename).toBe("MINI_earnings-momentum.html");
  });

  it("builds a summary entry with an explicit filename", () => {
    const summary = buildSignalSummary(
      createSignalRecord(minimalInput()),
      "custom.html"
    );
    expect(summary.filename).toBe("custom.html");
  });

  it("lists html pages newest first", async () => {
    await writeFile(path.join(dir, "old.html"), "<p>old</p>", "utf8");
    await writeFile(path.join(dir, "new.html"), "<p>newer</p>", "utf8");
    await writeFile(path.join(dir, SUMMARY_FILENAME), "{}", "utf8");
    await utimes(path.join(dir, "old.html"), new Date(1_000_000), new Date(1_000_000));
    await utimes(path.join(dir, "new.html"), new Date(2_000_000), new Date(2_000_000));

    const pages = await listSignalPages(dir);
    expect(pages).toEqual([
      {
        filename: "new.html",
        size: 12,
        modifiedAt: new Date(2_000_000).toISOString(),
        viewUrl: "/api/pages/new.html",
      },
      {
        filename: "old.html",
        size: 10,
        modifiedAt: new Date(1_000_000).toISOString(),
        viewUrl: "/api/pages/old.html",
      },
    ]);
  });

  it("reads a page back by bare filename", async () => {
    await writeFile(path.join(dir, "page.html"), "<p>hi</p>", "utf8");
    await expect(readSignalPage(dir, "page.html")).resolves.toBe("<p>hi</p>");
  });

  it("refuses page names that leave the output directory", async () => {
    const names = ["../page.html", "a/b.html", "..\\x.html", "page.txt", ".html"];
    for (const name of names) {
      expect(isSignalPageFilename(name)).toBe(false);
      await expect(readSignalPage(dir, name)).rejects.toBeInstanceOf(
        SignalInputError
      );
    }
    expect(isSignalPageFilename("CRCL_ipo-debut.html")).toBe(true);
  });

  it("lists nothing for a missing directory", async () => {
    await expect(listSignalPages(path.join(dir, "absent"))).resolves.toEqual([]);
  });
});
