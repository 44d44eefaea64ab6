import fs from "node:fs";
import path from "node:path";
import { Response } from "undici";
import { describe, expect, it, vi } from "vitest";
import { DriverFactory } from "../browser";
import { AppConfig } from "../config";
import { FetchFn } from "../core/fetch";
import { createPatternLinkStrategy } from "../download";
import { MetricsRegistry } from "../observability";
import { ManifestEntry, Sink } from "../sink";
import { RecordPersister, SqliteRecordStore, StoreConnector } from "../store";
import { FakeDriver, FakeDriverOptions, ResultRowSpec, resultsHtml } from "../../test/helpers/fakeDriver";
import { makeTempDir, noSleep, testConfig } from "../../test/helpers/config";
import { captureLogger, messages } from "../../test/helpers/logging";
import { HarvestParams, runHarvest } from "./orchestrator";

const PDF_BODY = "%PDF-1.4\nharvest test";

function rowsFor(page: number, count: number): ResultRowSpec[] {
  return Array.from({ length: count }, (_, index) => ({
    title: `Paper ${page}-${index + 1}`,
    authors: ["Li Lei", "Han Meimei"],
    date: "2023-09-01",
    href: `https://files.test/p${page}-${index + 1}.pdf`,
  }));
}

interface HarnessOptions {
  pages: string[];
  driver?: Partial<Omit<FakeDriverOptions, "selectors" | "pages">>;
  config?: Partial<AppConfig>;
  connect?: StoreConnector;
  openSession?: DriverFactory;
}

function harness(options: HarnessOptions) {
  const root = makeTempDir();
  const config = testConfig(root, options.config);
  const driver = new FakeDriver({ selectors: config.selectors, pages: options.pages, ...options.driver });
  const openSession = vi.fn<DriverFactory>(options.openSession ?? (async () => driver));
  const { logger, lines } = captureLogger("harvest");
  const metrics = new MetricsRegistry();

  const stores: SqliteRecordStore[] = [];
  const defaultConnect: StoreConnector = () => {
    const store = new SqliteRecordStore({ path: ":memory:", duplicatePolicy: "insert", resetOnOpen: false });
    stores.push(store);
    return store;
  };
  const connect = vi.fn<StoreConnector>(options.connect ?? defaultConnect);
  const persister = new RecordPersister({ connect, logger: logger.child("persist"), metrics });

  const published: ManifestEntry[] = [];
  const sink: Sink = {
    publishRecords: async (entries) => {
      published.push(...entries);
    },
  };
  const fetchFn = vi.fn<FetchFn>(async () => new Response(PDF_BODY));

  const run = (params: Partial<HarvestParams> = {}) =>
    runHarvest(
      {
        config,
        logger,
        metrics,
        openSession,
        persister,
        sink,
        strategy: createPatternLinkStrategy(config.documentPatterns),
        fetchFn,
        sleep: noSleep,
      },
      { query: "graphene", targetCount: 5, maxPages: 3, downloadEnabled: true, headless: true, ...params },
    );

  const storedTitles = () => stores.flatMap((store) => store.listRecords().map((row) => row.title));

  return { config, driver, openSession, connect, fetchFn, published, lines, metrics, run, storedTitles };
}

describe("runHarvest", () => {
  it("collects every row of a single page when it matches the target", async () => {
    const h = harness({ pages: [resultsHtml(rowsFor(1, 5))] });

    const outcome = await h.run({ targetCount: 5 });

    expect(outcome.status).toBe("done");
    expect(outcome.endReason).toBe("quota");
    expect(outcome.records).toHaveLength(5);
    expect(outcome.records.every((record) => record.page === 1)).toBe(true);
    expect(outcome.records[0]).toEqual({
      title: "Paper 1-1",
      authors: ["Li Lei", "Han Meimei"],
      pubDate: "2023-09-01",
      page: 1,
      fileName: "Paper 1-1.pdf",
    });
    expect(outcome.summary).toEqual({
      pages: 1,
      found: 5,
      skipped: 0,
      downloaded: 5,
      alreadyPresent: 0,
      downloadFailed: 0,
      persisted: 5,
      persistFailed: 0,
    });
    expect(h.storedTitles()).toEqual(["Paper 1-1", "Paper 1-2", "Paper 1-3", "Paper 1-4", "Paper 1-5"]);
    expect(fs.readdirSync(h.config.outputDirs.documents)).toHaveLength(5);
  });

  it("stops on the page where the quota is met", async () => {
    const h = harness({ pages: [1, 2, 3].map((page) => resultsHtml(rowsFor(page, 5))) });

    const outcome = await h.run({ targetCount: 10, maxPages: 3 });

    expect(outcome.records).toHaveLength(10);
    expect(outcome.records.map((record) => record.page)).toEqual([1, 1, 1, 1, 1, 2, 2, 2, 2, 2]);
    expect(h.driver.clicked).toEqual([".search-btn", "#PageNext"]);
    expect(outcome.summary.pages).toBe(2);
  });

  it("stops mid-page without touching rows past the quota", async () => {
    const h = harness({ pages: [resultsHtml(rowsFor(1, 5))] });

    const outcome = await h.run({ targetCount: 3 });

    expect(outcome.records.map((record) => record.title)).toEqual(["Paper 1-1", "Paper 1-2", "Paper 1-3"]);
    expect(h.fetchFn).toHaveBeenCalledTimes(3);
    expect(h.storedTitles()).toHaveLength(3);
  });

  it("keeps a record without a file name when no document link is found", async () => {
    const detailUrl = "https://portal.test/kcms/detail?id=42";
    const h = harness({
      pages: [resultsHtml([{ title: "No Document", href: detailUrl }, ...rowsFor(1, 1)])],
      driver: { detailPages: { [detailUrl]: "<html><body>abstract only</body></html>" } },
    });

    const outcome = await h.run({ targetCount: 2 });

    expect(outcome.records.map((record) => [record.title, record.fileName])).toEqual([
      ["No Document", undefined],
      ["Paper 1-1", "Paper 1-1.pdf"],
    ]);
    expect(h.storedTitles()).toEqual(["No Document", "Paper 1-1"]);
    expect(h.published.map((entry) => entry.download)).toEqual(["not_found", "success"]);
    expect(outcome.summary.downloadFailed).toBe(1);
  });

  it("still returns every record when the store cannot be opened", async () => {
    const h = harness({
      pages: [resultsHtml(rowsFor(1, 4))],
      connect: () => {
        throw new Error("SQLITE_CANTOPEN: unable to open database file");
      },
    });

    const outcome = await h.run({ targetCount: 4 });

    expect(outcome.status).toBe("done");
    expect(outcome.records).toHaveLength(4);
    expect(outcome.records.every((record) => record.fileName !== undefined)).toBe(true);
    expect(outcome.summary.persisted).toBe(0);
    expect(outcome.summary.persistFailed).toBe(4);
    expect(h.connect).toHaveBeenCalledTimes(1);
    expect(h.fetchFn).toHaveBeenCalledTimes(4);
  });

  it("ends at the page cap", async () => {
    const h = harness({ pages: [1, 2, 3].map((page) => resultsHtml(rowsFor(page, 2))) });

    const outcome = await h.run({ targetCount: 10, maxPages: 2 });

    expect(outcome.endReason).toBe("max_pages");
    expect(outcome.records.map((record) => record.page)).toEqual([1, 1, 2, 2]);
    expect(messages(h.lines)).toContain("harvest_max_pages_reached");
  });

  it("ends at the last result page", async () => {
    const h = harness({ pages: [1, 2].map((page) => resultsHtml(rowsFor(page, 2))) });

    const outcome = await h.run({ targetCount: 10, maxPages: 5 });

    expect(outcome.status).toBe("done");
    expect(outcome.endReason).toBe("last_page");
    expect(outcome.records).toHaveLength(4);
  });

  it("finishes normally when the next-page control keeps failing", async () => {
    const h = harness({
      pages: [1, 2].map((page) => resultsHtml(rowsFor(page, 2))),
      driver: { nextPageClickError: { error: new Error("Node is detached from document") } },
    });

    const outcome = await h.run({ targetCount: 10, downloadEnabled: false });

    expect(outcome.status).toBe("done");
    expect(outcome.endReason).toBe("pagination_failed");
    expect(outcome.error).toBeUndefined();
    expect(outcome.records.map((record) => record.title)).toEqual(["Paper 1-1", "Paper 1-2"]);
    expect(h.published).toHaveLength(2);
    expect(h.driver.closed).toBe(1);
  });

  it("reads a page again when its rows render late", async () => {
    const h = harness({
      pages: [resultsHtml(rowsFor(1, 2))],
      driver: { renders: { 1: [resultsHtml([]), resultsHtml(rowsFor(1, 2))] } },
    });

    const outcome = await h.run({ targetCount: 2, downloadEnabled: false });

    expect(outcome.endReason).toBe("quota");
    expect(outcome.records.map((record) => record.title)).toEqual(["Paper 1-1", "Paper 1-2"]);
    expect(messages(h.lines).filter((msg) => msg === "harvest_page_empty_retry")).toHaveLength(1);
    expect(messages(h.lines)).not.toContain("harvest_page_empty");
  });

  it("moves past a single page without rows", async () => {
    const h = harness({ pages: [resultsHtml(rowsFor(1, 2)), resultsHtml([]), resultsHtml(rowsFor(3, 2))] });

    const outcome = await h.run({ targetCount: 10, maxPages: 5, downloadEnabled: false });

    expect(outcome.endReason).toBe("last_page");
    expect(outcome.records.map((record) => record.page)).toEqual([1, 1, 3, 3]);
    expect(outcome.summary.pages).toBe(3);
    expect(messages(h.lines).filter((msg) => msg === "harvest_page_empty_retry")).toHaveLength(2);
  });

  it("stops after three consecutive pages without rows", async () => {
    const h = harness({ pages: [1, 2, 3, 4, 5].map(() => resultsHtml([])) });

    const outcome = await h.run({ targetCount: 10, maxPages: 5, downloadEnabled: false });

    expect(outcome.status).toBe("done");
    expect(outcome.endReason).toBe("empty_pages");
    expect(outcome.records).toEqual([]);
    expect(outcome.summary.pages).toBe(3);
    expect(messages(h.lines).filter((msg) => msg === "harvest_page_empty")).toHaveLength(3);
    expect(h.driver.clicked).toEqual([".search-btn", "#PageNext", "#PageNext"]);
  });

  it("treats a page that never loads as the end of results and saves a screenshot", async () => {
    const diagnostics = path.join(makeTempDir(), "diagnostics");
    const h = harness({
      pages: [1, 2].map((page) => resultsHtml(rowsFor(page, 2))),
      driver: { resultsReady: (page) => page !== 2 },
      config: { outputDirs: { documents: path.join(makeTempDir(), "docs"), manifests: makeTempDir(), diagnostics } },
    });

    const outcome = await h.run({ targetCount: 10 });

    expect(outcome.status).toBe("done");
    expect(outcome.endReason).toBe("timeout");
    expect(outcome.records).toHaveLength(2);
    expect(h.driver.screenshots).toBe(1);
    expect(fs.readdirSync(diagnostics)).toHaveLength(1);
    expect(fs.readdirSync(diagnostics)[0]).toMatch(/^page-2-timeout-\d+\.png$/);
  });

  it("never fetches when downloads are disabled", async () => {
    const h = harness({ pages: [resultsHtml(rowsFor(1, 2))] });

    const outcome = await h.run({ targetCount: 2, downloadEnabled: false });

    expect(h.fetchFn).not.toHaveBeenCalled();
    expect(h.driver.detailVisits).toEqual([]);
    expect(outcome.records.every((record) => record.fileName === undefined)).toBe(true);
    expect(h.published.map((entry) => entry.download)).toEqual(["disabled", "disabled"]);
    expect(outcome.summary.persisted).toBe(2);
  });

  it("records rows without any link as download failures", async () => {
    const h = harness({ pages: [resultsHtml([{ title: "Linkless" }])] });

    const outcome = await h.run({ targetCount: 1 });

    expect(outcome.records.map((record) => record.title)).toEqual(["Linkless"]);
    expect(h.published[0].download).toBe("no_link");
    expect(outcome.summary.downloadFailed).toBe(1);
  });

  it("attaches the file name of a document saved by an earlier run", async () => {
    const h = harness({ pages: [resultsHtml(rowsFor(1, 1))] });
    fs.mkdirSync(h.config.outputDirs.documents, { recursive: true });
    fs.writeFileSync(path.join(h.config.outputDirs.documents, "Paper 1-1.caj"), "CAJ earlier");

    const outcome = await h.run({ targetCount: 1 });

    expect(outcome.records[0].fileName).toBe("Paper 1-1.caj");
    expect(outcome.summary.alreadyPresent).toBe(1);
    expect(h.fetchFn).not.toHaveBeenCalled();
  });

  it("counts rows skipped for a missing title", async () => {
    const h = harness({ pages: [resultsHtml([{ title: " " }, ...rowsFor(1, 1)])] });

    const outcome = await h.run({ targetCount: 1 });

    expect(outcome.records).toHaveLength(1);
    expect(outcome.summary.skipped).toBe(1);
    expect(h.metrics.getCounter("records_skipped")).toBe(1);
  });

  it("aborts with no records when the browser cannot be launched", async () => {
    const h = harness({
      pages: [],
      openSession: async () => {
        throw new Error("Failed to launch the browser process");
      },
    });

    const outcome = await h.run();

    expect(outcome).toMatchObject({
      status: "aborted",
      endReason: "session_failure",
      records: [],
      error: "Could not open browser session: Failed to launch the browser process",
    });
    expect(h.published).toEqual([]);
    expect(messages(h.lines)).toContain("harvest_aborted");
  });

  it("aborts and closes the session when the search cannot be submitted", async () => {
    const h = harness({ pages: [resultsHtml(rowsFor(1, 2))], driver: { searchInput: null } });

    const outcome = await h.run();

    expect(outcome.status).toBe("aborted");
    expect(outcome.error).toBe("no search input matched on https://portal.test/");
    expect(outcome.records).toEqual([]);
    expect(h.driver.closed).toBe(1);
  });

  it("returns the partial result when the session dies mid-crawl", async () => {
    const h = harness({
      pages: [1, 2].map((page) => resultsHtml(rowsFor(page, 2))),
      driver: {
        resultsReady: (page) => {
          if (page === 2) {
            throw new Error("Target closed");
          }
          return true;
        },
      },
    });

    const outcome = await h.run({ targetCount: 10 });

    expect(outcome.status).toBe("aborted");
    expect(outcome.error).toBe("Target closed");
    expect(outcome.records.map((record) => record.title)).toEqual(["Paper 1-1", "Paper 1-2"]);
    expect(h.published.map((entry) => entry.record.title)).toEqual(["Paper 1-1", "Paper 1-2"]);
    expect(h.driver.closed).toBe(1);
  });

  it("launches the session with the configured options and closes it once", async () => {
    const h = harness({ pages: [resultsHtml(rowsFor(1, 1))], config: { chromePath: "/opt/chrome/chrome" } });

    await h.run({ targetCount: 1, headless: false });

    expect(h.openSession).toHaveBeenCalledWith({
      headless: false,
      executablePath: "/opt/chrome/chrome",
      userAgent: "test-agent",
      navigationTimeoutMs: 30_000,
    });
    expect(h.driver.closed).toBe(1);
    expect(h.driver.filled).toEqual(["graphene"]);
  });
});
