import fs from "node:fs";
import path from "node:path";
import { BrowserDriver, DriverFactory } from "../browser";
import { AppConfig } from "../config";
import { EmptyResultPageError, HarvestError, SessionFailureError } from "../core/errors";
import { FetchFn } from "../core/fetch";
import { sleep, withRetry } from "../core/retry";
import { DocumentDownloader, DocumentLinkStrategy } from "../download";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { ManifestEntry, Sink } from "../sink";
import { RecordPersister } from "../store";
import {
  advancePage,
  appendRecord,
  attachFileName,
  CrawlState,
  createCrawlState,
  ExtractedRow,
  PaperRecord,
  quotaReached,
  RenderedPage,
} from "../types";
import { createTally, ExtractionTally, extractRecords } from "./extractor";
import { Paginator } from "./paginator";
import { submitSearch } from "./search";

export type HarvestPhase =
  | "idle"
  | "searching"
  | "paginating"
  | "extracting"
  | "downloading"
  | "persisting"
  | "done"
  | "aborted";

export type HarvestEndReason =
  | "quota"
  | "last_page"
  | "timeout"
  | "pagination_failed"
  | "empty_pages"
  | "max_pages"
  | "session_failure";

export interface HarvestParams {
  query: string;
  targetCount: number;
  maxPages: number;
  downloadEnabled: boolean;
  headless: boolean;
}

export interface HarvestSummary {
  pages: number;
  found: number;
  skipped: number;
  downloaded: number;
  alreadyPresent: number;
  downloadFailed: number;
  persisted: number;
  persistFailed: number;
}

export interface HarvestOutcome {
  status: "done" | "aborted";
  endReason: HarvestEndReason;
  records: PaperRecord[];
  summary: HarvestSummary;
  error?: string;
}

export interface HarvestDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  openSession: DriverFactory;
  persister: RecordPersister;
  sink: Sink;
  strategy: DocumentLinkStrategy;
  fetchFn?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

interface PageRows {
  rows: ExtractedRow[];
  tally: ExtractionTally;
}

interface RowDownload {
  status: string;
  fileName?: string;
}

function emptySummary(): HarvestSummary {
  return {
    pages: 0,
    found: 0,
    skipped: 0,
    downloaded: 0,
    alreadyPresent: 0,
    downloadFailed: 0,
    persisted: 0,
    persistFailed: 0,
  };
}

/**
 * One crawl from search submission to the last processed record. Rows are
 * handled strictly in page order; only session-level failures end the run early.
 */
class HarvestRun {
  private phase: HarvestPhase = "idle";
  private state: CrawlState;
  private driver: BrowserDriver | undefined;
  private downloader: DocumentDownloader | undefined;
  private readonly summary = emptySummary();
  private readonly manifest: ManifestEntry[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly deps: HarvestDeps,
    private readonly params: HarvestParams,
  ) {
    this.state = createCrawlState(params.query, params.targetCount, params.maxPages);
    this.logger = deps.logger;
  }

  async execute(): Promise<HarvestOutcome> {
    let outcome: HarvestOutcome;
    try {
      const endReason = await this.crawl();
      this.transition("done");
      outcome = this.finish("done", endReason);
    } catch (error) {
      this.transition("aborted");
      this.logger.error("harvest_aborted", {
        page: this.state.currentPage,
        collected: this.state.collected.length,
        code: error instanceof HarvestError ? error.code : undefined,
        error: errorMessage(error),
      });
      await this.captureDiagnostic("aborted");
      outcome = this.finish("aborted", "session_failure", errorMessage(error));
    } finally {
      await this.closeSession();
    }

    await this.publishManifest();
    return outcome;
  }

  private async crawl(): Promise<HarvestEndReason> {
    const { config, metrics } = this.deps;

    this.transition("searching");
    const driver = await this.openSession();
    await submitSearch(driver, this.params.query, config, this.logger.child("search"));

    const paginator = new Paginator({
      driver,
      config,
      logger: this.logger.child("paginator"),
      metrics,
      sleep: this.deps.sleep,
    });
    if (this.params.downloadEnabled) {
      this.downloader = new DocumentDownloader({
        config,
        logger: this.logger.child("download"),
        metrics,
        driver,
        strategy: this.deps.strategy,
        fetchFn: this.deps.fetchFn,
        sleep: this.deps.sleep,
      });
    }

    let emptyPages = 0;
    while (this.state.currentPage <= this.state.maxPages) {
      this.transition("paginating");
      const pageNumber = this.state.currentPage;
      const outcome = await paginator.nextPage(pageNumber);
      if (outcome.kind === "end") {
        if (outcome.reason === "timeout") {
          await this.captureDiagnostic(`page-${pageNumber}-timeout`);
        }
        this.logger.info("harvest_results_exhausted", { page: pageNumber, reason: outcome.reason });
        return outcome.reason;
      }

      this.summary.pages += 1;
      this.transition("extracting");
      const { rows, tally } = await this.readRows(driver, outcome.page);
      this.summary.skipped += tally.skipped;
      metrics.incrementCounter("records_skipped", tally.skipped);
      if (rows.length === 0) {
        emptyPages += 1;
        this.logger.warn("harvest_page_empty", { page: pageNumber, consecutive: emptyPages });
        if (emptyPages >= config.maxConsecutiveEmptyPages) {
          return "empty_pages";
        }
      } else {
        emptyPages = 0;
      }

      for (const row of rows) {
        await this.processRow(row);
        if (quotaReached(this.state)) {
          break;
        }
      }

      this.logger.info("harvest_page_complete", {
        page: pageNumber,
        rows: tally.seen,
        skipped: tally.skipped,
        collected: this.state.collected.length,
      });

      if (quotaReached(this.state)) {
        this.logger.info("harvest_quota_reached", { page: pageNumber, targetCount: this.state.targetCount });
        return "quota";
      }
      this.state = advancePage(this.state);
    }

    this.logger.warn("harvest_max_pages_reached", { maxPages: this.state.maxPages });
    return "max_pages";
  }

  /**
   * Rows of a freshly loaded page. Results that render late leave the container
   * empty at first, so an empty read is repeated under the page-load policy.
   */
  private async readRows(driver: BrowserDriver, page: RenderedPage): Promise<PageRows> {
    const { config } = this.deps;
    try {
      return await withRetry(
        { maxAttempts: config.pageLoad.maxAttempts, delayMs: config.pageLoad.delayMs, backoff: "linear" },
        async (attempt) => {
          const html = attempt === 1 ? page.html : await driver.content();
          const tally = createTally();
          const rows = [...extractRecords({ ...page, html }, config.selectors, tally)];
          if (rows.length === 0 && tally.skipped === 0) {
            throw new EmptyResultPageError(page.pageNumber);
          }
          return { rows, tally };
        },
        {
          shouldRetry: (error) => error instanceof EmptyResultPageError,
          onRetry: (_error, attempt, delayMs) =>
            this.logger.info("harvest_page_empty_retry", { page: page.pageNumber, attempt, delayMs }),
          sleep: this.deps.sleep ?? sleep,
        },
      );
    } catch (error) {
      if (error instanceof EmptyResultPageError) {
        return { rows: [], tally: createTally() };
      }
      throw error;
    }
  }

  private async processRow(row: ExtractedRow): Promise<void> {
    const { metrics, persister } = this.deps;
    let record = row.record;
    let download = "disabled";
    metrics.incrementCounter("records_extracted", 1);

    if (this.downloader) {
      this.transition("downloading");
      const transfer = await this.download(this.downloader, row);
      download = transfer.status;
      if (transfer.fileName) {
        record = attachFileName(record, transfer.fileName);
      }
    }

    this.transition("persisting");
    const saved = persister.save(record);
    if (saved.status === "ack") {
      this.summary.persisted += 1;
    } else {
      this.summary.persistFailed += 1;
    }

    this.state = appendRecord(this.state, record);
    this.summary.found = this.state.collected.length;
    this.manifest.push({ query: this.params.query, record, persisted: saved.status === "ack", download });
    this.logger.debug("harvest_record_processed", {
      page: record.page,
      title: record.title,
      download,
      persisted: saved.status,
    });
  }

  private async download(downloader: DocumentDownloader, row: ExtractedRow): Promise<RowDownload> {
    if (!row.detail) {
      this.summary.downloadFailed += 1;
      this.deps.metrics.incrementCounter("downloads_failed", 1);
      this.logger.warn("download_link_missing", { page: row.record.page, title: row.record.title });
      return { status: "no_link" };
    }

    try {
      const result = await downloader.fetch(row.detail, this.deps.config.outputDirs.documents);
      switch (result.status) {
        case "success":
          this.summary.downloaded += 1;
          return { status: result.status, fileName: path.basename(result.path) };
        case "already_exists":
          this.summary.alreadyPresent += 1;
          return { status: result.status, fileName: path.basename(result.path) };
        default:
          this.summary.downloadFailed += 1;
          return { status: result.status };
      }
    } catch (error) {
      this.summary.downloadFailed += 1;
      this.logger.warn("download_unexpected_failure", { title: row.record.title, error: errorMessage(error) });
      return { status: "network_error" };
    }
  }

  private transition(next: HarvestPhase): void {
    if (this.phase === next) {
      return;
    }
    this.logger.debug("harvest_phase", { from: this.phase, to: next, page: this.state.currentPage });
    this.phase = next;
  }

  private finish(status: HarvestOutcome["status"], endReason: HarvestEndReason, error?: string): HarvestOutcome {
    const summary = { ...this.summary, found: this.state.collected.length };
    this.logger.info("harvest_finished", { status, endReason, ...summary });
    return {
      status,
      endReason,
      records: [...this.state.collected],
      summary,
      ...(error ? { error } : {}),
    };
  }

  private async openSession(): Promise<BrowserDriver> {
    const { config } = this.deps;
    try {
      this.driver = await this.deps.openSession({
        headless: this.params.headless,
        executablePath: config.chromePath,
        userAgent: config.userAgent,
        navigationTimeoutMs: config.navigationTimeoutMs,
      });
      return this.driver;
    } catch (error) {
      if (error instanceof HarvestError) {
        throw error;
      }
      throw new SessionFailureError(`Could not open browser session: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async closeSession(): Promise<void> {
    const driver = this.driver;
    this.driver = undefined;
    if (!driver) {
      return;
    }
    try {
      await driver.close();
    } catch (error) {
      this.logger.warn("harvest_session_close_failed", { error: errorMessage(error) });
    }
  }

  private async captureDiagnostic(label: string): Promise<void> {
    const dir = this.deps.config.outputDirs.diagnostics;
    if (!dir || !this.driver) {
      return;
    }
    try {
      const image = await this.driver.screenshot();
      await fs.promises.mkdir(dir, { recursive: true });
      const filePath = path.join(dir, `${label}-${Date.now()}.png`);
      await fs.promises.writeFile(filePath, image);
      this.logger.info("harvest_diagnostic_saved", { path: filePath });
    } catch (error) {
      this.logger.warn("harvest_diagnostic_failed", { label, error: errorMessage(error) });
    }
  }

  private async publishManifest(): Promise<void> {
    if (this.manifest.length === 0) {
      return;
    }
    try {
      await this.deps.sink.publishRecords(this.manifest);
    } catch (error) {
      this.logger.warn("harvest_manifest_publish_failed", { entries: this.manifest.length, error: errorMessage(error) });
    }
  }
}

/**
 * Runs one keyword harvest. Per-record download and persistence failures are
 * recorded in the summary; only browser session failures abort the run, and
 * the records collected up to that point are still returned.
 */
export async function runHarvest(deps: HarvestDeps, params: HarvestParams): Promise<HarvestOutcome> {
  return new HarvestRun(deps, params).execute();
}
