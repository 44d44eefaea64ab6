import fs from "node:fs";
import path from "node:path";
import { Readable, Transform, TransformCallback } from "node:stream";
import { pipeline } from "node:stream/promises";
import { BrowserDriver } from "../browser";
import { AppConfig } from "../config";
import { TransferError } from "../core/errors";
import { defaultFetch, FetchFn, getFetchDispatcher } from "../core/fetch";
import { RetryPolicy, sleep, withRetry } from "../core/retry";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { DetailHandle, DocumentKind, FetchResult } from "../types";
import { DocumentLink, DocumentLinkStrategy, sniffDocument } from "./documentLinks";
import { DOCUMENT_EXTENSIONS, findExistingDocument, sanitizeFilename } from "./filename";

export interface DownloaderDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  driver: BrowserDriver;
  strategy: DocumentLinkStrategy;
  fetchFn?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

interface TransferredFile {
  path: string;
  bytes: number;
  kind: DocumentKind;
}

const SNIFF_BYTES = 512;

function removeIfPresent(filePath: string): void {
  if (fs.existsSync(filePath)) {
    fs.unlinkSync(filePath);
  }
}

/**
 * Passes the body through unchanged while counting bytes. The first
 * SNIFF_BYTES are held back until the content type is known, so an HTML error
 * page fails the stream before anything is written.
 */
class DocumentSniffer extends Transform {
  bytes = 0;
  kind: DocumentKind | undefined;
  private head: Uint8Array[] = [];
  private headBytes = 0;

  constructor(private readonly hint: DocumentKind) {
    super();
  }

  _transform(chunk: Uint8Array, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    if (this.kind) {
      callback(null, chunk);
      return;
    }
    this.head.push(chunk);
    this.headBytes += chunk.length;
    callback(this.headBytes >= SNIFF_BYTES ? this.release() : null);
  }

  _flush(callback: TransformCallback): void {
    callback(this.headBytes > 0 ? this.release() : null);
  }

  private release(): Error | null {
    const head = Buffer.concat(this.head);
    this.head = [];
    this.headBytes = 0;
    const kind = sniffDocument(head, this.hint);
    if (kind === "html") {
      return new TransferError("received an HTML page instead of a document");
    }
    this.kind = kind;
    this.push(head);
    return null;
  }
}

export class DocumentDownloader {
  private readonly policy: RetryPolicy;
  private readonly fetchFn: FetchFn;

  constructor(private readonly deps: DownloaderDeps) {
    this.policy = {
      maxAttempts: deps.config.download.maxAttempts,
      delayMs: deps.config.download.delayMs,
      backoff: "fixed",
    };
    this.fetchFn = deps.fetchFn ?? defaultFetch;
  }

  async fetch(handle: DetailHandle, destinationDir: string): Promise<FetchResult> {
    const { logger, metrics } = this.deps;
    const fields = { title: handle.title, url: handle.href };

    let link: DocumentLink | undefined;
    try {
      link = await this.resolveLink(handle);
    } catch (error) {
      metrics.incrementCounter("downloads_failed", 1);
      logger.warn("download_detail_unreachable", { ...fields, error: errorMessage(error) });
      return { status: "network_error", error: errorMessage(error) };
    }

    if (!link) {
      metrics.incrementCounter("downloads_failed", 1);
      logger.warn("download_link_not_found", { ...fields, strategy: this.deps.strategy.name });
      return { status: "not_found" };
    }
    const documentLink = link;

    const baseName = sanitizeFilename(handle.title);
    const existing = findExistingDocument(destinationDir, baseName);
    if (existing) {
      metrics.incrementCounter("downloads_existing", 1);
      logger.info("download_already_exists", { ...fields, path: existing });
      return { status: "already_exists", path: existing };
    }

    const stopTimer = metrics.startTimer("download_ms");
    try {
      const headers = {
        ...(await this.deps.driver.sessionHeaders()),
        referer: handle.referer,
        accept: "application/pdf,application/octet-stream,*/*",
      };
      const file = await withRetry(this.policy, (attempt) => this.transfer(documentLink, destinationDir, baseName, headers, attempt), {
        shouldRetry: (error) => !(error instanceof TransferError && error.statusCode === 404),
        onRetry: (error, attempt, delayMs) =>
          logger.warn("download_attempt_failed", { ...fields, attempt, delayMs, error: errorMessage(error) }),
        sleep: this.deps.sleep ?? sleep,
      });

      const durationMs = stopTimer();
      metrics.incrementCounter("downloads_ok", 1);
      logger.info("download_ok", { ...fields, path: file.path, bytes: file.bytes, durationMs });
      return { status: "success", path: file.path, bytes: file.bytes, kind: file.kind };
    } catch (error) {
      const durationMs = stopTimer();
      metrics.incrementCounter("downloads_failed", 1);
      if (error instanceof TransferError && error.statusCode === 404) {
        logger.warn("download_404", { ...fields, durationMs });
        return { status: "not_found", error: error.message };
      }
      logger.warn("download_failed", { ...fields, attempts: this.policy.maxAttempts, durationMs, error: errorMessage(error) });
      return { status: "network_error", error: errorMessage(error) };
    }
  }

  private async resolveLink(handle: DetailHandle): Promise<DocumentLink | undefined> {
    const { driver, strategy } = this.deps;
    const directKind = strategy.classify(handle.href);
    if (directKind) {
      return { url: handle.href, kind: directKind };
    }

    const detailPage = await driver.openInNewContext(handle.href);
    return strategy.findLink(detailPage.html, detailPage.url);
  }

  private async transfer(
    link: DocumentLink,
    destinationDir: string,
    baseName: string,
    headers: Record<string, string>,
    attempt: number,
  ): Promise<TransferredFile> {
    const { config, logger } = this.deps;
    logger.debug("download_attempt_start", { url: link.url, attempt });

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), config.downloadTimeoutMs);
    const tempPath = path.join(destinationDir, `${baseName}.part`);
    try {
      const response = await this.fetchFn(link.url, {
        method: "GET",
        headers,
        redirect: "follow",
        dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new TransferError(`HTTP ${response.status}`, response.status);
      }
      if (!response.body) {
        throw new TransferError("response body was empty");
      }

      fs.mkdirSync(destinationDir, { recursive: true });
      const sniffer = new DocumentSniffer(link.kind);
      await pipeline(Readable.fromWeb(response.body), sniffer, fs.createWriteStream(tempPath, { flags: "w" }));
      const kind = sniffer.kind;
      if (sniffer.bytes === 0 || !kind) {
        throw new TransferError("response body was empty");
      }

      const finalPath = path.join(destinationDir, `${baseName}${DOCUMENT_EXTENSIONS[kind]}`);
      fs.renameSync(tempPath, finalPath);
      return { path: finalPath, bytes: sniffer.bytes, kind };
    } catch (error) {
      removeIfPresent(tempPath);
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}
