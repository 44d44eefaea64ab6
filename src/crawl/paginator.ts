import { BrowserDriver } from "../browser";
import { AppConfig } from "../config";
import { isSessionLost, PageLoadTimeoutError } from "../core/errors";
import { RetryPolicy, sleep, withRetry } from "../core/retry";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { PageOutcome } from "../types";

export interface PaginatorDeps {
  driver: BrowserDriver;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sleep?: (ms: number) => Promise<void>;
}

type TurnResult = "turned" | "last_page";

export class Paginator {
  private readonly policy: RetryPolicy;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly deps: PaginatorDeps) {
    this.policy = {
      maxAttempts: deps.config.pageLoad.maxAttempts,
      delayMs: deps.config.pageLoad.delayMs,
      backoff: "linear",
    };
    this.wait = deps.sleep ?? sleep;
  }

  /**
   * Page 1 is whatever the search submission rendered; later pages are reached
   * through the pagination control. Element and wait failures are retried and
   * then end the crawl; only a lost browser session propagates.
   */
  async nextPage(pageNumber: number): Promise<PageOutcome> {
    const { driver, config, logger, metrics } = this.deps;

    if (pageNumber > 1) {
      let turn: TurnResult;
      try {
        turn = await withRetry(this.policy, () => this.turnPage(pageNumber), {
          shouldRetry: (error) => !isSessionLost(error),
          onRetry: (error, attempt, delayMs) =>
            logger.warn("pagination_retry", { page: pageNumber, attempt, delayMs, error: errorMessage(error) }),
          sleep: this.wait,
        });
      } catch (error) {
        if (isSessionLost(error)) {
          throw error;
        }
        logger.warn("pagination_gave_up", { page: pageNumber, attempts: this.policy.maxAttempts, error: errorMessage(error) });
        return { kind: "end", reason: "pagination_failed" };
      }
      if (turn === "last_page") {
        return { kind: "end", reason: "last_page" };
      }
    }

    const stopTimer = metrics.startTimer("page_load_ms");
    try {
      await withRetry(
        this.policy,
        async () => {
          const present = await driver.waitFor(config.selectors.resultContainer, config.pageLoadTimeoutMs);
          if (!present) {
            throw new PageLoadTimeoutError(pageNumber, config.pageLoadTimeoutMs);
          }
        },
        {
          shouldRetry: (error) => !isSessionLost(error),
          onRetry: (error, attempt, delayMs) =>
            logger.warn("page_load_retry", { page: pageNumber, attempt, delayMs, error: errorMessage(error) }),
          sleep: this.wait,
        },
      );
    } catch (error) {
      const durationMs = stopTimer();
      if (error instanceof PageLoadTimeoutError) {
        logger.warn("page_load_gave_up", { page: pageNumber, attempts: this.policy.maxAttempts, durationMs });
        return { kind: "end", reason: "timeout" };
      }
      if (isSessionLost(error)) {
        throw error;
      }
      logger.warn("page_load_failed", { page: pageNumber, durationMs, error: errorMessage(error) });
      return { kind: "end", reason: "pagination_failed" };
    }

    const durationMs = stopTimer();
    metrics.incrementCounter("pages_crawled", 1);
    logger.info("page_loaded", { page: pageNumber, durationMs });
    return {
      kind: "page",
      page: { pageNumber, url: driver.currentUrl(), html: await driver.content() },
    };
  }

  private async turnPage(pageNumber: number): Promise<TurnResult> {
    const { driver, config, logger } = this.deps;
    const control = await driver.locate(config.selectors.nextPage);
    if (!control) {
      logger.info("pagination_control_missing", { page: pageNumber });
      return "last_page";
    }

    const disabled = await control.attribute("disabled");
    const className = (await control.attribute("class")) ?? "";
    if (disabled !== null || /\bdisabled\b/.test(className)) {
      logger.info("pagination_control_disabled", { page: pageNumber });
      return "last_page";
    }

    await control.click();
    await this.wait(config.pageSettleMs);
    return "turned";
  }
}
