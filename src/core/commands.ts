import { DriverFactory, openPuppeteerSession } from "../browser";
import { AppConfig } from "../config";
import { HarvestOutcome, HarvestParams, runHarvest } from "../crawl";
import { createPatternLinkStrategy } from "../download";
import { Logger, MetricsRegistry } from "../observability";
import { createSink, Sink } from "../sink";
import { createStoreConnector, RecordPersister, StoreConnector } from "../store";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  /** Overrides for wiring; the CLI leaves these unset. */
  openSession?: DriverFactory;
  connectStore?: StoreConnector;
  sink?: Sink;
}

export async function runCrawl(ctx: CommandContext, params: HarvestParams): Promise<HarvestOutcome> {
  ctx.logger.info("crawl_start", {
    query: params.query,
    targetCount: params.targetCount,
    maxPages: params.maxPages,
    downloadEnabled: params.downloadEnabled,
  });

  const persister = new RecordPersister({
    connect: ctx.connectStore ?? createStoreConnector(ctx.config),
    logger: ctx.logger.child("persist"),
    metrics: ctx.metrics,
  });

  try {
    const outcome = await runHarvest(
      {
        config: ctx.config,
        logger: ctx.logger,
        metrics: ctx.metrics,
        openSession: ctx.openSession ?? openPuppeteerSession,
        persister,
        sink: ctx.sink ?? createSink(ctx.config, ctx.runId),
        strategy: createPatternLinkStrategy(ctx.config.documentPatterns),
      },
      params,
    );

    ctx.logger.info("crawl_summary", {
      status: outcome.status,
      endReason: outcome.endReason,
      storeDegraded: persister.degraded,
      ...outcome.summary,
    });
    return outcome;
  } finally {
    persister.close();
  }
}

export function runStatus(ctx: CommandContext): void {
  ctx.logger.info("status_start", { path: ctx.config.store.path });
  // status never clears the table, whatever resetOnOpen says
  const readOnlyConfig = { ...ctx.config, store: { ...ctx.config.store, resetOnOpen: false } };
  const store = (ctx.connectStore ?? createStoreConnector(readOnlyConfig))();
  try {
    const stats = store.getStats();
    ctx.logger.info("status_complete", { stats });
  } finally {
    store.close();
  }
}
