import { loadConfig } from "../config";
import { CommandContext, runCrawl, runStatus } from "../core/commands";
import { createRunId, Logger, MetricsRegistry } from "../observability";

export type CommandName = "crawl" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  keyword?: string;
  count?: number;
  maxPages?: number;
  download: boolean;
  headed: boolean;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  paper-harvester <command> [options]

Commands:
  crawl <keyword>  Search the portal and collect records for <keyword>
  status           Show what the record store currently holds

Options:
  --config <path>     Optional path to JSON config file
  --count <n>         Stop after n records (default TARGET_COUNT)
  --max-pages <n>     Visit at most n result pages (default MAX_PAGES)
  --no-download       Collect metadata only
  --headed            Show the browser window
  -h, --help          Show this help
`;

const VALUE_FLAGS = new Set(["--config", "--count", "--max-pages"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "crawl" || raw === "status") {
    return raw;
  }
  return undefined;
}

function readValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

function readPositiveInt(argv: string[], flag: string): number | undefined {
  const raw = readValue(argv, flag);
  const parsed = raw ? Number.parseInt(raw, 10) : Number.NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

/** Positional words after the command, with flag values removed. */
function positionals(argv: string[]): string[] {
  const words: string[] = [];
  for (let i = 1; i < argv.length; i += 1) {
    const arg = argv[i];
    if (VALUE_FLAGS.has(arg)) {
      i += 1;
      continue;
    }
    if (!arg.startsWith("--")) {
      words.push(arg);
    }
  }
  return words;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const keyword = positionals(argv).join(" ").trim();
  if (command === "crawl" && !keyword) {
    return "help";
  }

  return {
    command,
    keyword: keyword || undefined,
    count: readPositiveInt(argv, "--count"),
    maxPages: readPositiveInt(argv, "--max-pages"),
    download: !argv.includes("--no-download"),
    headed: argv.includes("--headed"),
    configPath: readValue(argv, "--config"),
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = loadConfig(parsed.configPath);
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId });

  logger.info("command_start", {
    command: parsed.command,
    keyword: parsed.keyword,
    count: parsed.count,
    maxPages: parsed.maxPages,
    download: parsed.download,
    headed: parsed.headed,
  });

  try {
    return await executeCommand(parsed, { runId, config, metrics, logger });
  } finally {
    metrics.printSummary();
  }
}

async function executeCommand(parsed: ParsedCliArgs, ctx: CommandContext): Promise<number> {
  const { config, logger } = ctx;
  switch (parsed.command) {
    case "crawl": {
      const outcome = await runCrawl(
        { ...ctx, logger: logger.child("crawl") },
        {
          query: parsed.keyword ?? "",
          targetCount: parsed.count ?? config.targetCount,
          maxPages: parsed.maxPages ?? config.maxPages,
          downloadEnabled: parsed.download && config.downloadEnabled,
          headless: parsed.headed ? false : config.headless,
        },
      );
      logger.info("command_complete", { command: parsed.command, status: outcome.status });
      return outcome.status === "done" ? 0 : 2;
    }
    case "status":
      runStatus({ ...ctx, logger: logger.child("status") });
      logger.info("command_complete", { command: parsed.command });
      return 0;
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
