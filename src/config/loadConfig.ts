import fs from "node:fs";
import path from "node:path";
import { AppConfig, ConfigOverrides, DuplicatePolicy, SinkType } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  portalUrl: "https://www.cnki.net",
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36",
  chromePath: undefined,
  headless: true,
  ignoreHttpsErrors: false,
  navigationTimeoutMs: 30_000,
  pageLoadTimeoutMs: 10_000,
  pageSettleMs: 2_000,
  pageLoad: {
    maxAttempts: 3,
    delayMs: 2_000,
  },
  downloadTimeoutMs: 60_000,
  download: {
    maxAttempts: 3,
    delayMs: 1_500,
  },
  maxPages: 10,
  maxConsecutiveEmptyPages: 3,
  targetCount: 20,
  downloadEnabled: true,
  selectors: {
    searchInputs: ["#txt_SearchText", "input[placeholder*='检索']", "input[type='text'][name*='search']", ".search-input"],
    searchButtons: [".search-btn", "button[type='submit']", "input[type='submit']", ".search-button"],
    resultContainer: "#gridTable, #GridTableContent, table.result, .result-table-list",
    titleLinks: ["a.fz14", ".fz14 a", "td.name a"],
    row: "tr",
    authorLinks: "a.KnowledgeNetLink",
    authorCell: "td.author",
    dateCell: "td.date",
    downloadLinks: ["td.operat a.downloadlink.icon-download", "td.operat a.downloadlink"],
    nextPage: "#PageNext",
  },
  documentPatterns: [
    { kind: "pdf", pattern: "\\.pdf(?:$|[?#])" },
    { kind: "pdf", pattern: "dflag=pdfdown" },
    { kind: "caj", pattern: "\\.(?:caj|kdh|nh)(?:$|[?#])" },
    { kind: "caj", pattern: "dflag=(?:caj|nh)down" },
    { kind: "caj", pattern: "/download\\.aspx\\?" },
  ],
  store: {
    path: "data/papers.sqlite",
    duplicatePolicy: "insert",
    resetOnOpen: false,
  },
  sinkType: "local_jsonl",
  outputDirs: {
    documents: "data/documents",
    manifests: "data/manifests",
    diagnostics: undefined,
  },
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed as ConfigOverrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toDuplicatePolicy(value: string | undefined, fallback: DuplicatePolicy): DuplicatePolicy {
  return value === "insert" || value === "upsert_by_title" ? value : fallback;
}

function toSinkType(value: string | undefined, fallback: SinkType): SinkType {
  const normalized = value?.toLowerCase();
  return normalized === "local_jsonl" || normalized === "none" ? normalized : fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    pageLoad: { ...DEFAULT_CONFIG.pageLoad, ...(fileConfig.pageLoad ?? {}) },
    download: { ...DEFAULT_CONFIG.download, ...(fileConfig.download ?? {}) },
    selectors: { ...DEFAULT_CONFIG.selectors, ...(fileConfig.selectors ?? {}) },
    store: { ...DEFAULT_CONFIG.store, ...(fileConfig.store ?? {}) },
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  return {
    ...merged,
    portalUrl: env.PORTAL_URL ?? merged.portalUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    chromePath: env.CHROME_PATH ?? merged.chromePath,
    headless: toBool(env.HEADLESS, merged.headless),
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    navigationTimeoutMs: toInt(env.NAVIGATION_TIMEOUT_MS, merged.navigationTimeoutMs),
    pageLoadTimeoutMs: toInt(env.PAGE_LOAD_TIMEOUT_MS, merged.pageLoadTimeoutMs),
    pageSettleMs: toInt(env.PAGE_SETTLE_MS, merged.pageSettleMs),
    pageLoad: {
      maxAttempts: toInt(env.PAGE_LOAD_MAX_ATTEMPTS, merged.pageLoad.maxAttempts),
      delayMs: toInt(env.PAGE_LOAD_BACKOFF_MS, merged.pageLoad.delayMs),
    },
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    download: {
      maxAttempts: toInt(env.DOWNLOAD_MAX_ATTEMPTS, merged.download.maxAttempts),
      delayMs: toInt(env.DOWNLOAD_DELAY_MS, merged.download.delayMs),
    },
    maxPages: toInt(env.MAX_PAGES, merged.maxPages),
    maxConsecutiveEmptyPages: toInt(env.MAX_CONSECUTIVE_EMPTY_PAGES, merged.maxConsecutiveEmptyPages),
    targetCount: toInt(env.TARGET_COUNT, merged.targetCount),
    downloadEnabled: toBool(env.DOWNLOAD_ENABLED, merged.downloadEnabled),
    store: {
      path: env.STORE_PATH ?? merged.store.path,
      duplicatePolicy: toDuplicatePolicy(env.STORE_DUPLICATE_POLICY, merged.store.duplicatePolicy),
      resetOnOpen: toBool(env.STORE_RESET_ON_OPEN, merged.store.resetOnOpen),
    },
    sinkType: toSinkType(env.SINK_TYPE, merged.sinkType),
    outputDirs: {
      documents: env.OUTPUT_DOCUMENTS_DIR ?? merged.outputDirs.documents,
      manifests: env.OUTPUT_MANIFESTS_DIR ?? merged.outputDirs.manifests,
      diagnostics: env.OUTPUT_DIAGNOSTICS_DIR ?? merged.outputDirs.diagnostics,
    },
  };
}

export { DEFAULT_CONFIG };
