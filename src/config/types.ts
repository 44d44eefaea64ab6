import { DocumentKind } from "../types";

export interface OutputDirs {
  documents: string;
  manifests: string;
  diagnostics?: string;
}

export interface RetrySettings {
  maxAttempts: number;
  delayMs: number;
}

export interface PortalSelectors {
  searchInputs: string[];
  searchButtons: string[];
  resultContainer: string;
  titleLinks: string[];
  row: string;
  authorLinks: string;
  authorCell: string;
  dateCell: string;
  downloadLinks: string[];
  nextPage: string;
}

export interface DocumentPattern {
  kind: DocumentKind;
  pattern: string;
}

export type DuplicatePolicy = "insert" | "upsert_by_title";
export type SinkType = "local_jsonl" | "none";

export interface StoreSettings {
  path: string;
  duplicatePolicy: DuplicatePolicy;
  resetOnOpen: boolean;
}

export interface AppConfig {
  portalUrl: string;
  userAgent: string;
  chromePath?: string;
  headless: boolean;
  ignoreHttpsErrors: boolean;
  navigationTimeoutMs: number;
  pageLoadTimeoutMs: number;
  pageSettleMs: number;
  pageLoad: RetrySettings;
  downloadTimeoutMs: number;
  download: RetrySettings;
  maxPages: number;
  /** Consecutive result pages with no readable rows before the crawl stops. */
  maxConsecutiveEmptyPages: number;
  targetCount: number;
  downloadEnabled: boolean;
  selectors: PortalSelectors;
  documentPatterns: DocumentPattern[];
  store: StoreSettings;
  sinkType: SinkType;
  outputDirs: OutputDirs;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs" | "selectors" | "store" | "pageLoad" | "download">> & {
  outputDirs?: Partial<OutputDirs>;
  selectors?: Partial<PortalSelectors>;
  store?: Partial<StoreSettings>;
  pageLoad?: Partial<RetrySettings>;
  download?: Partial<RetrySettings>;
};
