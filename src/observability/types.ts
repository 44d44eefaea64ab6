export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  page?: number;
  title?: string;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type LogWriter = (line: string, level: LogLevel) => void;

export type MetricCounterName =
  | "pages_crawled"
  | "records_extracted"
  | "records_skipped"
  | "downloads_ok"
  | "downloads_existing"
  | "downloads_failed"
  | "persist_ok"
  | "persist_failed";

export type MetricTimerName = "page_load_ms" | "download_ms";
