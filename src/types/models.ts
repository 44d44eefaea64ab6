export const AUTHOR_DELIMITER = "；";

export interface PaperRecord {
  readonly title: string;
  readonly authors: readonly string[];
  readonly pubDate: string;
  readonly page: number;
  readonly fileName?: string;
}

/**
 * Opaque pointer to a result row's detail or download target. Only the
 * downloader resolves it, so no navigation happens when downloads are off.
 */
export interface DetailHandle {
  readonly href: string;
  readonly referer: string;
  readonly title: string;
}

export interface ExtractedRow {
  record: PaperRecord;
  detail?: DetailHandle;
}

export interface RenderedPage {
  pageNumber: number;
  url: string;
  html: string;
}

export type PageOutcome =
  | { kind: "page"; page: RenderedPage }
  | { kind: "end"; reason: "last_page" | "timeout" | "pagination_failed" };

export type DocumentKind = "pdf" | "caj";

export type FetchResult =
  | { status: "success"; path: string; bytes: number; kind: DocumentKind }
  | { status: "already_exists"; path: string }
  | { status: "not_found"; error?: string }
  | { status: "network_error"; error: string };

export type SaveResult = { status: "ack"; id: number } | { status: "soft_failure"; reason: string };

export interface StoredPaperRow {
  id: number;
  title: string;
  authors: string[];
  pubDate: string;
  page: number;
  fileName: string | null;
  createdAt: string;
}

export function createRecord(fields: Omit<PaperRecord, "fileName">): PaperRecord {
  return Object.freeze({ ...fields, authors: Object.freeze([...fields.authors]) });
}

export function attachFileName(record: PaperRecord, fileName: string): PaperRecord {
  if (record.fileName !== undefined) {
    throw new Error(`fileName already assigned for "${record.title}"`);
  }
  return Object.freeze({ ...record, fileName });
}

export function joinAuthors(authors: readonly string[]): string {
  return authors.join(AUTHOR_DELIMITER);
}

export function splitStoredAuthors(value: string): string[] {
  return value === "" ? [] : value.split(AUTHOR_DELIMITER);
}
