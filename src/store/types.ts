import { DuplicatePolicy } from "../config";
import { PaperRecord, StoredPaperRow } from "../types";

export interface StoreStats {
  totalRecords: number;
  withFile: number;
  distinctTitles: number;
}

export interface RecordStore {
  /** Returns the id of the inserted or updated row. */
  save(record: PaperRecord, createdAt: string): number;
  listRecords(limit?: number): StoredPaperRow[];
  getStats(): StoreStats;
  close(): void;
}

export interface RecordStoreOptions {
  path: string;
  duplicatePolicy: DuplicatePolicy;
  resetOnOpen: boolean;
}

export type StoreConnector = () => RecordStore;
