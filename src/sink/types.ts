import { PaperRecord } from "../types";

export interface ManifestEntry {
  query: string;
  record: PaperRecord;
  persisted: boolean;
  download: string;
}

export interface Sink {
  publishRecords(entries: ManifestEntry[]): Promise<void>;
}
