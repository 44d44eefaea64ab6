import { AppConfig } from "../config";
import { SqliteRecordStore } from "./sqliteStore";
import { StoreConnector } from "./types";

export function createStoreConnector(config: AppConfig): StoreConnector {
  return () => new SqliteRecordStore(config.store);
}

export * from "./types";
export { RecordPersister } from "./persister";
export { SqliteRecordStore } from "./sqliteStore";
