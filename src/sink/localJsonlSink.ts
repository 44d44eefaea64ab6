import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { ManifestEntry, Sink } from "./types";

export class LocalJsonlSink implements Sink {
  private readonly recordsPath: string;
  private readonly runId: string;

  constructor(config: AppConfig, runId: string) {
    const manifestsDir = path.resolve(config.outputDirs.manifests);
    fs.mkdirSync(manifestsDir, { recursive: true });
    this.recordsPath = path.join(manifestsDir, "records.jsonl");
    this.runId = runId;
  }

  async publishRecords(entries: ManifestEntry[]): Promise<void> {
    await this.appendLines(
      entries.map((entry) => ({
        runId: this.runId,
        query: entry.query,
        ...entry.record,
        persisted: entry.persisted,
        download: entry.download,
      })),
    );
  }

  private async appendLines(records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(this.recordsPath, content, "utf-8");
  }
}

export class NoopSink implements Sink {
  async publishRecords(_entries: ManifestEntry[]): Promise<void> {
    return;
  }
}
