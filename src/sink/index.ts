import { AppConfig } from "../config";
import { LocalJsonlSink, NoopSink } from "./localJsonlSink";
import { Sink } from "./types";

export function createSink(config: AppConfig, runId: string): Sink {
  switch (config.sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config, runId);
    case "none":
      return new NoopSink();
  }
}

export * from "./types";
export { LocalJsonlSink, NoopSink } from "./localJsonlSink";
