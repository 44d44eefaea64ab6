import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { attachFileName, createRecord } from "../types";
import { makeTempDir, testConfig } from "../../test/helpers/config";
import { createSink, LocalJsonlSink, NoopSink } from "./index";

describe("LocalJsonlSink", () => {
  it("appends one line per record with the run id", async () => {
    const config = testConfig(makeTempDir(), { sinkType: "local_jsonl" });
    const sink = createSink(config, "harvest_test");
    expect(sink).toBeInstanceOf(LocalJsonlSink);

    const record = attachFileName(createRecord({ title: "Alpha", authors: ["A"], pubDate: "2020", page: 1 }), "Alpha.pdf");
    await sink.publishRecords([{ query: "q", record, persisted: true, download: "success" }]);
    await sink.publishRecords([]);

    const content = fs.readFileSync(path.join(config.outputDirs.manifests, "records.jsonl"), "utf-8");
    expect(content.trim().split("\n").map((line) => JSON.parse(line))).toEqual([
      {
        runId: "harvest_test",
        query: "q",
        title: "Alpha",
        authors: ["A"],
        pubDate: "2020",
        page: 1,
        fileName: "Alpha.pdf",
        persisted: true,
        download: "success",
      },
    ]);
  });

  it("uses the no-op sink when manifests are off", () => {
    expect(createSink(testConfig(makeTempDir()), "harvest_test")).toBeInstanceOf(NoopSink);
  });
});
