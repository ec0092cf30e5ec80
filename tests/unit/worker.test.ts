import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { Fetcher } from "../../src/harvest/fetcher.js";
import { createStrategy } from "../../src/harvest/strategies/index.js";
import { TaskQueue } from "../../src/workers/task-queue.js";
import type { StatusRecord, WorkerConfig } from "../../src/workers/types.js";
import { harvestItem, runWorker, type WorkerChannel } from "../../src/workers/worker.js";
import { routes, type FakeReply } from "../helpers/fake-fetch.js";
import { makeTempDir, removeTempDir } from "../helpers/temp-dir.js";

const BASE = "https://quotes.test/q/";

function reasonOf(record: StatusRecord | undefined): string | undefined {
  return record?.outcome === "failure" ? record.reason : undefined;
}

function queueChannel(queue: TaskQueue, records: StatusRecord[]): WorkerChannel {
  return {
    take: () => queue.get(),
    taskDone: () => queue.taskDone(),
    report: (record) => records.push(record),
  };
}

describe("runWorker", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(outputDir);
  });

  function tickerConfig(mode: WorkerConfig["mode"], dir = outputDir): WorkerConfig {
    return {
      mode,
      outputDir: dir,
      strategy: { kind: "ticker", baseUrl: BASE, tickers: [], params: {} },
      maxInFlight: 16,
    };
  }

  it("should report one record per task and acknowledge every entry", async () => {
    const queue = new TaskQueue();
    queue.put("AAA");
    queue.put("BBB");
    queue.putSentinel();
    const records: StatusRecord[] = [];
    const { fetchImpl } = routes({ [`${BASE}AAA`]: { status: 200, body: "a\n" } });

    const result = await runWorker("worker-1", tickerConfig("sync"), queueChannel(queue, records), {
      fetchImpl,
    });

    expect(result).toEqual({ workerId: "worker-1", processed: 2, succeeded: 1, failed: 1 });
    expect(records).toEqual([
      {
        outcome: "success",
        item: "AAA",
        workerId: "worker-1",
        files: [path.join(outputDir, "AAA.csv")],
      },
      {
        outcome: "failure",
        item: "BBB",
        workerId: "worker-1",
        reason: `${BASE}BBB failed, status=404`,
      },
    ]);
    expect(queue.unfinished).toBe(0);
    await expect(queue.join()).resolves.toBeUndefined();
  });

  it("should stop taking entries after its sentinel", async () => {
    const queue = new TaskQueue();
    queue.put("AAA");
    queue.putSentinel();
    queue.put("BBB");
    const records: StatusRecord[] = [];
    const { fetchImpl } = routes({ [`${BASE}AAA`]: { status: 200, body: "a\n" } });

    await runWorker("worker-1", tickerConfig("async"), queueChannel(queue, records), { fetchImpl });

    expect(records.map((record) => record.item)).toEqual(["AAA"]);
    expect(queue.size).toBe(1);
    expect(queue.unfinished).toBe(1);
  });

  it("should exit cleanly on a sentinel with no tasks", async () => {
    const queue = new TaskQueue();
    queue.putSentinel();
    const records: StatusRecord[] = [];

    const result = await runWorker("worker-1", tickerConfig("sync"), queueChannel(queue, records), {
      fetchImpl: routes({}).fetchImpl,
    });

    expect(result.processed).toBe(0);
    expect(records).toEqual([]);
    expect(queue.unfinished).toBe(0);
  });

  it("should turn a write error into the item's failure", async () => {
    const queue = new TaskQueue();
    queue.put("AAA");
    queue.putSentinel();
    const records: StatusRecord[] = [];
    const missingDir = path.join(outputDir, "missing", "nested");
    const { fetchImpl } = routes({ [`${BASE}AAA`]: { status: 200, body: "a\n" } });

    await runWorker(
      "worker-1",
      tickerConfig("sync", missingDir),
      queueChannel(queue, records),
      { fetchImpl },
    );

    expect(records).toHaveLength(1);
    expect(records[0]?.outcome).toBe("failure");
    expect(reasonOf(records[0])).toMatch(
      new RegExp(`^Failed to write ${escapeRegExp(path.join(missingDir, "AAA.csv"))}: `),
    );
  });
});

describe("harvestItem", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(outputDir);
  });

  function imagePage(images: Record<string, FakeReply>) {
    const html = Object.keys(images)
      .map((url) => `<img src="${url}">`)
      .join("");
    return routes({ "https://img.test/p1/nature.html": { status: 200, body: html }, ...images });
  }

  const strategyConfig = {
    kind: "image" as const,
    baseUrl: "https://img.test/",
    item: "nature",
    hostFilter: "images.stockfreeimages.com",
    params: {},
  };

  it("should succeed with every saved file when all images download", async () => {
    const { fetchImpl } = imagePage({
      "https://images.stockfreeimages.com/1/a.jpg": { status: 200, body: new Uint8Array([1]) },
      "https://images.stockfreeimages.com/1/b.jpg": { status: 200, body: new Uint8Array([2]) },
    });
    const fetcher = new Fetcher({ workerId: "worker-2", fetchImpl });
    const strategy = createStrategy(strategyConfig, outputDir);

    const record = await harvestItem(1, strategy, fetcher, { mode: "async", maxInFlight: 16 });

    expect(record).toEqual({
      outcome: "success",
      item: 1,
      workerId: "worker-2",
      files: [path.join(outputDir, "a.jpg"), path.join(outputDir, "b.jpg")],
    });
    expect([...(await fs.readFile(path.join(outputDir, "b.jpg")))]).toEqual([2]);
  });

  it("should fail the page when any image download fails", async () => {
    const { fetchImpl } = imagePage({
      "https://images.stockfreeimages.com/1/a.jpg": { status: 200, body: new Uint8Array([1]) },
      "https://images.stockfreeimages.com/1/gone.jpg": { status: 410 },
    });
    const fetcher = new Fetcher({ workerId: "worker-2", fetchImpl });
    const strategy = createStrategy(strategyConfig, outputDir);

    const record = await harvestItem(1, strategy, fetcher, { mode: "sync", maxInFlight: 16 });

    expect(record).toEqual({
      outcome: "failure",
      item: 1,
      workerId: "worker-2",
      reason:
        "1 of 2 downloads failed, first: https://images.stockfreeimages.com/1/gone.jpg failed, status=410",
    });
  });

  it("should succeed with no files for a page without matching images", async () => {
    const { fetchImpl } = imagePage({});
    const fetcher = new Fetcher({ workerId: "worker-2", fetchImpl });
    const strategy = createStrategy(strategyConfig, outputDir);

    expect(await harvestItem(1, strategy, fetcher, { mode: "sync", maxInFlight: 16 })).toEqual({
      outcome: "success",
      item: 1,
      workerId: "worker-2",
      files: [],
    });
  });
});

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
