import type { SendMessageBatchCommand } from "@aws-sdk/client-sqs";
import { describe, expect, test } from "vitest";
import { DEFAULT_CONFIG } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import { MemoryObjectStore } from "../storage/memoryObjectStore";
import { catalogEntry, FakePageSource, HLSL30, noSleep } from "../testing/fixtures";
import { type CommandContext, runHarvest, runPublish } from "./commands";
import { ConfigError } from "./errors";

function context(overrides: Partial<CommandContext> = {}): CommandContext {
  const store = new MemoryObjectStore("memory://archive");
  return {
    runId: "run_test",
    config: DEFAULT_CONFIG,
    logger: Logger.silent(),
    metrics: new MetricsRegistry(),
    openStore: () => store,
    sleep: noSleep,
    ...overrides,
  };
}

describe("runHarvest", () => {
  test("harvests every day of the range", async () => {
    const source = new FakePageSource([{ entries: [catalogEntry("G1", ["s3://b/G1_stac.json"])] }]);
    const store = new MemoryObjectStore("memory://archive");

    const results = await runHarvest(context({ catalogSource: source, openStore: () => store }), {
      collection: HLSL30,
      startDate: "2024-01-30",
      endDate: "2024-02-01",
      destination: "memory://archive",
      protocol: "s3",
      skipExisting: false,
    });

    expect(results.map((result) => result.status)).toEqual(["ok", "ok", "ok"]);
    expect(store.keys()).toEqual([
      "links/HLSL30.2.0/2024/01/2024-01-30.json",
      "links/HLSL30.2.0/2024/01/2024-01-31.json",
      "links/HLSL30.2.0/2024/02/2024-02-01.json",
    ]);
    expect(source.calls.map((call) => call.query.temporal.start)).toEqual([
      "2024-01-30T00:00:00Z",
      "2024-01-31T00:00:00Z",
      "2024-02-01T00:00:00Z",
    ]);
  });
});

describe("runPublish", () => {
  test("enqueues one job per day", async () => {
    const bodies: string[] = [];
    const sqsClient = {
      async send(command: SendMessageBatchCommand) {
        for (const entry of command.input.Entries ?? []) {
          bodies.push(entry.MessageBody ?? "");
        }
        return {};
      },
    };
    const ctx = context({ config: { ...DEFAULT_CONFIG, harvestQueueUrl: "https://sqs.example.test/123/harvest" }, sqsClient });

    const sent = await runPublish(ctx, {
      collection: HLSL30,
      startDate: "2024-01-01",
      endDate: "2024-01-03",
      protocol: "https",
      skipExisting: false,
    });

    expect(sent).toBe(3);
    expect(JSON.parse(bodies[2])).toEqual({ collection: "HLSL30", date: "2024-01-03", protocol: "https", skip_existing: false });
  });

  test("needs a queue URL", async () => {
    await expect(
      runPublish(context(), { collection: HLSL30, startDate: "2024-01-01", endDate: "2024-01-01", protocol: "s3", skipExisting: true }),
    ).rejects.toBeInstanceOf(ConfigError);
  });
});
