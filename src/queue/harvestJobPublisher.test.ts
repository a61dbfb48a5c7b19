import type { SendMessageBatchCommand } from "@aws-sdk/client-sqs";
import { describe, expect, test } from "vitest";
import { noSleep } from "../testing/fixtures";
import { HarvestJobPublisher, type SqsClientLike } from "./harvestJobPublisher";
import type { HarvestJobInput } from "./harvestJobs";

class FakeSqs implements SqsClientLike {
  readonly batches: Array<Array<{ Id?: string; MessageBody?: string; MessageGroupId?: string }>> = [];

  constructor(private readonly failOnce: ReadonlySet<string> = new Set()) {}

  async send(command: SendMessageBatchCommand) {
    const entries = command.input.Entries ?? [];
    this.batches.push(entries);
    const failed = this.batches.length === 1 ? entries.filter((entry) => entry.Id && this.failOnce.has(entry.Id)) : [];
    return { Failed: failed.map((entry) => ({ Id: entry.Id, SenderFault: false })) };
  }
}

function jobs(count: number): HarvestJobInput[] {
  return Array.from({ length: count }, (_, index) => ({
    collection: "HLSL30",
    date: `2024-01-${String(index + 1).padStart(2, "0")}`,
  }));
}

describe("HarvestJobPublisher", () => {
  test("sends jobs in batches of ten", async () => {
    const sqs = new FakeSqs();
    const publisher = new HarvestJobPublisher({ queueUrl: "https://sqs.example.test/123/harvest", client: sqs, sleep: noSleep });

    expect(await publisher.publish(jobs(23))).toBe(23);

    expect(sqs.batches.map((batch) => batch.length)).toEqual([10, 10, 3]);
    expect(JSON.parse(sqs.batches[0][0].MessageBody ?? "")).toEqual({ collection: "HLSL30", date: "2024-01-01" });
    expect(sqs.batches[0][0].MessageGroupId).toBeUndefined();
  });

  test("resends only the entries that failed", async () => {
    const sqs = new FakeSqs(new Set(["1", "3"]));
    const publisher = new HarvestJobPublisher({ queueUrl: "https://sqs.example.test/123/harvest", client: sqs, sleep: noSleep });

    await publisher.publish(jobs(4));

    expect(sqs.batches.map((batch) => batch.map((entry) => entry.Id))).toEqual([
      ["0", "1", "2", "3"],
      ["1", "3"],
    ]);
  });

  test("groups messages on FIFO queues", async () => {
    const sqs = new FakeSqs();
    const publisher = new HarvestJobPublisher({ queueUrl: "https://sqs.example.test/123/harvest.fifo", client: sqs, sleep: noSleep });

    await publisher.publish(jobs(1));

    expect(sqs.batches[0][0]).toMatchObject({ MessageGroupId: "harvest-jobs", MessageDeduplicationId: "HLSL30:2024-01-01" });
  });
});
