import { z } from "zod";
import { validateBoundingBox } from "../catalog/geometry";
import { resolveCollection } from "../config/collections";
import type { AppConfig } from "../config/types";
import { parseDay } from "../core/dates";
import { InvalidArgumentError } from "../core/errors";
import type { HarvestRequest } from "../types";

export const harvestJobMessageSchema = z.object({
  collection: z.string().min(1),
  date: z.string().min(1),
  dest: z.string().min(1).optional(),
  bounding_box: z.array(z.number()).length(4).optional(),
  protocol: z.enum(["s3", "https"]).default("s3"),
  skip_existing: z.boolean().default(true),
});

export type HarvestJobMessage = z.infer<typeof harvestJobMessageSchema>;
export type HarvestJobInput = z.input<typeof harvestJobMessageSchema>;

/** Parses a raw message body, unwrapping an SNS notification envelope when present. */
export function parseHarvestJob(body: string): HarvestJobMessage {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new InvalidArgumentError(`Harvest job is not JSON: ${body.slice(0, 200)}`, { cause: error });
  }

  const envelope = z.object({ Message: z.string() }).safeParse(json);
  if (envelope.success) {
    return parseHarvestJob(envelope.data.Message);
  }

  const parsed = harvestJobMessageSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidArgumentError(`Invalid harvest job: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown shape"}`);
  }
  return parsed.data;
}

export function toHarvestRequest(job: HarvestJobMessage, config: AppConfig): HarvestRequest {
  const destination = job.dest ?? config.destination;
  if (!destination) {
    throw new InvalidArgumentError("Harvest job has no dest and no default destination is configured (set BUCKET_NAME)");
  }
  return {
    collection: resolveCollection(config, job.collection),
    date: parseDay(job.date),
    destination,
    boundingBox: job.bounding_box ? validateBoundingBox(job.bounding_box) : undefined,
    protocol: job.protocol,
    skipExisting: job.skip_existing,
  };
}
