import path from "node:path";
import { describe, expect, test } from "vitest";
import { DEFAULT_CONFIG } from "../config";
import { createObjectStore, createStoreFactory } from "./index";
import { LocalObjectStore } from "./localObjectStore";
import { parseS3Url, S3ObjectStore } from "./s3ObjectStore";

describe("parseS3Url", () => {
  test("splits bucket and prefix", () => {
    expect(parseS3Url("s3://my-bucket/archive/v1/")).toEqual({ bucket: "my-bucket", prefix: "archive/v1" });
    expect(parseS3Url("s3://my-bucket")).toEqual({ bucket: "my-bucket", prefix: "" });
  });

  test("rejects other schemes", () => {
    expect(() => parseS3Url("https://my-bucket/x")).toThrow("Invalid S3 URL: https://my-bucket/x (expected s3://bucket[/prefix])");
  });
});

describe("createObjectStore", () => {
  test("picks the store by destination", () => {
    const s3 = createObjectStore("s3://my-bucket/archive", DEFAULT_CONFIG);
    expect(s3).toBeInstanceOf(S3ObjectStore);
    expect(s3.location).toBe("s3://my-bucket/archive");

    const local = createObjectStore("file:///tmp/archive", DEFAULT_CONFIG);
    expect(local).toBeInstanceOf(LocalObjectStore);
    expect(local.location).toBe(path.resolve("/tmp/archive"));
  });

  test("factory reuses stores per destination", () => {
    const openStore = createStoreFactory(DEFAULT_CONFIG);
    expect(openStore("s3://my-bucket")).toBe(openStore("s3://my-bucket"));
    expect(openStore("./out")).not.toBe(openStore("s3://my-bucket"));
  });
});
