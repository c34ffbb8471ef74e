import { describe, expect, it } from "vitest";

import { InMemoryObjectBucket } from "../app/regeneration/__tests__/fakes.js";
import { SourceUnavailableError } from "../core/errors.js";

import { S3ReleaseSource } from "./release-source.js";

const SINCE = new Date("2024-03-01T00:00:00.000Z");
const UNTIL = new Date("2024-03-02T00:00:00.000Z");

function seededBucket(): InMemoryObjectBucket {
  const bucket = new InMemoryObjectBucket();
  bucket.seed("snapshots/at-start", "{}", new Date("2024-03-01T00:00:00.000Z"));
  bucket.seed("snapshots/inside", "{}", new Date("2024-03-01T12:00:00.000Z"));
  bucket.seed("snapshots/at-end", "{}", new Date("2024-03-02T00:00:00.000Z"));
  bucket.seed("snapshots/before", "{}", new Date("2024-02-29T23:59:59.999Z"));
  bucket.seed("release-data/product-1", "{}", new Date("2024-03-01T06:00:00.000Z"));
  return bucket;
}

describe("S3ReleaseSource", () => {
  it("returns component releases created in the half-open window", async () => {
    const source = new S3ReleaseSource(seededBucket());

    const ids = await source.getReleaseIdsBetween("component", SINCE, UNTIL);

    expect(Array.from(ids).sort()).toEqual(["at-start", "inside"]);
  });

  it("reads product releases from the release data index", async () => {
    const source = new S3ReleaseSource(seededBucket());

    const ids = await source.getReleaseIdsBetween("product", SINCE, UNTIL);

    expect(Array.from(ids)).toEqual(["product-1"]);
  });

  it("narrows requested ids to the ones the index knows", async () => {
    const source = new S3ReleaseSource(seededBucket());

    const ids = await source.getReleaseIds("component", ["inside", "missing", "product-1"]);

    expect(Array.from(ids)).toEqual(["inside"]);
  });

  it("wraps storage failures as a source outage", async () => {
    const bucket = seededBucket();
    bucket.failWith = new Error("connect ECONNREFUSED");

    const error = await new S3ReleaseSource(bucket)
      .getReleaseIdsBetween("component", SINCE, UNTIL)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({
      message: "Failed to list component releases under s3://test-bucket/snapshots/",
    });
  });
});
