/*
Purpose: look up which releases exist, by creation window or by identity.
Assumptions: every call hits the backing store; results are never cached.
Usage: await source.getReleaseIdsBetween("component", since, until).
*/

import { SourceUnavailableError } from "../core/errors.js";
import { isWithinWindow, type ReleaseId, type ReleaseKind } from "../core/release.js";
import type { ObjectBucket } from "../storage/object-bucket.js";

export interface ReleaseSource {
  /** Releases of `kind` created in `[since, until)`. */
  getReleaseIdsBetween(kind: ReleaseKind, since: Date, until: Date): Promise<Set<ReleaseId>>;
  /** The subset of `ids` the store knows about for `kind`. */
  getReleaseIds(kind: ReleaseKind, ids: Iterable<ReleaseId>): Promise<Set<ReleaseId>>;
}

// Where the release pipeline writes each kind's release event.
export const RELEASE_INDEX_PREFIX: Record<ReleaseKind, string> = {
  component: "snapshots/",
  product: "release-data/",
};

export class S3ReleaseSource implements ReleaseSource {
  constructor(private readonly bucket: ObjectBucket) {}

  async getReleaseIdsBetween(kind: ReleaseKind, since: Date, until: Date): Promise<Set<ReleaseId>> {
    const ids = new Set<ReleaseId>();
    for (const entry of await this.listIndex(kind)) {
      if (entry.createdAt && isWithinWindow(entry.createdAt, since, until)) {
        ids.add(entry.id);
      }
    }
    return ids;
  }

  async getReleaseIds(kind: ReleaseKind, ids: Iterable<ReleaseId>): Promise<Set<ReleaseId>> {
    const known = new Set((await this.listIndex(kind)).map((entry) => entry.id));
    return new Set(Array.from(ids).filter((id) => known.has(id)));
  }

  private async listIndex(kind: ReleaseKind): Promise<Array<{ id: ReleaseId; createdAt: Date | null }>> {
    const prefix = RELEASE_INDEX_PREFIX[kind];
    try {
      const objects = await this.bucket.list(prefix);
      return objects
        .map((object) => ({ id: object.key.slice(prefix.length), createdAt: object.lastModified }))
        .filter((entry) => entry.id.length > 0 && !entry.id.includes("/"));
    } catch (err) {
      throw new SourceUnavailableError(
        `Failed to list ${kind} releases under s3://${this.bucket.name}/${prefix}`,
        err,
      );
    }
  }
}
