/*
Purpose: RetryLedger backed by one JSON object per release in the run's bucket.
Assumptions: no locks; the last writer of a key wins.
Usage: new S3RetryLedger(bucket, { prefix: "retry-ledger/", onInvalidRecord }).
*/

import { LedgerUnavailableError } from "../core/errors.js";
import type { FailureReason } from "../core/outcome.js";
import { isWithinWindow, type ReleaseId, type ReleaseKind } from "../core/release.js";
import { encodeReleaseKey } from "../core/utils.js";
import type { ObjectBucket } from "../storage/object-bucket.js";

import {
  RetryRecordSchema,
  nextRetryRecord,
  type RetryLedger,
  type RetryRecord,
} from "./retry-ledger.js";

export type S3RetryLedgerOptions = {
  prefix: string;
  now?: () => Date;
  onInvalidRecord?: (key: string, reason: string) => void;
};

export class S3RetryLedger implements RetryLedger {
  private readonly prefix: string;
  private readonly now: () => Date;
  private readonly onInvalidRecord?: (key: string, reason: string) => void;

  constructor(
    private readonly bucket: ObjectBucket,
    options: S3RetryLedgerOptions,
  ) {
    this.prefix = options.prefix;
    this.now = options.now ?? (() => new Date());
    this.onInvalidRecord = options.onInvalidRecord;
  }

  keyFor(releaseId: ReleaseId): string {
    return `${this.prefix}${encodeReleaseKey(releaseId)}.json`;
  }

  async checkAvailable(): Promise<void> {
    await this.guard("probe", () => this.bucket.probe(this.prefix));
  }

  async getBetween(since: Date, until: Date): Promise<RetryRecord[]> {
    return this.guard("list", async () => {
      const objects = await this.bucket.list(this.prefix);
      const records: RetryRecord[] = [];
      for (const object of objects) {
        const record = await this.readRecord(object.key);
        if (record && isWithinWindow(new Date(record.first_failed_at), since, until)) {
          records.push(record);
        }
      }
      return records;
    });
  }

  async get(ids: Iterable<ReleaseId>): Promise<Map<ReleaseId, RetryRecord>> {
    return this.guard("read", async () => {
      const records = new Map<ReleaseId, RetryRecord>();
      for (const id of new Set(ids)) {
        const record = await this.readRecord(this.keyFor(id));
        if (record) records.set(id, record);
      }
      return records;
    });
  }

  async upsert(releaseId: ReleaseId, kind: ReleaseKind, reason: FailureReason): Promise<RetryRecord> {
    return this.guard("upsert", async () => {
      const key = this.keyFor(releaseId);
      const existing = await this.readRecord(key);
      const record = nextRetryRecord(existing, { releaseId, kind, reason, now: this.now() });
      await this.bucket.put(key, `${JSON.stringify(record, null, 2)}\n`);
      return record;
    });
  }

  async remove(releaseId: ReleaseId): Promise<void> {
    await this.guard("remove", async () => {
      const key = this.keyFor(releaseId);
      if ((await this.bucket.get(key)) === null) return;
      await this.bucket.delete(key);
    });
  }

  private async readRecord(key: string): Promise<RetryRecord | null> {
    const body = await this.bucket.get(key);
    if (body === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(body.toString("utf8"));
    } catch (err) {
      this.onInvalidRecord?.(key, err instanceof Error ? err.message : String(err));
      return null;
    }

    const parsed = RetryRecordSchema.safeParse(raw);
    if (!parsed.success) {
      this.onInvalidRecord?.(key, parsed.error.issues.map((issue) => issue.message).join("; "));
      return null;
    }
    return parsed.data;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof LedgerUnavailableError) throw err;
      throw new LedgerUnavailableError(
        `Retry ledger ${operation} failed for s3://${this.bucket.name}/${this.prefix}`,
        err,
      );
    }
  }
}
