// Release identity and the per-run candidate group.

import { z } from "zod";

export const RELEASE_KINDS = ["component", "product"] as const;

export const ReleaseKindSchema = z.enum(RELEASE_KINDS);

export type ReleaseKind = z.infer<typeof ReleaseKindSchema>;

export type ReleaseId = string;

export type Release = {
  readonly id: ReleaseId;
  readonly kind: ReleaseKind;
  readonly createdAt: Date;
};

/** Candidate releases for one run. Built once and replaced wholesale, never edited. */
export type SbomReleaseGroup = ReadonlySet<ReleaseId>;

export function createReleaseGroup(ids: Iterable<ReleaseId>): SbomReleaseGroup {
  const group = new Set<ReleaseId>();
  for (const raw of ids) {
    const id = raw.trim();
    if (id) group.add(id);
  }
  return group;
}

export function unionReleaseGroups(...groups: Iterable<ReleaseId>[]): SbomReleaseGroup {
  return createReleaseGroup(groups.flatMap((group) => Array.from(group)));
}

/** Half-open `[since, until)`. */
export function isWithinWindow(value: Date, since: Date, until: Date): boolean {
  const time = value.getTime();
  return time >= since.getTime() && time < until.getTime();
}
