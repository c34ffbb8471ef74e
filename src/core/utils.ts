import { randomBytes } from "node:crypto";

export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\..+$/, "");
  return `${stamp}-${randomBytes(3).toString("hex")}`;
}

export function delay(durationMs: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, durationMs));
}

// Release ids become object keys and directory names. Percent-encoding keeps distinct
// ids distinct and never yields a path separator, "." or "..".
export function encodeReleaseKey(releaseId: string): string {
  if (releaseId.length === 0) {
    throw new RangeError("Release id must not be empty");
  }
  if (releaseId === "." || releaseId === "..") {
    return releaseId.replace(/\./g, "%2E");
  }
  return encodeURIComponent(releaseId).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}
