import type { PushSummary } from "./types";

export function formatTimestamp(seconds: number): string {
  if (!Number.isFinite(seconds)) {
    return "n/a";
  }

  return new Date(seconds * 1000).toLocaleString();
}

export function shouldShowModified(push: Pick<PushSummary, "created" | "modified">): boolean {
  return push.modified !== push.created;
}
