import type { FilterState, PageWindow } from "./types";

export interface PaginationLinks {
  hasNewer: boolean;
  newerOffset: number;
  hasOlder: boolean;
  olderOffset: number;
}

export function computePagination(window: PageWindow, totalCount: number): PaginationLinks {
  return {
    hasNewer: window.offset > 0,
    newerOffset: Math.max(window.offset - window.rpp, 0),
    hasOlder: window.offset + window.rpp < totalCount,
    olderOffset: window.offset + window.rpp
  };
}

/**
 * `/pushes?rpp=&offset=&state=&user=`, every value percent-encoded. An absent
 * filter value is written as an empty parameter, which the server reads as
 * "no restriction".
 */
export function buildPushesHref(filter: FilterState, window: PageWindow): string {
  const parts: Array<[string, string]> = [
    ["rpp", String(window.rpp)],
    ["offset", String(window.offset)],
    ["state", filter.state ?? ""],
    ["user", filter.user ?? ""]
  ];

  return `/pushes?${parts.map(([key, value]) => `${key}=${encodeURIComponent(value)}`).join("&")}`;
}

/** First and last 1-based positions shown on the page, or null for an empty page. */
export function describeRange(window: PageWindow, shown: number): { first: number; last: number } | null {
  if (shown === 0) {
    return null;
  }

  return {
    first: window.offset + 1,
    last: window.offset + shown
  };
}
