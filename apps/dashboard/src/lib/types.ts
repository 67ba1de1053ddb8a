export const PUSH_STATE_OPTIONS = ["accepting", "live", "discarded"] as const;
export const PUSH_TYPE_OPTIONS = ["regular", "urgent", "morning", "private"] as const;

export type PushState = (typeof PUSH_STATE_OPTIONS)[number];
export type PushType = (typeof PUSH_TYPE_OPTIONS)[number];

export interface DashboardError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface PushSummary {
  id: number;
  title: string;
  user: string;
  pushType: PushType;
  branch: string;
  /** Stored value; may fall outside PushState, in which case stateError is set. */
  state: string;
  stateError: DashboardError | null;
  created: number;
  modified: number;
}

export interface PushItem {
  id: number;
  pushId: number;
  title: string;
  user: string;
  repo: string;
  branch: string;
  revision: string;
  state: string;
  tags: string[];
  reviewId: number | null;
  description: string;
  created: number;
  modified: number;
}

export interface FilterState {
  state?: PushState;
  user?: string;
}

export interface PageWindow {
  rpp: number;
  offset: number;
}

export interface PushListResponse {
  pushes: PushSummary[];
  totalCount: number;
  window: PageWindow;
  filter: FilterState;
}

export interface PushItemsResponse {
  pushId: number;
  items: PushItem[];
}

/** Raw listing parameters exactly as they appear in the page URL. */
export interface ListQuery {
  rpp: string | null;
  offset: string | null;
  state: string | null;
  user: string | null;
}
