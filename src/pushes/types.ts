export const PUSH_STATES = ["accepting", "live", "discarded"] as const;
export const PUSH_TYPES = ["regular", "urgent", "morning", "private"] as const;

export type PushState = (typeof PUSH_STATES)[number];
export type PushType = (typeof PUSH_TYPES)[number];

export interface PushSummary {
  id: number;
  title: string;
  user: string;
  pushType: PushType;
  branch: string;
  /** Raw stored value. Outside PushState it is reported through stateError, never coerced. */
  state: string;
  stateError: PushStateError | null;
  created: number;
  modified: number;
}

export interface PushStateError {
  code: "E_PUSH_STATE_INVALID";
  message: string;
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

export interface PushPage {
  pushes: PushSummary[];
  totalCount: number;
}

export interface PushListResponse extends PushPage {
  window: PageWindow;
  filter: FilterState;
}

export interface PushItemsResponse {
  pushId: number;
  items: PushItem[];
}

export interface NewPushFields {
  title: string;
  branch: string;
  pushType: PushType;
}

export function isPushState(value: string): value is PushState {
  return PUSH_STATES.some((state) => state === value);
}

export function isPushType(value: string): value is PushType {
  return PUSH_TYPES.some((pushType) => pushType === value);
}
