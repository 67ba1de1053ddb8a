import { z } from "zod";

import {
  PUSH_STATE_OPTIONS,
  PUSH_TYPE_OPTIONS,
  type DashboardError,
  type ListQuery,
  type PushItem,
  type PushListResponse
} from "./types";

export const PUSH_NOT_FOUND = "E_PUSH_NOT_FOUND";
export const BACKEND_UNAVAILABLE = "E_PUSH_BACKEND_UNAVAILABLE";

export class DashboardApiError extends Error {
  readonly code: string;
  readonly status: number | null;

  constructor(code: string, message: string, status: number | null = null) {
    super(`${code}: ${message}`);
    this.name = "DashboardApiError";
    this.code = code;
    this.status = status;
  }
}

function isDashboardError(value: unknown): value is DashboardError {
  if (typeof value !== "object" || value === null) {
    return false;
  }

  return "code" in value && typeof value.code === "string" && "message" in value && typeof value.message === "string";
}

function codeForFailure(status: number, payload: unknown): string {
  if (status === 404) {
    return PUSH_NOT_FOUND;
  }

  if (status === 400 && isDashboardError(payload)) {
    return payload.code;
  }

  return BACKEND_UNAVAILABLE;
}

async function fetchJson(url: string, options?: RequestInit): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, options);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DashboardApiError(BACKEND_UNAVAILABLE, message.slice(0, 220));
  }

  let payload: unknown;
  try {
    payload = (await response.json()) as unknown;
  } catch {
    throw new DashboardApiError(BACKEND_UNAVAILABLE, `HTTP ${response.status}: response was not JSON`, response.status);
  }

  if (!response.ok) {
    const message = isDashboardError(payload) ? payload.message : JSON.stringify(payload).slice(0, 320);
    throw new DashboardApiError(codeForFailure(response.status, payload), message, response.status);
  }

  return payload;
}

export function toListSearchParams(query: ListQuery): URLSearchParams {
  const params = new URLSearchParams();
  for (const key of ["rpp", "offset", "state", "user"] as const) {
    const value = query[key];
    if (value !== null) {
      params.set(key, value);
    }
  }

  return params;
}

const DashboardErrorSchema = z.object({
  code: z.string(),
  message: z.string()
});

const PushSummarySchema = z.object({
  id: z.number().int(),
  title: z.string(),
  user: z.string(),
  pushType: z.enum(PUSH_TYPE_OPTIONS),
  branch: z.string(),
  state: z.string(),
  stateError: DashboardErrorSchema.nullable(),
  created: z.number(),
  modified: z.number()
});

const PushItemSchema = z.object({
  id: z.number().int(),
  pushId: z.number().int(),
  title: z.string(),
  user: z.string(),
  repo: z.string(),
  branch: z.string(),
  revision: z.string(),
  state: z.string(),
  tags: z.array(z.string()),
  reviewId: z.number().int().nullable(),
  description: z.string(),
  created: z.number(),
  modified: z.number()
});

const PushListResponseSchema = z.object({
  pushes: z.array(PushSummarySchema),
  totalCount: z.number().int().nonnegative(),
  window: z.object({
    rpp: z.number().int().positive(),
    offset: z.number().int().nonnegative()
  }),
  filter: z.object({
    state: z.enum(PUSH_STATE_OPTIONS).optional(),
    user: z.string().optional()
  })
});

const PushItemsResponseSchema = z.object({
  pushId: z.number().int(),
  items: z.array(PushItemSchema)
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
    .join("; ");
}

export async function listPushes(query: ListQuery): Promise<PushListResponse> {
  const payload = await fetchJson(`/pushes?${toListSearchParams(query).toString()}`, {
    headers: {
      Accept: "application/json"
    }
  });

  const parsed = PushListResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new DashboardApiError(BACKEND_UNAVAILABLE, `malformed push listing (${describeIssues(parsed.error)})`);
  }

  return parsed.data;
}

/** One request per call; callers own caching and single-flight. */
export async function loadPushItems(pushId: number): Promise<PushItem[]> {
  const payload = await fetchJson("/pushitems", {
    method: "POST",
    headers: {
      Accept: "application/json",
      "Content-Type": "application/x-www-form-urlencoded"
    },
    body: new URLSearchParams({ push: String(pushId) }).toString()
  });

  const parsed = PushItemsResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new DashboardApiError(
      BACKEND_UNAVAILABLE,
      `malformed item list for push ${pushId} (${describeIssues(parsed.error)})`
    );
  }

  if (parsed.data.pushId !== pushId) {
    throw new DashboardApiError(BACKEND_UNAVAILABLE, `malformed item list for push ${pushId}`);
  }

  return parsed.data.items;
}
