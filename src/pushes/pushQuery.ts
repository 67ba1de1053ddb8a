import { backendUnavailable, invalidFilter, invalidWindow } from "./errors";
import type { PushStore } from "./store";
import { isPushState, type FilterState, type PageWindow, type PushPage } from "./types";

export interface PushQueryOptions {
  store: PushStore;
  maxRpp: number;
}

export interface ListQueryDefaults {
  rpp: number;
}

function parseNonNegativeInt(raw: string, name: string): number {
  if (!/^\d+$/.test(raw)) {
    throw invalidWindow(`${name} must be a non-negative integer`, { [name]: raw });
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw invalidWindow(`${name} is out of range`, { [name]: raw });
  }

  return parsed;
}

/**
 * Reads `rpp`, `offset`, `state` and `user` from a query string. An empty
 * `state` or `user` means "no restriction"; anything else is passed through
 * unchanged so that validation rejects it instead of widening the filter.
 */
export function parseListQuery(
  params: URLSearchParams,
  defaults: ListQueryDefaults
): { filter: FilterState; window: PageWindow } {
  const rawRpp = params.get("rpp");
  const rawOffset = params.get("offset");
  const rawState = params.get("state");
  const rawUser = params.get("user");

  const filter: FilterState = {};
  if (rawState !== null && rawState !== "") {
    if (!isPushState(rawState)) {
      throw invalidFilter(`state must be accepting|live|discarded, got '${rawState.slice(0, 40)}'`, { state: rawState });
    }
    filter.state = rawState;
  }

  if (rawUser !== null && rawUser !== "") {
    filter.user = rawUser;
  }

  return {
    filter,
    window: {
      rpp: rawRpp === null || rawRpp === "" ? defaults.rpp : parseNonNegativeInt(rawRpp, "rpp"),
      offset: rawOffset === null || rawOffset === "" ? 0 : parseNonNegativeInt(rawOffset, "offset")
    }
  };
}

export function validateFilter(filter: FilterState): void {
  if (filter.state !== undefined && !isPushState(filter.state)) {
    throw invalidFilter(`state must be accepting|live|discarded, got '${String(filter.state).slice(0, 40)}'`);
  }

  if (filter.user !== undefined && filter.user.length === 0) {
    throw invalidFilter("user must be omitted rather than empty");
  }
}

export function validateWindow(window: PageWindow, maxRpp: number): void {
  if (!Number.isInteger(window.rpp) || window.rpp <= 0) {
    throw invalidWindow("rpp must be a positive integer", { rpp: window.rpp });
  }

  if (window.rpp > maxRpp) {
    throw invalidWindow(`rpp must be <= ${maxRpp}`, { rpp: window.rpp });
  }

  if (!Number.isInteger(window.offset) || window.offset < 0) {
    throw invalidWindow("offset must be a non-negative integer", { offset: window.offset });
  }
}

export class PushQuery {
  private readonly store: PushStore;
  private readonly maxRpp: number;

  constructor(options: PushQueryOptions) {
    this.store = options.store;
    this.maxRpp = options.maxRpp;
  }

  async list(filter: FilterState, window: PageWindow): Promise<PushPage> {
    validateFilter(filter);
    validateWindow(window, this.maxRpp);

    try {
      const [totalCount, pushes] = await Promise.all([
        this.store.countPushes(filter),
        this.store.listPushes(filter, window)
      ]);

      return {
        pushes: pushes.slice(0, window.rpp),
        totalCount
      };
    } catch (error) {
      throw backendUnavailable(error);
    }
  }
}
