import type { DashboardError, PushItem } from "./types";

export type PushLoadState = "NOT_LOADED" | "LOADING" | "LOADED_VISIBLE" | "LOADED_HIDDEN";

export interface PushExpansion {
  status: PushLoadState;
  items: PushItem[] | null;
  error: DashboardError | null;
}

export interface ExpansionState {
  pushes: ReadonlyMap<number, PushExpansion>;
  extendedItems: ReadonlySet<number>;
}

export type ExpansionAction =
  | { type: "TOGGLE"; pushId: number }
  | { type: "EXPAND_ALL"; pushIds: readonly number[] }
  | { type: "COLLAPSE_ALL" }
  | { type: "LOAD_SUCCEEDED"; pushId: number; items: PushItem[] }
  | { type: "LOAD_FAILED"; pushId: number; error: DashboardError }
  | { type: "TOGGLE_EXTENDED"; itemId: number }
  | { type: "RESET" };

export const NOT_LOADED: PushExpansion = {
  status: "NOT_LOADED",
  items: null,
  error: null
};

export const initialExpansionState: ExpansionState = {
  pushes: new Map(),
  extendedItems: new Set()
};

export function getPushExpansion(state: ExpansionState, pushId: number): PushExpansion {
  return state.pushes.get(pushId) ?? NOT_LOADED;
}

export function affordanceLabel(status: PushLoadState): string {
  switch (status) {
    case "NOT_LOADED":
      return "Load";
    case "LOADING":
      return "Loading...";
    case "LOADED_VISIBLE":
      return "Hide";
    case "LOADED_HIDDEN":
      return "Show";
  }
}

function withPush(state: ExpansionState, pushId: number, entry: PushExpansion): ExpansionState {
  const pushes = new Map(state.pushes);
  pushes.set(pushId, entry);
  return { ...state, pushes };
}

function expandOne(entry: PushExpansion): PushExpansion {
  if (entry.status === "NOT_LOADED") {
    return { status: "LOADING", items: null, error: null };
  }

  if (entry.status === "LOADED_HIDDEN") {
    return { ...entry, status: "LOADED_VISIBLE" };
  }

  return entry;
}

export function expansionReducer(state: ExpansionState, action: ExpansionAction): ExpansionState {
  switch (action.type) {
    case "TOGGLE": {
      const entry = getPushExpansion(state, action.pushId);
      if (entry.status === "LOADING") {
        return state;
      }

      if (entry.status === "LOADED_VISIBLE") {
        return withPush(state, action.pushId, { ...entry, status: "LOADED_HIDDEN" });
      }

      return withPush(state, action.pushId, expandOne(entry));
    }

    case "EXPAND_ALL": {
      let changed = false;
      const pushes = new Map(state.pushes);
      for (const pushId of action.pushIds) {
        const entry = getPushExpansion(state, pushId);
        const next = expandOne(entry);
        if (next !== entry) {
          pushes.set(pushId, next);
          changed = true;
        }
      }

      return changed ? { ...state, pushes } : state;
    }

    case "COLLAPSE_ALL": {
      let changed = false;
      const pushes = new Map(state.pushes);
      for (const [pushId, entry] of state.pushes) {
        if (entry.status === "LOADED_VISIBLE") {
          pushes.set(pushId, { ...entry, status: "LOADED_HIDDEN" });
          changed = true;
        }
      }

      return changed ? { ...state, pushes } : state;
    }

    case "LOAD_SUCCEEDED": {
      if (getPushExpansion(state, action.pushId).status !== "LOADING") {
        return state;
      }

      return withPush(state, action.pushId, {
        status: "LOADED_VISIBLE",
        items: action.items,
        error: null
      });
    }

    case "LOAD_FAILED": {
      if (getPushExpansion(state, action.pushId).status !== "LOADING") {
        return state;
      }

      return withPush(state, action.pushId, {
        status: "NOT_LOADED",
        items: null,
        error: action.error
      });
    }

    case "TOGGLE_EXTENDED": {
      const extendedItems = new Set(state.extendedItems);
      if (extendedItems.has(action.itemId)) {
        extendedItems.delete(action.itemId);
      } else {
        extendedItems.add(action.itemId);
      }

      return { ...state, extendedItems };
    }

    case "RESET":
      return initialExpansionState;
  }
}

export type ItemFetcher = (pushId: number) => Promise<PushItem[]>;

function toLoadError(error: unknown): DashboardError {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    const message = error instanceof Error ? error.message.replace(/^[A-Z0-9_]+:\s*/, "") : error.code;
    return { code: error.code, message: message.slice(0, 260) };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { code: "E_PUSH_BACKEND_UNAVAILABLE", message: message.slice(0, 260) };
}

/**
 * Owns per-push load and visibility state for one page. A fetch is issued
 * only on the NOT_LOADED -> LOADING edge, so each push has at most one
 * request in flight and loaded items are never requested again.
 */
export class ExpansionController {
  private state: ExpansionState = initialExpansionState;
  private generation = 0;
  private readonly listeners = new Set<() => void>();
  private readonly inFlight = new Map<number, Promise<void>>();

  constructor(private readonly fetchItems: ItemFetcher) {}

  getSnapshot = (): ExpansionState => this.state;

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  toggle(pushId: number): void {
    this.dispatch({ type: "TOGGLE", pushId });
  }

  expandAll(pushIds: readonly number[]): void {
    this.dispatch({ type: "EXPAND_ALL", pushIds });
  }

  collapseAll(): void {
    this.dispatch({ type: "COLLAPSE_ALL" });
  }

  toggleExtended(itemId: number): void {
    this.dispatch({ type: "TOGGLE_EXTENDED", itemId });
  }

  /** Drops all state; results of fetches issued before the reset are ignored. */
  reset(): void {
    this.generation += 1;
    this.inFlight.clear();
    this.dispatch({ type: "RESET" });
  }

  /**
   * Resolves once every fetch currently in flight has settled. The UI never
   * waits on loads; this is the hook tests use to observe a finished fetch.
   */
  async settled(): Promise<void> {
    await Promise.all(this.inFlight.values());
  }

  private dispatch(action: ExpansionAction): void {
    const previous = this.state;
    const next = expansionReducer(previous, action);
    if (next === previous) {
      return;
    }

    this.state = next;
    for (const [pushId, entry] of next.pushes) {
      if (entry.status === "LOADING" && getPushExpansion(previous, pushId).status !== "LOADING") {
        this.startFetch(pushId);
      }
    }

    for (const listener of this.listeners) {
      listener();
    }
  }

  private startFetch(pushId: number): void {
    const generation = this.generation;
    const request = this.fetchItems(pushId).then(
      (items) => {
        if (generation === this.generation) {
          this.dispatch({ type: "LOAD_SUCCEEDED", pushId, items });
        }
      },
      (error: unknown) => {
        if (generation === this.generation) {
          this.dispatch({ type: "LOAD_FAILED", pushId, error: toLoadError(error) });
        }
      }
    );

    const tracked = request.finally(() => {
      if (this.inFlight.get(pushId) === tracked) {
        this.inFlight.delete(pushId);
      }
    });
    this.inFlight.set(pushId, tracked);
  }
}
