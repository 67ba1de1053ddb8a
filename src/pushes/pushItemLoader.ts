import { PushDashboardError, backendUnavailable, pushNotFound } from "./errors";
import type { PushStore } from "./store";
import type { PushItem } from "./types";

export function parsePushId(raw: string | null): number {
  const trimmed = raw?.trim() ?? "";
  if (!/^\d+$/.test(trimmed)) {
    throw new PushDashboardError("E_PUSH_ID_INVALID", "push must be a positive integer", { push: raw });
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new PushDashboardError("E_PUSH_ID_INVALID", "push must be a positive integer", { push: raw });
  }

  return parsed;
}

/**
 * Loads the full item list of one push. Holds no cache and never retries;
 * the dashboard's expansion controller owns both concerns.
 */
export class PushItemLoader {
  constructor(private readonly store: PushStore) {}

  async loadItems(pushId: number): Promise<PushItem[]> {
    if (!Number.isSafeInteger(pushId) || pushId <= 0) {
      throw new PushDashboardError("E_PUSH_ID_INVALID", "push must be a positive integer", { push: pushId });
    }

    try {
      const push = await this.store.getPush(pushId);
      if (!push) {
        throw pushNotFound(pushId);
      }

      return await this.store.listItems(pushId);
    } catch (error) {
      throw backendUnavailable(error);
    }
  }
}
