import { useSyncExternalStore } from "react";

import type { ExpansionController, ExpansionState } from "./expansion";

export function useExpansion(controller: ExpansionController): ExpansionState {
  return useSyncExternalStore(controller.subscribe, controller.getSnapshot, controller.getSnapshot);
}
