export { runCli } from "./cli";
export { runSeedCommand } from "./commands/seed";
export { runServeCommand } from "./commands/serve";
export { DEFAULT_DASHBOARD_CONFIG, loadDashboardConfig, parseDashboardConfig } from "./config/dashboardConfig";
export { startDashboardServer } from "./dashboard/server";
export { PushDashboardError, isPushDashboardError } from "./pushes/errors";
export { loadPushFixture, parsePushFixture } from "./pushes/fixture";
export { parseNewPushForm } from "./pushes/newPush";
export { PushItemLoader, parsePushId } from "./pushes/pushItemLoader";
export { PushQuery, parseListQuery, validateFilter, validateWindow } from "./pushes/pushQuery";
export { SqlitePushStore } from "./pushes/store";
export { PUSH_STATES, PUSH_TYPES, isPushState, isPushType } from "./pushes/types";

export type { DashboardConfig, ResolvedDashboardConfig } from "./config/dashboardConfig";
export type { DashboardServerHandle, StartDashboardServerOptions } from "./dashboard/server";
export type { DashboardError } from "./dashboard/types";
export type { PushDashboardErrorCode } from "./pushes/errors";
export type { PushFixture, PushFixtureInput } from "./pushes/fixture";
export type { PushStore, SqlitePushStoreOptions } from "./pushes/store";
export type {
  FilterState,
  NewPushFields,
  PageWindow,
  PushItem,
  PushItemsResponse,
  PushListResponse,
  PushPage,
  PushState,
  PushStateError,
  PushSummary,
  PushType
} from "./pushes/types";
