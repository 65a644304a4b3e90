export { createActivityLogService, describeActivity, MAX_ACTIVITY_ENTRIES } from "./ActivityLogService.js";
export type { ActivityLogPort } from "./port.js";
export { createInMemoryActivityLogPort } from "./port.js";
export type { ActivityAction, ActivityEntry, ActivityLogChangedHandler, ActivityLogService } from "./types.js";
