export { ActivityTracker } from "./tracker";
export type { ActivityTrackerOptions, TickResult } from "./tracker";
