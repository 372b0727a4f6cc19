export { DefaultStatusCache } from "./cache";
export type { DefaultBrowserInfo, DefaultStatusCacheOptions } from "./cache";
