export { OriginModel } from "./origin";
export type { CreateOriginData } from "./origin";

export { CacheRuleModel } from "./cache-rule";
export type { CreateCacheRuleData } from "./cache-rule";

export { PurgeEventModel } from "./purge-event";
export type { CreatePurgeEventData } from "./purge-event";
