export { GcraBucket, validateQuota, type Quota } from "./gcra.js";
export { jitterDelay, type Jitter, type RateLimitMethod, type RateLimitOptions } from "./policy.js";
export { chatKey, chatUserKey, formatChatKey, formatChatUserKey, formatUserKey, userKey } from "./keys.js";
export { DirectRateLimitPredicate } from "./direct.js";
export { KeyedRateLimitPredicate } from "./keyed.js";
