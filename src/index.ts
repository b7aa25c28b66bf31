export {
  EntsoeClient,
  borderPairs,
  type EntsoeClientOptions,
  type FetchOptions,
  type PsrFetchOptions,
} from "./client/client.js";
export { DOCUMENT_FAMILIES, getDocumentFamily, isDocumentFamilyName } from "./client/families.js";
export type { DocumentFamily } from "./client/families.js";
export { planQuery, createQuery, splitWindows, type QueryPlan } from "./client/planner.js";
export {
  RateLimiter,
  backoffDelay,
  systemClock,
  type Clock,
  type RateLimiterOptions,
  type RateLimitSlot,
} from "./client/rate-limiter.js";
export {
  HttpTransport,
  DEFAULT_RETRY_POLICY,
  type FetchFn,
  type RetryPolicy,
  type Transport,
} from "./client/transport.js";
export { loadConfig, type EntsoeConfig } from "./config.js";
export {
  CodeRegistry,
  getDefaultRegistry,
  loadRegistry,
  type RegistryEntry,
  type RegistryKind,
} from "./registry/codes.js";
export * from "./errors.js";
export type * from "./types/index.js";
