export { createMarketplace, Marketplace, type MarketplaceOptions } from "./market/marketplace.js";
export {
  DEFAULT_SETTINGS,
  marketSettingsFromConfig,
  validateSettings,
  type AssignmentPolicyName,
  type MarketContext,
  type MarketSettings
} from "./market/settings.js";
export * from "./core/errors.js";
export { systemClock, type Clock } from "./core/clock.js";
export { withConflictRetry } from "./core/async.js";
export {
  commissionFor,
  parseCommissionTiers,
  splitEvenly,
  type CommissionPolicy,
  type CommissionTier
} from "./ledger/commission.js";
export type { BalanceChange, BalanceMismatch, Settlement } from "./ledger/engine.js";
export type {
  Assignee,
  CancelOrderInput,
  CompletedOrder,
  CreateOrderInput,
  StaleOrderQuery
} from "./orders/lifecycle.js";
export { canTransition, type OrderEvent } from "./orders/transitions.js";
export type { AssignResult } from "./assignment/engine.js";
export { activeRestriction, isRestricted, type Restriction } from "./reputation/tracker.js";
export type { MonthlyReport } from "./reports/monthly.js";
export type { BalanceListing } from "./reports/roster.js";
export { MemoryStore } from "./db/memoryStore.js";
export { PgStore } from "./db/pgStore.js";
export type * from "./db/store.js";
export * from "./db/types.js";
