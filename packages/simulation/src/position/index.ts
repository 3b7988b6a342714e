/**
 * Position Module
 * ===============
 * Account state and rebalance planning.
 */

export {
  PortfolioTracker,
  type PortfolioTrackerOptions,
  type RebalanceProposal,
} from './portfolio-tracker.js';
export {
  planOrders,
  type OrderQuote,
  type QuoteFn,
  type PlanContext,
  type PlannedOrder,
  type OrderPlan,
} from './rebalance.js';
