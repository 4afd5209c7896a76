/**
 * @tradeflow/scheduler — Timed cycle triggering
 */
export {
  TradingScheduler,
  type SchedulerConfig,
  type SchedulerDeps,
  type CycleSource,
  type TickOutcome,
} from "./service.js";
