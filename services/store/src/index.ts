/**
 * @tradeflow/store — Durable coordinator state on Supabase
 */
export {
  CoordinationStore,
  SCHEDULE_CONFIG_KEY,
  type LockClaim,
  type ServiceHealthPatch,
  type CycleMetricsPatch,
} from "./store.js";
