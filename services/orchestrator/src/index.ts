/**
 * @tradeflow/orchestrator — Trading cycle state machine
 */
export {
  TradingCycleOrchestrator,
  formatCycleId,
  summarizeCycle,
  phaseBudgetMs,
  type OrchestratorConfig,
  type OrchestratorDeps,
  type EndpointResolver,
  type TriggerResult,
  type BeginResult,
  type CycleStartedEvent,
  type CycleStartedListener,
  type CurrentCycleView,
} from "./service.js";
export { StageClient, type StageCall } from "./stage-client.js";
export {
  PHASE_ROUTES,
  parsePhaseResponse,
  countItems,
  metricContribution,
  type PhaseOutput,
  type PhaseRoute,
  type ItemCounts,
  type Security,
  type PatternResult,
  type TechnicalResult,
  type TradeSignal,
  type TradeResult,
} from "./phases.js";
