/**
 * @tradeflow/registry — Stage service endpoints and health
 */
export {
  ServiceRegistry,
  DEFAULT_SERVICE_PORTS,
  serviceUrl,
  nextHealth,
  type RegistryConfig,
  type RegistryDeps,
  type PollReport,
} from "./service.js";
export { probeHealth, type ProbeResult } from "./health.js";
