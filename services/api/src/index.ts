/**
 * @tradeflow/api — HTTP surface and process wiring
 */
export { buildServer, SERVICE_NAME, type ApiDeps } from "./server.js";
export { createCoordinator, type Coordinator, type CoordinatorOverrides } from "./bootstrap.js";
