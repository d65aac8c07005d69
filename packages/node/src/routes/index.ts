/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createMetricsRoute } from "./metrics.js";
export { createAssetRoutes } from "./assets.js";
export { createValuationRoutes } from "./valuation.js";
export { createLimitRoutes } from "./limits.js";
export { createRoleRoutes } from "./roles.js";
export { createMovementRoutes } from "./movements.js";
export { createAccountRoutes } from "./accounts.js";
export { createEventRoutes } from "./events.js";
