/**
 * Route barrel.
 */

export { createHealthRoutes } from "./health.js";
export { createTransferRoutes } from "./transfers.js";
export { createEnvelopeRoutes } from "./envelopes.js";
export { createLinkRoutes } from "./link.js";
export { createAdminRoutes } from "./admin.js";
export { createEventRoutes } from "./events.js";
export { createBalanceRoutes } from "./balances.js";
