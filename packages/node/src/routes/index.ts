/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createWalletRoutes } from "./wallet.js";
export { createVestingRoutes } from "./vesting.js";
export { createTokenRoutes } from "./tokens.js";
export { createEventRoutes } from "./events.js";
