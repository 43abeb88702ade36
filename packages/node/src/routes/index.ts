/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createDiscoveryRoutes } from "./discovery.js";
export { createJournalRoutes } from "./journal.js";
