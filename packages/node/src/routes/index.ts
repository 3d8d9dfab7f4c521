/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createInvoiceRoutes } from "./invoices.js";
export { createAdminRoutes } from "./admin.js";
export { createEventRoutes } from "./events.js";
export { createBalanceRoutes } from "./balances.js";
