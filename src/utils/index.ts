/**
 * Utilities Module
 */

export { debug, logger, setDebugEnabled, isDebugEnabled, errorMessage } from "./debug.js";
export type { DebugLogger } from "./debug.js";
