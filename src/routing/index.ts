/**
 * Routing Module
 *
 * Everything that decides what a free-text message means and where it goes.
 */

export * from "./actions.js";
export * from "./intent.js";
export * from "./query-processor.js";
export * from "./router.js";
export * from "./prompt-enhancer.js";
