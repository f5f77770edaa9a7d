/**
 * NotebookLM Module
 */

export * from "./selectors.js";
export * from "./stable-text.js";
export * from "./browser-session.js";
export * from "./notebook-client.js";
