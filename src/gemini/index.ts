/**
 * Gemini Module
 */

export * from "./types.js";
export * from "./gemini-client.js";
