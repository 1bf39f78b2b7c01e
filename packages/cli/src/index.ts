/**
 * treefs - interactive front ends for an in-memory file tree
 */

// Terminal front ends
export * from "./ui/index.js";

// Configuration
export * from "./config/index.js";

// Trace output and entry point
export * from "./cli/index.js";
