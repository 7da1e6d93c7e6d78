/**
 * @sealbox/shared - Shared types, error taxonomy and constants
 */

// Export all types
export * from "./types/index.js";

// Export error classes
export * from "./errors.js";

// Export constants
export * from "./constants.js";
