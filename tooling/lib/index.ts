/**
 * Central export point for the tooling modules
 */

export * from "./config";
export * from "./registry";
export * from "./audit";
export * from "./cli";
