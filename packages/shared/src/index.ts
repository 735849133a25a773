// Re-export all types and utilities
export * from "./types/common";
export * from "./types/csr";
export * from "./types/api";
export * from "./constants";
export * from "./utils";
export * from "./services/logger";
