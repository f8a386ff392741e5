// Export the configuration store
export * from "./store";

// Export database, models and schema types
export * from "./database";

// Export configuration
export * from "./config/paths";

// Export utilities
export * from "./utils";
