export { Database } from "./database";
export type { DatabaseOptions, RunResult, SqlValue } from "./database";
export { MigrationManager, migrations } from "./migrations";
export type { Migration } from "./migrations";
export * from "./errors";
export * from "./schema";
export * from "./models";
