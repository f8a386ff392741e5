export * from "./logging";
export * from "./format";
export * from "./validation";
