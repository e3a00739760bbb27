export * from "./client.js";
export * from "./proxy.js";
export * from "./values.js";
