export * from "./lib/log";
export * from "./lib/fatal-error";
