export * from "./lib/exit-codes";
export * from "./lib/termination";
