export * from "./lib/binary-search-tree";
export * from "./lib/traverse";
export * from "./lib/visualize";
