export * from "./binary";
export * from "./context";
export * from "./decoder";
export * from "./errors";
export * from "./feature-flags";
export * from "./format";
export * from "./logger";
export * from "./reflection";
export * from "./tables/function-table";
export * from "./tables/index-table";
export * from "./tables/resource-table";
export * from "./tables/string-table";
export * from "./validation";
export * from "./views/function-view";
export * from "./views/resource-view";
