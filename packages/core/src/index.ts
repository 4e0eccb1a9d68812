export * from "./cache";
export * from "./config";
export * from "./db";
export * from "./isbns";
export * from "./logging";
export * from "./pipeline";
export * from "./records/dates";
export * from "./records/export";
export * from "./records/normalize";
export * from "./records/table";
export * from "./records/types";
export * from "./report/format";
export * from "./sources";
export * from "./stats";
