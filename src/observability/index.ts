export * from "./types";
export * from "./logger";
export * from "./writers";
export * from "./metrics";
export * from "./runId";
