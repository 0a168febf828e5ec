export * from "./types";
export * from "./loadConfig";
export * from "./credentials";
