export * from "./htmlParser";
export * from "./searchApi";
export * from "./locator";
export * from "./assetResolver";
