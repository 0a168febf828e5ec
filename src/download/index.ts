export * from "./downloader";
