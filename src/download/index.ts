export * from "./downloader";
export * from "./fileNames";
