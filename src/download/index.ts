export * from "./documentLinks";
export * from "./downloader";
export * from "./filename";
