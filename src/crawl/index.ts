export * from "./extractor";
export * from "./orchestrator";
export { Paginator } from "./paginator";
export type { PaginatorDeps } from "./paginator";
export { submitSearch } from "./search";
