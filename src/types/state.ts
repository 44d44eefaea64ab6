import { PaperRecord } from "./models";

export interface CrawlState {
  readonly query: string;
  readonly targetCount: number;
  readonly maxPages: number;
  readonly collected: readonly PaperRecord[];
  readonly currentPage: number;
}

export function createCrawlState(query: string, targetCount: number, maxPages: number): CrawlState {
  if (!Number.isInteger(targetCount) || targetCount < 1) {
    throw new Error(`targetCount must be a positive integer, got ${targetCount}`);
  }
  if (!Number.isInteger(maxPages) || maxPages < 1) {
    throw new Error(`maxPages must be a positive integer, got ${maxPages}`);
  }
  return { query, targetCount, maxPages, collected: [], currentPage: 1 };
}

export function quotaReached(state: CrawlState): boolean {
  return state.collected.length >= state.targetCount;
}

export function appendRecord(state: CrawlState, record: PaperRecord): CrawlState {
  if (quotaReached(state)) {
    throw new Error(`quota of ${state.targetCount} already reached`);
  }
  if (record.title.trim() === "") {
    throw new Error("records without a title are never collected");
  }
  return { ...state, collected: [...state.collected, record] };
}

export function advancePage(state: CrawlState): CrawlState {
  if (state.currentPage > state.maxPages) {
    throw new Error(`page ${state.currentPage} is already past the cap of ${state.maxPages}`);
  }
  return { ...state, currentPage: state.currentPage + 1 };
}
