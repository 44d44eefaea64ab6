export type HarvestErrorCode =
  | "page_load_timeout"
  | "empty_result_page"
  | "session_failure"
  | "search_submission_failed"
  | "transfer_failed";

export class HarvestError extends Error {
  readonly code: HarvestErrorCode;

  constructor(code: HarvestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The result container did not show up within the page-load timeout. */
export class PageLoadTimeoutError extends HarvestError {
  constructor(
    readonly pageNumber: number,
    readonly timeoutMs: number,
  ) {
    super("page_load_timeout", `result list for page ${pageNumber} not present after ${timeoutMs}ms`);
  }
}

/** The result container rendered but no row could be read from it yet. */
export class EmptyResultPageError extends HarvestError {
  constructor(readonly pageNumber: number) {
    super("empty_result_page", `no result rows on page ${pageNumber}`);
  }
}

/** Fatal for the run: the browser session could not be opened or stopped responding. */
export class SessionFailureError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("session_failure", message, options);
  }
}

export class SearchSubmissionError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("search_submission_failed", message, options);
  }
}

export class TransferError extends HarvestError {
  constructor(
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super("transfer_failed", message, options);
  }
}

const SESSION_LOST_PATTERN = /target closed|session closed|browser has disconnected|connection closed|not connected/i;

/** True when the browser session itself is gone, as opposed to a page element misbehaving. */
export function isSessionLost(error: unknown): boolean {
  if (error instanceof SessionFailureError) {
    return true;
  }
  return error instanceof Error && (error.name === "TargetCloseError" || SESSION_LOST_PATTERN.test(error.message));
}
