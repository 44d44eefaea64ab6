export interface LocatedElement {
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  click(): Promise<void>;
  fill(value: string): Promise<void>;
  press(key: "Enter"): Promise<void>;
}

export interface DetailPage {
  url: string;
  html: string;
}

/**
 * Everything the harvester needs from a browser. The pipeline only talks to
 * this surface, so tests drive it with an in-process fake.
 */
export interface BrowserDriver {
  open(url: string): Promise<void>;
  navigate(url: string): Promise<void>;
  locate(selector: string): Promise<LocatedElement | undefined>;
  /** Resolves false when the selector is still absent after `timeoutMs`. */
  waitFor(selector: string, timeoutMs: number): Promise<boolean>;
  content(): Promise<string>;
  currentUrl(): string;
  /** Loads a URL in a separate tab so the result list stays where it is. */
  openInNewContext(url: string): Promise<DetailPage>;
  /** Cookie and user-agent headers of the live session, for direct transfers. */
  sessionHeaders(): Promise<Record<string, string>>;
  screenshot(): Promise<Uint8Array>;
  close(): Promise<void>;
}

export interface DriverLaunchOptions {
  headless: boolean;
  executablePath?: string;
  userAgent: string;
  navigationTimeoutMs: number;
}

export type DriverFactory = (options: DriverLaunchOptions) => Promise<BrowserDriver>;
