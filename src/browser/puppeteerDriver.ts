import puppeteer, { TimeoutError, type Browser, type ElementHandle, type Page } from "puppeteer-core";
import { SessionFailureError } from "../core/errors";
import { BrowserDriver, DetailPage, DriverLaunchOptions, LocatedElement } from "./types";

export const DEFAULT_VIEWPORT = { width: 1366, height: 900 };

const LAUNCH_ARGS = ["--no-sandbox", "--disable-setuid-sandbox", "--disable-dev-shm-usage", "--disable-gpu"];

class PuppeteerElement implements LocatedElement {
  constructor(private readonly handle: ElementHandle<Element>) {}

  async text(): Promise<string> {
    return this.handle.evaluate((el) => el.textContent ?? "");
  }

  async attribute(name: string): Promise<string | null> {
    return this.handle.evaluate((el, attr) => el.getAttribute(attr), name);
  }

  async click(): Promise<void> {
    await this.handle.click();
  }

  async fill(value: string): Promise<void> {
    await this.handle.evaluate((el) => {
      if (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) {
        el.value = "";
      }
    });
    await this.handle.type(value, { delay: 20 });
  }

  async press(key: "Enter"): Promise<void> {
    await this.handle.press(key);
  }
}

export class PuppeteerDriver implements BrowserDriver {
  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly options: DriverLaunchOptions,
  ) {}

  async open(url: string): Promise<void> {
    await this.navigate(url);
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: this.options.navigationTimeoutMs });
  }

  async locate(selector: string): Promise<LocatedElement | undefined> {
    const handle = await this.page.$(selector);
    return handle ? new PuppeteerElement(handle) : undefined;
  }

  async waitFor(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { timeout: timeoutMs });
      return true;
    } catch (error) {
      if (error instanceof TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  currentUrl(): string {
    return this.page.url();
  }

  async openInNewContext(url: string): Promise<DetailPage> {
    const tab = await this.browser.newPage();
    try {
      await tab.setUserAgent(this.options.userAgent);
      await tab.goto(url, { waitUntil: "domcontentloaded", timeout: this.options.navigationTimeoutMs });
      return { url: tab.url(), html: await tab.content() };
    } finally {
      await tab.close();
    }
  }

  async sessionHeaders(): Promise<Record<string, string>> {
    const cookies = await this.page.cookies();
    const headers: Record<string, string> = { "user-agent": this.options.userAgent };
    if (cookies.length > 0) {
      headers.cookie = cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join("; ");
    }
    return headers;
  }

  async screenshot(): Promise<Uint8Array> {
    return this.page.screenshot({ fullPage: true });
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
    await this.browser.close();
  }
}

export async function openPuppeteerSession(options: DriverLaunchOptions): Promise<BrowserDriver> {
  let browser: Browser;
  try {
    browser = await puppeteer.launch({
      headless: options.headless,
      executablePath: options.executablePath,
      args: LAUNCH_ARGS,
    });
  } catch (error) {
    throw new SessionFailureError(
      `browser launch failed${options.executablePath ? "" : " (set CHROME_PATH to a Chrome or Chromium binary)"}`,
      { cause: error },
    );
  }

  try {
    const page = await browser.newPage();
    await page.setUserAgent(options.userAgent);
    await page.setViewport(DEFAULT_VIEWPORT);
    page.setDefaultTimeout(options.navigationTimeoutMs);
    return new PuppeteerDriver(browser, page, options);
  } catch (error) {
    await browser.close();
    throw new SessionFailureError("browser page setup failed", { cause: error });
  }
}
