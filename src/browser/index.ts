export * from "./types";
export { openPuppeteerSession, PuppeteerDriver } from "./puppeteerDriver";
