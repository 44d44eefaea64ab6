import { BrowserDriver, LocatedElement } from "../browser";
import { AppConfig } from "../config";
import { SearchSubmissionError, SessionFailureError } from "../core/errors";
import { errorMessage, Logger } from "../observability";

async function locateFirst(
  driver: BrowserDriver,
  selectors: string[],
): Promise<{ selector: string; element: LocatedElement } | undefined> {
  for (const selector of selectors) {
    const element = await driver.locate(selector);
    if (element) {
      return { selector, element };
    }
  }
  return undefined;
}

/**
 * Opens the portal home page and submits the keyword. Falls back to pressing
 * Enter in the input when no search button matches.
 */
export async function submitSearch(driver: BrowserDriver, query: string, config: AppConfig, logger: Logger): Promise<void> {
  try {
    await driver.open(config.portalUrl);
  } catch (error) {
    throw new SessionFailureError(`portal ${config.portalUrl} could not be opened: ${errorMessage(error)}`, { cause: error });
  }

  const input = await locateFirst(driver, config.selectors.searchInputs);
  if (!input) {
    throw new SearchSubmissionError(`no search input matched on ${driver.currentUrl()}`);
  }

  try {
    await input.element.fill(query);
    const button = await locateFirst(driver, config.selectors.searchButtons);
    if (button) {
      await button.element.click();
    } else {
      logger.warn("search_button_missing_pressing_enter", { selector: input.selector });
      await input.element.press("Enter");
    }
  } catch (error) {
    throw new SearchSubmissionError(`search for "${query}" could not be submitted: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  logger.info("search_submitted", { query, input: input.selector });
}
