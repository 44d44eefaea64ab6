import { load } from "cheerio";
import { PortalSelectors } from "../config";
import { createRecord, DetailHandle, ExtractedRow, RenderedPage } from "../types";

export interface ExtractionTally {
  seen: number;
  skipped: number;
}

const AUTHOR_SEPARATORS = /[;；,]/;

export function createTally(): ExtractionTally {
  return { seen: 0, skipped: 0 };
}

function normalizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function splitAuthors(raw: string): string[] {
  return raw
    .split(AUTHOR_SEPARATORS)
    .map((entry) => normalizeText(entry))
    .filter((entry) => entry.length > 0);
}

function resolveHref(href: string | undefined, baseUrl: string): string | undefined {
  if (!href || href.trim() === "" || href.startsWith("#")) {
    return undefined;
  }
  try {
    const resolved = new URL(href.trim(), baseUrl);
    return resolved.protocol === "http:" || resolved.protocol === "https:" ? resolved.toString() : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Walks the result rows of one rendered page. The generator is single-use:
 * rows are read in page order and the tally is filled in as it goes.
 */
export function* extractRecords(
  page: RenderedPage,
  selectors: PortalSelectors,
  tally: ExtractionTally = createTally(),
): Generator<ExtractedRow, ExtractionTally, undefined> {
  const $ = load(page.html);
  const titleSelector = selectors.titleLinks.find((selector) => $(selector).length > 0);
  if (!titleSelector) {
    return tally;
  }

  for (const element of $(titleSelector).toArray()) {
    tally.seen += 1;
    const link = $(element);
    const title = normalizeText(link.text()) || normalizeText(link.attr("title") ?? "");
    if (!title) {
      tally.skipped += 1;
      continue;
    }

    let scope = link.closest(selectors.row);
    if (scope.length === 0) {
      scope = link.closest("li, article, div");
    }

    const authorNames = scope
      .find(selectors.authorLinks)
      .toArray()
      .map((anchor) => normalizeText($(anchor).text()));
    const rawAuthors = authorNames.length > 0 ? authorNames.join(";") : scope.find(selectors.authorCell).first().text();
    const pubDate = normalizeText(scope.find(selectors.dateCell).first().text());

    let href: string | undefined;
    for (const selector of selectors.downloadLinks) {
      href = resolveHref(scope.find(selector).first().attr("href"), page.url);
      if (href) {
        break;
      }
    }
    if (!href) {
      href = resolveHref(link.attr("href"), page.url);
    }

    const detail: DetailHandle | undefined = href ? { href, referer: page.url, title } : undefined;
    yield {
      record: createRecord({ title, authors: splitAuthors(rawAuthors), pubDate, page: page.pageNumber }),
      detail,
    };
  }

  return tally;
}
