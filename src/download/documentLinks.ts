import { load } from "cheerio";
import { DocumentPattern } from "../config";
import { DocumentKind } from "../types";

export interface DocumentLink {
  url: string;
  kind: DocumentKind;
}

/**
 * Decides which links point at a downloadable document. Portal markup drifts,
 * so the rule is swappable rather than baked into the downloader.
 */
export interface DocumentLinkStrategy {
  readonly name: string;
  classify(url: string): DocumentKind | undefined;
  findLink(html: string, baseUrl: string): DocumentLink | undefined;
}

interface CompiledPattern {
  kind: DocumentKind;
  regex: RegExp;
}

export function createPatternLinkStrategy(patterns: DocumentPattern[]): DocumentLinkStrategy {
  const compiled: CompiledPattern[] = patterns.map((entry) => ({ kind: entry.kind, regex: new RegExp(entry.pattern, "i") }));

  const classify = (url: string): DocumentKind | undefined => compiled.find((entry) => entry.regex.test(url))?.kind;

  return {
    name: "url-pattern",
    classify,
    findLink(html: string, baseUrl: string): DocumentLink | undefined {
      const $ = load(html);
      for (const anchor of $("a[href]").toArray()) {
        const href = $(anchor).attr("href");
        if (!href) {
          continue;
        }

        let url: string;
        try {
          url = new URL(href, baseUrl).toString();
        } catch {
          continue;
        }

        const kind = classify(url);
        if (kind) {
          return { url, kind };
        }
      }
      return undefined;
    },
  };
}

const HTML_MARKERS = ["<html", "<!doctype html", "<head", "<body", "来源应用不正确"];

/** `%PDF` magic wins; an HTML body is an error page; anything else keeps the link's kind. */
export function sniffDocument(body: Uint8Array, hint: DocumentKind): DocumentKind | "html" {
  const head = Buffer.from(body.subarray(0, 512));
  if (head.subarray(0, 4).toString("latin1") === "%PDF") {
    return "pdf";
  }

  const snippet = head.toString("utf-8").trimStart().toLowerCase();
  if (HTML_MARKERS.some((marker) => snippet.includes(marker))) {
    return "html";
  }
  return hint;
}
