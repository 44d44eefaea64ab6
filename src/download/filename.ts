import fs from "node:fs";
import path from "node:path";
import { DocumentKind } from "../types";

export const DOCUMENT_EXTENSIONS: Record<DocumentKind, string> = {
  pdf: ".pdf",
  caj: ".caj",
};

const MAX_BASENAME_LENGTH = 100;

export function sanitizeFilename(title: string): string {
  const cleaned = title
    .replace(/[\\/:*?"<>|\r\n]+/g, "_")
    .replace(/^[\s.]+|[\s.]+$/g, "");
  if (!cleaned) {
    return "unnamed";
  }
  return cleaned.slice(0, MAX_BASENAME_LENGTH);
}

/** Path of a non-empty file already saved under `baseName` with any known extension. */
export function findExistingDocument(dir: string, baseName: string): string | undefined {
  for (const extension of Object.values(DOCUMENT_EXTENSIONS)) {
    const candidate = path.join(dir, `${baseName}${extension}`);
    if (fs.existsSync(candidate) && fs.statSync(candidate).size > 0) {
      return candidate;
    }
  }
  return undefined;
}
