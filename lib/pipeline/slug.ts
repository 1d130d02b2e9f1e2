import path from "node:path";

/**
 * Output-artifact key for a source file: extension dropped, lowercased,
 * each run of whitespace or hyphens collapsed to one underscore.
 */
export function normalizeFilename(fileName: string): string {
  const base = path.basename(fileName, path.extname(fileName));
  return base.toLowerCase().replace(/[\s-]+/g, "_");
}

export function preprocessedFileName(fileName: string): string {
  return `${normalizeFilename(fileName)}_preprocessed.jpg`;
}
