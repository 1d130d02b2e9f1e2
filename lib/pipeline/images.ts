import fs from "node:fs";
import path from "node:path";
import { ConfigurationError } from "../errors";

const IMAGE_EXTENSIONS = ["png", "jpg", "jpeg"];

/**
 * List the image files of a directory, sorted by name so the processing
 * order does not depend on the platform's directory enumeration.
 */
export function listImageFiles(dir: string): string[] {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new ConfigurationError(`Image folder not found: ${dir}`);
  }
  const files = fs
    .readdirSync(dir)
    .filter((f) => IMAGE_EXTENSIONS.some((ext) => f.toLowerCase().endsWith(ext)))
    .sort();
  if (files.length === 0) {
    throw new ConfigurationError(
      `No images found in the '${path.basename(dir)}' folder.`
    );
  }
  return files;
}

export function mediaTypeFor(fileName: string): string {
  return path.extname(fileName).toLowerCase() === ".png"
    ? "image/png"
    : "image/jpeg";
}

export function toDataUri(fileName: string, bytes: Buffer): string {
  return `data:${mediaTypeFor(fileName)};base64,${bytes.toString("base64")}`;
}
