import path from "node:path";
import type { TargetFormat } from "../types";

export const SUPPORTED_INPUT_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".bmp", ".gif"]);

export function normalizeExtension(filePath: string): string | null {
  const ext = path.extname(filePath).toLowerCase();
  return ext ? ext : null;
}

export function isSupportedInputExtension(ext: string | null): boolean {
  return Boolean(ext && SUPPORTED_INPUT_EXTENSIONS.has(ext));
}

export function isSupportedInputPath(filePath: string): boolean {
  return isSupportedInputExtension(normalizeExtension(filePath));
}

export function targetFormatToCanonicalExtension(format: TargetFormat): string {
  switch (format) {
    case "webp":
      return ".webp";
    case "avif":
      return ".avif";
  }
}

/**
 * Joins the source's base name (extension stripped, case kept) with `newExtension`
 * under `outputDir`. No filesystem access.
 */
export function resolveOutputPath(sourcePath: string, outputDir: string, newExtension: string): string {
  const sourceBaseName = path.basename(sourcePath, path.extname(sourcePath));
  return path.join(outputDir, `${sourceBaseName}${newExtension}`);
}
