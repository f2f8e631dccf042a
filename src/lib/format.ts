import path from "node:path";
import type { BatchResult, BatchSummaryKind, TargetFormat } from "../types";

export function toErrorMessage(error: unknown, fallback: string): string {
  if (error instanceof Error && error.message.trim()) return error.message.trim();
  if (typeof error === "string" && error.trim()) return error.trim();
  return fallback;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  const { code } = error;
  return typeof code === "string" ? code : undefined;
}

export function mapFsOrSharpErrorToMessage(error: unknown, fallback: string): string {
  const message = toErrorMessage(error, fallback);
  const code = errorCode(error);

  if (code === "ENOENT") return "File does not exist or was moved";
  if (code === "EACCES" || code === "EPERM") return "No write permission";
  if (code === "EISDIR") return "Not a file; cannot convert";
  if (code === "ENOSPC") return "No space left on device";
  if (/unsupported image format/i.test(message)) return "Image cannot be parsed or format is unsupported";
  if (/Input file is missing/i.test(message)) return "File does not exist or was moved";
  if (/VipsJpeg|corrupt|bad seek|Premature end/i.test(message)) return "Image cannot be parsed or is corrupted";

  return message || fallback;
}

export function formatLabelForTargetFormat(format: TargetFormat): string {
  switch (format) {
    case "webp":
      return "WebP";
    case "avif":
      return "AVIF";
  }
}

export function summarizeBatch(result: BatchResult): BatchSummaryKind {
  if (result.failures === 0) return "all-succeeded";
  if (result.successes === 0) return "all-failed";
  return "mixed";
}

export function formatBatchSummary(result: BatchResult): string {
  const tally = `${result.successes} succeeded, ${result.failures} failed`;
  const prefix = result.cancelled ? "Batch cancelled" : "Batch complete";

  switch (summarizeBatch(result)) {
    case "all-succeeded":
      return result.cancelled ? `${prefix}: ${tally}` : `${prefix}: all ${result.successes} converted`;
    case "all-failed":
      return `${prefix}: ${tally} (nothing converted)`;
    case "mixed":
      return `${prefix}: ${tally}`;
  }
}

export function formatProgressMessage(
  current: number,
  total: number,
  filePath: string,
  errorMessage?: string | null,
): string {
  const name = path.basename(filePath);
  if (errorMessage) return `Failed ${current}/${total}: ${name} (${errorMessage})`;
  return `Converted ${current}/${total}: ${name}`;
}
