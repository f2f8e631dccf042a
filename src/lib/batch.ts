import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { runWithConcurrency } from "./concurrency";
import { convertFile } from "./convert";
import { ConversionError, EnumerationError } from "./errors";
import { formatProgressMessage, mapFsOrSharpErrorToMessage, toErrorMessage } from "./format";
import { Logger, defaultLogger } from "./logger";
import { isSupportedInputPath } from "./pathing";
import type { SharpFactory } from "./sharp-loader";
import type { BatchResult, ConversionJob, ProgressListener } from "../types";

export type BatchState =
  | { phase: "processing"; index: number; total: number }
  | { phase: "done"; result: BatchResult };

export interface RunBatchOptions {
  onProgress?: ProgressListener;
  onStateChange?: (state: BatchState) => void;
  signal?: AbortSignal;
  /** Files converted at once. Defaults to 1. */
  concurrency?: number;
  logger?: Logger;
}

type FileOutcome = { ok: true; outputPath: string } | { ok: false; errorMessage: string };

function byCodeUnit(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

async function isFileOrLinkToFile(folder: string, entry: Dirent): Promise<boolean> {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return (await stat(path.join(folder, entry.name))).isFile();
  } catch {
    // dangling link
    return false;
  }
}

/**
 * Lists the convertible files directly inside `folder`, sorted by name.
 * Symbolic links count when they resolve to a regular file.
 * An empty array means nothing matched; an unreadable folder rejects.
 */
export async function enumerateImageFiles(folder: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(folder, { withFileTypes: true });
  } catch (error) {
    throw new EnumerationError(
      `Cannot read folder: ${mapFsOrSharpErrorToMessage(error, "unknown error")}`,
      folder,
      error,
    );
  }

  const candidates = entries.filter((entry) => isSupportedInputPath(entry.name));
  const keep = await Promise.all(candidates.map((entry) => isFileOrLinkToFile(folder, entry)));

  return candidates
    .filter((_, index) => keep[index])
    .map((entry) => entry.name)
    .sort(byCodeUnit)
    .map((name) => path.join(folder, name));
}

function describeFailure(error: unknown): string {
  if (error instanceof ConversionError) return error.message;
  return mapFsOrSharpErrorToMessage(error, "Conversion failed (unknown error)");
}

/** Listener failures are logged; they never stop the batch. */
export function notifyListener<T>(
  listener: ((value: T) => void) | undefined,
  value: T,
  logger: Logger,
  label: string,
): void {
  if (!listener) return;
  try {
    listener(value);
  } catch (error) {
    logger.warn(`${label} listener failed: ${toErrorMessage(error, "unknown error")}`);
  }
}

export async function runBatch(
  sharp: SharpFactory,
  paths: readonly string[],
  job: ConversionJob,
  options: RunBatchOptions = {},
): Promise<BatchResult> {
  const { onProgress, onStateChange, signal, concurrency = 1, logger = defaultLogger } = options;
  const total = paths.length;
  const outcomes = Array.from<FileOutcome | undefined>({ length: total });
  let completed = 0;

  await runWithConcurrency(
    paths,
    concurrency,
    async (sourcePath, index) => {
      notifyListener(onStateChange, { phase: "processing", index, total }, logger, "state");

      let outcome: FileOutcome;
      try {
        outcome = { ok: true, outputPath: await convertFile(sharp, sourcePath, job, logger) };
      } catch (error) {
        outcome = { ok: false, errorMessage: describeFailure(error) };
        logger.warn(`failed to convert ${sourcePath}: ${outcome.errorMessage}`);
      }
      outcomes[index] = outcome;
      completed += 1;

      notifyListener(
        onProgress,
        {
          current: completed,
          total,
          message: formatProgressMessage(completed, total, sourcePath, outcome.ok ? null : outcome.errorMessage),
        },
        logger,
        "progress",
      );
      await yieldToEventLoop();
    },
    signal,
  );

  const result: BatchResult = {
    total,
    successes: 0,
    failures: 0,
    perFileErrors: [],
    outputs: [],
    cancelled: completed < total,
  };

  outcomes.forEach((outcome, index) => {
    if (!outcome) return;
    if (outcome.ok) {
      result.successes += 1;
      result.outputs.push(outcome.outputPath);
    } else {
      result.failures += 1;
      result.perFileErrors.push({ path: paths[index], message: outcome.errorMessage });
    }
  });

  notifyListener(onStateChange, { phase: "done", result }, logger, "state");
  return result;
}
