import { enumerateImageFiles, notifyListener, runBatch } from "./lib/batch";
import { convertFile } from "./lib/convert";
import { CodecUnavailableError, ConversionError, PrerequisiteError } from "./lib/errors";
import { formatProgressMessage, mapFsOrSharpErrorToMessage, toErrorMessage } from "./lib/format";
import { Logger, defaultLogger } from "./lib/logger";
import { isSupportedInputExtension, normalizeExtension } from "./lib/pathing";
import { CodecLoader, SharpFactory, loadSharp } from "./lib/sharp-loader";
import type { BatchOutcome, ConvertBatchRequest, ConvertOneRequest, ConvertResult } from "./types";

export interface ConversionServiceOptions {
  loadCodec?: CodecLoader;
  logger?: Logger;
  /** Files converted at once during a batch. Defaults to 1. */
  concurrency?: number;
}

function requirePath(value: string | null | undefined, message: string): string {
  if (!value || !value.trim()) throw new PrerequisiteError(message);
  return value;
}

function toConversionError(error: unknown): ConversionError {
  if (error instanceof ConversionError) return error;
  return new ConversionError("encode", mapFsOrSharpErrorToMessage(error, "Conversion failed (unknown error)"), {
    cause: error,
  });
}

/** Entry point for callers: one file or one folder per call. */
export class ConversionService {
  private readonly loadCodec: CodecLoader;
  private readonly logger: Logger;
  private readonly concurrency: number;

  constructor(options: ConversionServiceOptions = {}) {
    this.loadCodec = options.loadCodec ?? loadSharp;
    this.logger = options.logger ?? defaultLogger;
    this.concurrency = options.concurrency ?? 1;
  }

  async convertOne(request: ConvertOneRequest): Promise<ConvertResult> {
    try {
      const sourcePath = requirePath(request.sourcePath, "No source image selected");
      const outputDir = requirePath(request.outputDir, "No output folder selected");

      const ext = normalizeExtension(sourcePath);
      if (!isSupportedInputExtension(ext)) {
        throw new PrerequisiteError(
          ext ? `Unsupported format: ${ext}` : "Missing file extension; cannot identify image format",
        );
      }

      const sharp = await this.requireCodec();
      const outputPath = await convertFile(
        sharp,
        sourcePath,
        { outputDir, format: request.format, settings: { ...request.settings } },
        this.logger,
      );

      notifyListener(
        request.onProgress,
        { current: 1, total: 1, message: formatProgressMessage(1, 1, sourcePath) },
        this.logger,
        "progress",
      );
      this.logger.info(`converted ${sourcePath} -> ${outputPath}`);
      return { ok: true, outputPath };
    } catch (error) {
      const conversionError = toConversionError(error);
      this.logger.error(`conversion failed: ${conversionError.message}`);
      return { ok: false, error: conversionError };
    }
  }

  async convertBatch(request: ConvertBatchRequest): Promise<BatchOutcome> {
    let folder: string;
    let paths: string[];
    let sharp: SharpFactory;
    let outputDir: string;

    try {
      folder = requirePath(request.folder, "No batch folder selected");
      outputDir = requirePath(request.outputDir, "No output folder selected");
      sharp = await this.requireCodec();
      paths = await enumerateImageFiles(folder);
    } catch (error) {
      const conversionError = toConversionError(error);
      this.logger.error(`batch not started: ${conversionError.message}`);
      return { kind: "failed", error: conversionError };
    }

    if (paths.length === 0) {
      this.logger.info(`no convertible images in ${folder}`);
      return { kind: "nothing-to-convert", folder };
    }

    const result = await runBatch(
      sharp,
      paths,
      { outputDir, format: request.format, settings: { ...request.settings } },
      {
        onProgress: request.onProgress,
        signal: request.signal,
        concurrency: this.concurrency,
        logger: this.logger,
      },
    );

    this.logger.info(
      `batch finished in ${outputDir}: ${result.successes} succeeded, ${result.failures} failed` +
        (result.cancelled ? " (cancelled)" : ""),
    );
    return { kind: "completed", result };
  }

  private async requireCodec(): Promise<SharpFactory> {
    try {
      return await this.loadCodec();
    } catch (error) {
      if (error instanceof CodecUnavailableError) throw error;
      throw new CodecUnavailableError(`Image codec is unavailable: ${toErrorMessage(error, "unknown error")}`, error);
    }
  }
}
