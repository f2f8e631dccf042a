export { ConversionService } from "./conversion-service";
export type { ConversionServiceOptions } from "./conversion-service";
export { enumerateImageFiles, runBatch } from "./lib/batch";
export type { BatchState, RunBatchOptions } from "./lib/batch";
export { convertFile } from "./lib/convert";
export { AVIF_LOSSLESS_QUALITY, AVIF_SPEED, WEBP_EFFORT, buildEncodeOptions, encodeImage } from "./lib/encode";
export type { EncodeOptions } from "./lib/encode";
export * from "./lib/errors";
export { formatBatchSummary, formatProgressMessage, summarizeBatch } from "./lib/format";
export { decodeImage, resizeImage } from "./lib/image";
export { createConsoleLogger, defaultLogger, silentLogger } from "./lib/logger";
export type { Logger } from "./lib/logger";
export {
  SUPPORTED_INPUT_EXTENSIONS,
  isSupportedInputExtension,
  resolveOutputPath,
  targetFormatToCanonicalExtension,
} from "./lib/pathing";
export {
  createDefaultEncodeSettings,
  createDefaultSettingsDocument,
  loadSettingsDocument,
  resolveSettingsFilePath,
  saveSettingsDocument,
} from "./lib/settings";
export { SettingsSession } from "./lib/settings-session";
export { loadSharp } from "./lib/sharp-loader";
export type { CodecLoader, SharpFactory } from "./lib/sharp-loader";
export type * from "./types";
