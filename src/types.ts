import type { ConversionError } from "./lib/errors";

export type TargetFormat = "webp" | "avif";
export type ResizeMode = "original" | "specify";

export interface EncodeSettings {
  lossless: boolean;
  quality: number;
  resizeMode: ResizeMode;
  width: number;
  height: number;
}

export interface SettingsDocument {
  webp: EncodeSettings;
  avif: EncodeSettings;
  outputFolderPath: string | null;
  batchFolderPath: string | null;
}

/** On-disk shape of the settings file. */
export interface StoredEncodeSettings {
  lossless: boolean;
  quality: number;
  resize_mode: ResizeMode;
  width: number;
  height: number;
}

export interface StoredSettingsDocument {
  webp_settings: StoredEncodeSettings;
  avif_settings: StoredEncodeSettings;
  output_folder_path: string | null;
  batch_folder_path: string | null;
}

export type SettingsLoadStatus = "loaded" | "not-found" | "invalid";

export interface LoadSettingsResult {
  document: SettingsDocument;
  status: SettingsLoadStatus;
}

export interface DecodedImage {
  data: Buffer;
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
}

export interface ConversionJob {
  outputDir: string;
  format: TargetFormat;
  settings: EncodeSettings;
}

export interface ProgressEvent {
  current: number;
  total: number;
  message: string;
}

export type ProgressListener = (event: ProgressEvent) => void;

export interface FileError {
  path: string;
  message: string;
}

export interface BatchResult {
  total: number;
  successes: number;
  failures: number;
  perFileErrors: FileError[];
  outputs: string[];
  cancelled: boolean;
}

export type BatchSummaryKind = "all-succeeded" | "mixed" | "all-failed";

export interface ConvertSuccess {
  ok: true;
  outputPath: string;
}

export interface ConvertFailure {
  ok: false;
  error: ConversionError;
}

export type ConvertResult = ConvertSuccess | ConvertFailure;

export type BatchOutcome =
  | { kind: "completed"; result: BatchResult }
  | { kind: "nothing-to-convert"; folder: string }
  | { kind: "failed"; error: ConversionError };

export interface ConvertOneRequest {
  sourcePath: string | null | undefined;
  outputDir: string | null | undefined;
  format: TargetFormat;
  settings: EncodeSettings;
  onProgress?: ProgressListener;
}

export interface ConvertBatchRequest {
  folder: string | null | undefined;
  outputDir: string | null | undefined;
  format: TargetFormat;
  settings: EncodeSettings;
  onProgress?: ProgressListener;
  signal?: AbortSignal;
}
