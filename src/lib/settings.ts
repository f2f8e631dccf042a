import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { PersistenceError } from "./errors";
import { mapFsOrSharpErrorToMessage, toErrorMessage } from "./format";
import { Logger, defaultLogger } from "./logger";
import { writeViaTempFile } from "./write";
import type {
  EncodeSettings,
  LoadSettingsResult,
  ResizeMode,
  SettingsDocument,
  StoredEncodeSettings,
  StoredSettingsDocument,
  TargetFormat,
} from "../types";

export const SETTINGS_FILE_NAME = "image_converter_settings.json";
export const SETTINGS_PATH_ENV = "IMAGE_CONVERTER_SETTINGS";

const VALID_RESIZE_MODES = new Set<string>(["original", "specify"]);

const DEFAULT_QUALITY: Record<TargetFormat, number> = {
  webp: 90,
  avif: 70,
};

export function createDefaultEncodeSettings(format: TargetFormat): EncodeSettings {
  return {
    lossless: false,
    quality: DEFAULT_QUALITY[format],
    resizeMode: "original",
    width: 1280,
    height: 720,
  };
}

export function createDefaultSettingsDocument(): SettingsDocument {
  return {
    webp: createDefaultEncodeSettings("webp"),
    avif: createDefaultEncodeSettings("avif"),
    outputFolderPath: null,
    batchFolderPath: null,
  };
}

export function clampNumber(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isResizeMode(value: unknown): value is ResizeMode {
  return typeof value === "string" && VALID_RESIZE_MODES.has(value);
}

function normalizeInteger(value: unknown, fallback: number, min: number, max: number): number {
  if (value == null || typeof value === "boolean") return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.round(clampNumber(parsed, min, max));
}

export function normalizeOptionalPath(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value : null;
}

/**
 * Applies whichever fields `input` carries over `defaults`; anything missing or
 * malformed keeps the default. Accepts both the stored (`resize_mode`) and the
 * in-memory (`resizeMode`) key.
 */
export function normalizeEncodeSettings(input: unknown, defaults: EncodeSettings): EncodeSettings {
  if (!isRecord(input)) return { ...defaults };

  const resizeModeInput = "resize_mode" in input ? input.resize_mode : input.resizeMode;

  return {
    lossless: typeof input.lossless === "boolean" ? input.lossless : defaults.lossless,
    quality: normalizeInteger(input.quality, defaults.quality, 0, 100),
    resizeMode: isResizeMode(resizeModeInput) ? resizeModeInput : defaults.resizeMode,
    width: normalizeInteger(input.width, defaults.width, 1, Number.MAX_SAFE_INTEGER),
    height: normalizeInteger(input.height, defaults.height, 1, Number.MAX_SAFE_INTEGER),
  };
}

export function normalizeSettingsDocument(input: unknown): SettingsDocument {
  const defaults = createDefaultSettingsDocument();
  if (!isRecord(input)) return defaults;

  return {
    webp: normalizeEncodeSettings(input.webp_settings, defaults.webp),
    avif: normalizeEncodeSettings(input.avif_settings, defaults.avif),
    outputFolderPath: normalizeOptionalPath(input.output_folder_path),
    batchFolderPath: normalizeOptionalPath(input.batch_folder_path),
  };
}

function toStoredEncodeSettings(settings: EncodeSettings): StoredEncodeSettings {
  return {
    lossless: settings.lossless,
    quality: settings.quality,
    resize_mode: settings.resizeMode,
    width: settings.width,
    height: settings.height,
  };
}

export function serializeSettingsDocument(document: SettingsDocument): string {
  const stored: StoredSettingsDocument = {
    webp_settings: toStoredEncodeSettings(document.webp),
    avif_settings: toStoredEncodeSettings(document.avif),
    output_folder_path: document.outputFolderPath,
    batch_folder_path: document.batchFolderPath,
  };
  return JSON.stringify(stored, null, 2);
}

async function isDirectory(folderPath: string): Promise<boolean> {
  try {
    return (await stat(folderPath)).isDirectory();
  } catch {
    return false;
  }
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

export function resolveSettingsFilePath(baseDir: string, env: NodeJS.ProcessEnv = process.env): string {
  const override = env[SETTINGS_PATH_ENV];
  if (override && override.trim()) return path.resolve(override);
  return path.join(baseDir, SETTINGS_FILE_NAME);
}

/** Never rejects: a missing or unreadable file yields the defaults. */
export async function loadSettingsDocument(
  filePath: string,
  logger: Logger = defaultLogger,
): Promise<LoadSettingsResult> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      logger.info(`settings file not found, using defaults: ${filePath}`);
      return { document: createDefaultSettingsDocument(), status: "not-found" };
    }
    logger.warn(`failed to read settings file ${filePath}: ${toErrorMessage(error, "unknown error")}`);
    return { document: createDefaultSettingsDocument(), status: "invalid" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn(`settings file is not valid JSON, using defaults: ${toErrorMessage(error, "parse error")}`);
    return { document: createDefaultSettingsDocument(), status: "invalid" };
  }

  if (!isRecord(parsed)) {
    logger.warn(`settings file does not contain a JSON object, using defaults: ${filePath}`);
    return { document: createDefaultSettingsDocument(), status: "invalid" };
  }

  const document = normalizeSettingsDocument(parsed);
  if (document.batchFolderPath && !(await isDirectory(document.batchFolderPath))) {
    logger.info(`remembered batch folder no longer exists: ${document.batchFolderPath}`);
    document.batchFolderPath = null;
  }

  return { document, status: "loaded" };
}

export async function saveSettingsDocument(filePath: string, document: SettingsDocument): Promise<void> {
  try {
    await writeViaTempFile(filePath, serializeSettingsDocument(document));
  } catch (error) {
    throw new PersistenceError(
      `Failed to save settings: ${mapFsOrSharpErrorToMessage(error, "write failed")}`,
      filePath,
      error,
    );
  }
}
