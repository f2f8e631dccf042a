import { toErrorMessage } from "./format";
import { Logger, defaultLogger } from "./logger";
import {
  loadSettingsDocument,
  normalizeEncodeSettings,
  normalizeOptionalPath,
  saveSettingsDocument,
} from "./settings";
import type { EncodeSettings, SettingsDocument, SettingsLoadStatus, TargetFormat } from "../types";

function cloneDocument(document: SettingsDocument): SettingsDocument {
  return {
    webp: { ...document.webp },
    avif: { ...document.avif },
    outputFolderPath: document.outputFolderPath,
    batchFolderPath: document.batchFolderPath,
  };
}

/**
 * Owns the live settings document. Every mutation goes through `update`, which
 * writes the file straight away; `close` writes it once more.
 */
export class SettingsSession {
  private current: SettingsDocument;

  private constructor(
    readonly filePath: string,
    document: SettingsDocument,
    readonly loadStatus: SettingsLoadStatus,
    private readonly logger: Logger,
  ) {
    this.current = document;
  }

  static async open(filePath: string, options?: { logger?: Logger }): Promise<SettingsSession> {
    const logger = options?.logger ?? defaultLogger;
    const { document, status } = await loadSettingsDocument(filePath, logger);
    return new SettingsSession(filePath, document, status, logger);
  }

  get document(): SettingsDocument {
    return cloneDocument(this.current);
  }

  settingsFor(format: TargetFormat): EncodeSettings {
    return { ...this.current[format] };
  }

  /** Resolves `false` when the write failed; the in-memory change is kept either way. */
  async update(mutate: (draft: SettingsDocument) => void): Promise<boolean> {
    const draft = cloneDocument(this.current);
    mutate(draft);
    // Malformed fields fall back to the last accepted value.
    this.current = {
      webp: normalizeEncodeSettings(draft.webp, this.current.webp),
      avif: normalizeEncodeSettings(draft.avif, this.current.avif),
      outputFolderPath: normalizeOptionalPath(draft.outputFolderPath),
      batchFolderPath: normalizeOptionalPath(draft.batchFolderPath),
    };
    return this.flush();
  }

  async close(): Promise<boolean> {
    return this.flush();
  }

  private async flush(): Promise<boolean> {
    try {
      await saveSettingsDocument(this.filePath, this.current);
      return true;
    } catch (error) {
      this.logger.error(toErrorMessage(error, "Failed to save settings"));
      return false;
    }
  }
}
