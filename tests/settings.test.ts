import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PersistenceError } from "../src/lib/errors";
import {
  SETTINGS_FILE_NAME,
  createDefaultSettingsDocument,
  loadSettingsDocument,
  normalizeEncodeSettings,
  resolveSettingsFilePath,
  saveSettingsDocument,
} from "../src/lib/settings";
import type { SettingsDocument } from "../src/types";
import { createTempDir, createTestLogger, removeDir } from "./helpers";

describe("settings store", () => {
  let dir: string;
  let settingsPath: string;

  beforeEach(async () => {
    dir = await createTempDir();
    settingsPath = path.join(dir, SETTINGS_FILE_NAME);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("returns defaults when the file does not exist", async () => {
    const logger = createTestLogger();
    const { document, status } = await loadSettingsDocument(settingsPath, logger);

    expect(status).toBe("not-found");
    expect(document).toEqual({
      webp: { lossless: false, quality: 90, resizeMode: "original", width: 1280, height: 720 },
      avif: { lossless: false, quality: 70, resizeMode: "original", width: 1280, height: 720 },
      outputFolderPath: null,
      batchFolderPath: null,
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("returns defaults and warns on malformed JSON", async () => {
    await writeFile(settingsPath, "{ not json");
    const logger = createTestLogger();

    const { document, status } = await loadSettingsDocument(settingsPath, logger);

    expect(status).toBe("invalid");
    expect(document).toEqual(createDefaultSettingsDocument());
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("treats a non-object root as invalid", async () => {
    await writeFile(settingsPath, "[1, 2, 3]");
    const { document, status } = await loadSettingsDocument(settingsPath, createTestLogger());

    expect(status).toBe("invalid");
    expect(document).toEqual(createDefaultSettingsDocument());
  });

  it("keeps avif defaults when only webp settings are stored", async () => {
    await writeFile(
      settingsPath,
      JSON.stringify({
        webp_settings: { lossless: true, quality: 55, resize_mode: "specify", width: 800, height: 600 },
        output_folder_path: "/exports",
        unknown_key: 1,
      }),
    );

    const { document, status } = await loadSettingsDocument(settingsPath, createTestLogger());

    expect(status).toBe("loaded");
    expect(document.webp).toEqual({ lossless: true, quality: 55, resizeMode: "specify", width: 800, height: 600 });
    expect(document.avif).toEqual(createDefaultSettingsDocument().avif);
    expect(document.outputFolderPath).toBe("/exports");
  });

  it("merges nested settings field by field", async () => {
    await writeFile(settingsPath, JSON.stringify({ avif_settings: { quality: 33, resize_mode: "bogus" } }));

    const { document } = await loadSettingsDocument(settingsPath, createTestLogger());

    expect(document.avif).toEqual({ lossless: false, quality: 33, resizeMode: "original", width: 1280, height: 720 });
  });

  it("drops a remembered batch folder that no longer exists", async () => {
    const existing = path.join(dir, "photos");
    await mkdir(existing);
    await writeFile(settingsPath, JSON.stringify({ batch_folder_path: existing }));
    expect((await loadSettingsDocument(settingsPath, createTestLogger())).document.batchFolderPath).toBe(existing);

    await writeFile(settingsPath, JSON.stringify({ batch_folder_path: path.join(dir, "gone") }));
    expect((await loadSettingsDocument(settingsPath, createTestLogger())).document.batchFolderPath).toBeNull();
  });

  it("round-trips a saved document", async () => {
    const batchFolder = path.join(dir, "batch");
    await mkdir(batchFolder);
    const document: SettingsDocument = {
      webp: { lossless: true, quality: 12, resizeMode: "specify", width: 640, height: 480 },
      avif: { lossless: false, quality: 81, resizeMode: "original", width: 1920, height: 1080 },
      outputFolderPath: path.join(dir, "out"),
      batchFolderPath: batchFolder,
    };

    await saveSettingsDocument(settingsPath, document);
    const { document: loaded } = await loadSettingsDocument(settingsPath, createTestLogger());

    expect(loaded).toEqual(document);
  });

  it("writes all four keys with snake_case names and nulls", async () => {
    await saveSettingsDocument(settingsPath, createDefaultSettingsDocument());
    const raw = await readFile(settingsPath, "utf8");

    expect(JSON.parse(raw)).toEqual({
      webp_settings: { lossless: false, quality: 90, resize_mode: "original", width: 1280, height: 720 },
      avif_settings: { lossless: false, quality: 70, resize_mode: "original", width: 1280, height: 720 },
      output_folder_path: null,
      batch_folder_path: null,
    });
    expect(raw.split("\n")[1]).toBe('  "webp_settings": {');
  });

  it("rejects with PersistenceError when the file cannot be written", async () => {
    const target = path.join(dir, "missing-dir", SETTINGS_FILE_NAME);

    await expect(saveSettingsDocument(target, createDefaultSettingsDocument())).rejects.toBeInstanceOf(
      PersistenceError,
    );
  });
});

describe("normalizeEncodeSettings", () => {
  const defaults = createDefaultSettingsDocument().webp;

  it("clamps and rounds numbers", () => {
    expect(normalizeEncodeSettings({ quality: 140, width: 0, height: 99.6 }, defaults)).toEqual({
      ...defaults,
      quality: 100,
      width: 1,
      height: 100,
    });
  });

  it("ignores values of the wrong type", () => {
    expect(normalizeEncodeSettings({ lossless: "yes", quality: "abc", width: true }, defaults)).toEqual(defaults);
  });
});

describe("resolveSettingsFilePath", () => {
  it("places the file beside the install directory", () => {
    expect(resolveSettingsFilePath("/opt/converter", {})).toBe(path.join("/opt/converter", SETTINGS_FILE_NAME));
  });

  it("honors the environment override", () => {
    expect(resolveSettingsFilePath("/opt/converter", { IMAGE_CONVERTER_SETTINGS: "/etc/converter.json" })).toBe(
      path.resolve("/etc/converter.json"),
    );
  });
});
