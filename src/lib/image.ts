import { readFile } from "node:fs/promises";
import bmp from "bmp-js";
import { DecodeError, ResizeError } from "./errors";
import { mapFsOrSharpErrorToMessage, toErrorMessage } from "./format";
import { Logger, defaultLogger } from "./logger";
import { normalizeExtension } from "./pathing";
import type { SharpFactory } from "./sharp-loader";
import type { DecodedImage, EncodeSettings } from "../types";

export function copyImage(image: DecodedImage): DecodedImage {
  return { ...image, data: Buffer.from(image.data) };
}

export function openRawPipeline(sharp: SharpFactory, image: DecodedImage) {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });
}

/** bmp-js hands back 4 bytes per pixel in A, B, G, R order with an unreliable alpha byte. */
function abgrToRgb(abgr: Buffer, pixelCount: number): Buffer {
  const rgb = Buffer.alloc(pixelCount * 3);
  for (let pixel = 0; pixel < pixelCount; pixel += 1) {
    rgb[pixel * 3] = abgr[pixel * 4 + 3];
    rgb[pixel * 3 + 1] = abgr[pixel * 4 + 2];
    rgb[pixel * 3 + 2] = abgr[pixel * 4 + 1];
  }
  return rgb;
}

async function decodeBmp(sourcePath: string): Promise<DecodedImage> {
  let buffer: Buffer;
  try {
    buffer = await readFile(sourcePath);
  } catch (error) {
    throw new DecodeError(mapFsOrSharpErrorToMessage(error, "Decode failed (unknown error)"), sourcePath, error);
  }

  try {
    const bitmap = bmp.decode(buffer);
    const pixelCount = bitmap.width * bitmap.height;
    if (pixelCount <= 0 || bitmap.data.length < pixelCount * 4) {
      throw new Error(`unexpected bitmap size ${bitmap.width}x${bitmap.height}`);
    }
    return { data: abgrToRgb(bitmap.data, pixelCount), width: bitmap.width, height: bitmap.height, channels: 3 };
  } catch (error) {
    throw new DecodeError("Image cannot be parsed or is corrupted", sourcePath, error);
  }
}

/**
 * Decodes the first frame of `sourcePath` into raw pixels, honoring EXIF orientation.
 * BMP goes through bmp-js since libvips ships without a BMP loader.
 */
export async function decodeImage(sharp: SharpFactory, sourcePath: string): Promise<DecodedImage> {
  if (normalizeExtension(sourcePath) === ".bmp") return decodeBmp(sourcePath);

  try {
    const { data, info } = await sharp(sourcePath).rotate().raw().toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height, channels: info.channels };
  } catch (error) {
    throw new DecodeError(mapFsOrSharpErrorToMessage(error, "Decode failed (unknown error)"), sourcePath, error);
  }
}

/**
 * Returns a new image sized exactly `width`×`height` when the resize mode is
 * `specify`, otherwise a copy of `image`. A failed resize falls back to the copy.
 */
export async function resizeImage(
  sharp: SharpFactory,
  image: DecodedImage,
  settings: EncodeSettings,
  logger: Logger = defaultLogger,
): Promise<DecodedImage> {
  if (settings.resizeMode !== "specify") return copyImage(image);

  try {
    const { data, info } = await openRawPipeline(sharp, image)
      .resize(settings.width, settings.height, { fit: "fill", kernel: "lanczos3" })
      .raw()
      .toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height, channels: info.channels };
  } catch (error) {
    const resizeError = new ResizeError(
      `Resize to ${settings.width}x${settings.height} failed, keeping original size: ${toErrorMessage(error, "unknown error")}`,
      error,
    );
    logger.warn(resizeError.message);
    return copyImage(image);
  }
}
