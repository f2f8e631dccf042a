import type sharp from "sharp";
import { EncodeError } from "./errors";
import { mapFsOrSharpErrorToMessage } from "./format";
import { openRawPipeline } from "./image";
import type { SharpFactory } from "./sharp-loader";
import type { DecodedImage, EncodeSettings, TargetFormat } from "../types";

/** sharp's highest WebP effort, the counterpart of libwebp method 6. */
export const WEBP_EFFORT = 6;
/** AVIF speed on the 0 (slowest) to 10 (fastest) scale. */
export const AVIF_SPEED = 5;
/** Quality that stands in for lossless AVIF. */
export const AVIF_LOSSLESS_QUALITY = 100;

const SHARP_AVIF_MAX_EFFORT = 9;

export function avifSpeedToEffort(speed: number): number {
  return Math.round(((10 - speed) * SHARP_AVIF_MAX_EFFORT) / 10);
}

export type EncodeOptions =
  | { format: "webp"; options: sharp.WebpOptions }
  | { format: "avif"; options: sharp.AvifOptions };

export function buildEncodeOptions(format: TargetFormat, settings: EncodeSettings): EncodeOptions {
  switch (format) {
    case "webp": {
      const options: sharp.WebpOptions = { lossless: settings.lossless, effort: WEBP_EFFORT };
      if (!settings.lossless) {
        options.quality = settings.quality;
      }
      return { format, options };
    }
    case "avif":
      return {
        format,
        options: {
          quality: settings.lossless ? AVIF_LOSSLESS_QUALITY : settings.quality,
          effort: avifSpeedToEffort(AVIF_SPEED),
        },
      };
  }
}

function applyEncoder(pipeline: sharp.Sharp, encodeOptions: EncodeOptions): sharp.Sharp {
  switch (encodeOptions.format) {
    case "webp":
      return pipeline.webp(encodeOptions.options);
    case "avif":
      return pipeline.avif(encodeOptions.options);
  }
}

/** Writes `image` to `destinationPath`. `image` is only read. */
export async function encodeImage(
  sharp: SharpFactory,
  image: DecodedImage,
  encodeOptions: EncodeOptions,
  destinationPath: string,
): Promise<void> {
  try {
    await applyEncoder(openRawPipeline(sharp, image), encodeOptions).toFile(destinationPath);
  } catch (error) {
    throw new EncodeError(
      mapFsOrSharpErrorToMessage(error, "Encode failed (unknown error)"),
      destinationPath,
      error,
    );
  }
}
