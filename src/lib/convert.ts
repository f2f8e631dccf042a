import { buildEncodeOptions, encodeImage } from "./encode";
import { decodeImage, resizeImage } from "./image";
import { Logger, defaultLogger } from "./logger";
import { resolveOutputPath, targetFormatToCanonicalExtension } from "./pathing";
import type { SharpFactory } from "./sharp-loader";
import type { ConversionJob } from "../types";

/**
 * Decode, resize, encode and write one file. Rejects with a DecodeError or
 * EncodeError; resize failures only log.
 */
export async function convertFile(
  sharp: SharpFactory,
  sourcePath: string,
  job: ConversionJob,
  logger: Logger = defaultLogger,
): Promise<string> {
  const outputPath = resolveOutputPath(sourcePath, job.outputDir, targetFormatToCanonicalExtension(job.format));

  // Decoded pixels are scoped to this call.
  const decoded = await decodeImage(sharp, sourcePath);
  const prepared = await resizeImage(sharp, decoded, job.settings, logger);
  await encodeImage(sharp, prepared, buildEncodeOptions(job.format, job.settings), outputPath);

  return outputPath;
}
