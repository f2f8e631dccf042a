import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import sharp from "sharp";
import { vi } from "vitest";
import type { Logger } from "../src/lib/logger";

export async function createTempDir(prefix = "image-converter-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeSolidImage(
  filePath: string,
  options: { width?: number; height?: number; format?: "png" | "jpeg" | "gif" } = {},
): Promise<string> {
  const { width = 400, height = 300, format = "png" } = options;
  const image = sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 40, b: 40 } },
  });
  await image.toFormat(format).toFile(filePath);
  return filePath;
}

/** Writes an uncompressed 24-bit bottom-up BMP filled with one colour. */
export async function writeSolidBmp(
  filePath: string,
  options: { width?: number; height?: number; rgb?: [number, number, number] } = {},
): Promise<string> {
  const { width = 8, height = 6, rgb = [200, 40, 40] } = options;
  const rowSize = Math.ceil((width * 3) / 4) * 4;
  const pixelBytes = rowSize * height;

  const header = Buffer.alloc(54);
  header.write("BM", 0, "ascii");
  header.writeUInt32LE(54 + pixelBytes, 2);
  header.writeUInt32LE(54, 10);
  header.writeUInt32LE(40, 14);
  header.writeInt32LE(width, 18);
  header.writeInt32LE(height, 22);
  header.writeUInt16LE(1, 26);
  header.writeUInt16LE(24, 28);
  header.writeUInt32LE(pixelBytes, 34);
  header.writeInt32LE(2835, 38);
  header.writeInt32LE(2835, 42);

  const pixels = Buffer.alloc(pixelBytes);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const offset = y * rowSize + x * 3;
      pixels[offset] = rgb[2];
      pixels[offset + 1] = rgb[1];
      pixels[offset + 2] = rgb[0];
    }
  }

  await writeFile(filePath, Buffer.concat([header, pixels]));
  return filePath;
}

export async function writeCorruptImage(filePath: string): Promise<string> {
  await writeFile(filePath, "this is not an image");
  return filePath;
}

export function createTestLogger(): Logger & {
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
