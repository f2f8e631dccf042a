import { randomBytes } from "node:crypto";
import { rename, unlink, writeFile } from "node:fs/promises";
import path from "node:path";

function buildTempPath(targetPath: string): string {
  const dir = path.dirname(targetPath);
  const base = path.basename(targetPath);
  const suffix = randomBytes(6).toString("hex");
  return path.join(dir, `.${base}.image-converter-tmp-${process.pid}-${suffix}`);
}

/** Writes beside `targetPath` first and renames over it, so readers never see a partial file. */
export async function writeViaTempFile(targetPath: string, data: string | Buffer): Promise<void> {
  const tempPath = buildTempPath(targetPath);

  try {
    await writeFile(tempPath, data);
    await rename(tempPath, targetPath);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }
}
