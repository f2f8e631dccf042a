import type sharp from "sharp";
import { CodecUnavailableError } from "./errors";
import { toErrorMessage } from "./format";

export type SharpFactory = typeof sharp;
export type CodecLoader = () => Promise<SharpFactory>;

let cachedSharpFactory: SharpFactory | null = null;

/**
 * Loads libvips through sharp once per process. A missing or broken native
 * binary surfaces as {@link CodecUnavailableError}.
 */
export async function loadSharp(): Promise<SharpFactory> {
  if (cachedSharpFactory) return cachedSharpFactory;

  try {
    const mod = await import("sharp");
    cachedSharpFactory = mod.default;
    return cachedSharpFactory;
  } catch (error) {
    throw new CodecUnavailableError(
      `Image codec is unavailable. Run npm install to fetch sharp: ${toErrorMessage(error, "unknown error")}`,
      error,
    );
  }
}
