import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  isSupportedInputExtension,
  isSupportedInputPath,
  normalizeExtension,
  resolveOutputPath,
  targetFormatToCanonicalExtension,
} from "../src/lib/pathing";

describe("resolveOutputPath", () => {
  it("replaces the extension and keeps the base name's case", () => {
    expect(resolveOutputPath("/a/b/photo.PNG", "/out", ".webp")).toBe(path.join("/out", "photo.webp"));
  });

  it("uses the new extension exactly as given", () => {
    expect(resolveOutputPath("/a/Holiday.Shot.jpeg", "/out", ".AVIF")).toBe(path.join("/out", "Holiday.Shot.AVIF"));
  });

  it("handles sources without an extension", () => {
    expect(resolveOutputPath("/a/README", "/out", ".webp")).toBe(path.join("/out", "README.webp"));
  });
});

describe("extension helpers", () => {
  it("lower-cases extensions", () => {
    expect(normalizeExtension("/tmp/IMG_001.JPG")).toBe(".jpg");
    expect(normalizeExtension("/tmp/noext")).toBeNull();
  });

  it("accepts the five input formats in any case", () => {
    for (const name of ["a.png", "b.JPG", "c.jpeg", "d.Bmp", "e.gif"]) {
      expect(isSupportedInputPath(name)).toBe(true);
    }
    expect(isSupportedInputPath("f.webp")).toBe(false);
    expect(isSupportedInputPath("g.tiff")).toBe(false);
    expect(isSupportedInputExtension(null)).toBe(false);
  });

  it("maps target formats to dotted extensions", () => {
    expect(targetFormatToCanonicalExtension("webp")).toBe(".webp");
    expect(targetFormatToCanonicalExtension("avif")).toBe(".avif");
  });
});
