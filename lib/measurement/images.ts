/**
 * Image provider for the logo and signature. Every origin (configured file,
 * uploaded bytes, browser data URL) goes through one decode step; anything that
 * fails to decode is treated as "no image".
 */

import { readFile } from "node:fs/promises";
import sharp from "sharp";
import type { ImageSource, ReportImage } from "./schema";

export interface BoxSize {
  width: number;
  height: number;
}

function decodeDataUrl(dataUrl: string): Uint8Array {
  const match = dataUrl.trim().match(/^data:([^;,]*)((?:;[^;,]*)*),(.*)$/s);
  if (!match) throw new Error("Not a data URL");
  const isBase64 = match[2].split(";").includes("base64");
  const payload = match[3];
  return isBase64 ? Buffer.from(payload, "base64") : Buffer.from(decodeURIComponent(payload), "utf8");
}

async function readImageSource(source: ImageSource): Promise<Uint8Array> {
  switch (source.kind) {
    case "path":
      return readFile(source.path);
    case "bytes":
      return source.data;
    case "dataUrl":
      return decodeDataUrl(source.dataUrl);
  }
}

function describeSource(source: ImageSource): string {
  if (source.kind === "path") return source.path;
  if (source.kind === "bytes") return `${source.data.byteLength} bytes`;
  return "data URL";
}

/** Decode any supported raster into PNG bytes plus pixel size. Null on any failure. */
export async function loadReportImage(source: ImageSource | null | undefined): Promise<ReportImage | null> {
  if (!source) return null;
  try {
    const bytes = await readImageSource(source);
    if (bytes.byteLength === 0) return null;
    const { data, info } = await sharp(bytes).rotate().png().toBuffer({ resolveWithObject: true });
    if (!info.width || !info.height) return null;
    return { data: new Uint8Array(data), format: "PNG", width: info.width, height: info.height };
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    console.warn("[images] Could not load image; continuing without it", { source: describeSource(source), msg });
    return null;
  }
}

/** Largest size with the image's aspect ratio that fits inside the box. */
export function fitImage(image: BoxSize, box: BoxSize): BoxSize {
  if (image.width <= 0 || image.height <= 0) return { width: 0, height: 0 };
  const scale = Math.min(box.width / image.width, box.height / image.height);
  return { width: image.width * scale, height: image.height * scale };
}
