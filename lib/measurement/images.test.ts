import { afterEach, describe, it, expect, vi } from "vitest";
import sharp from "sharp";
import { fitImage, loadReportImage } from "./images";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47];

function solidImage(width: number, height: number) {
  return sharp({ create: { width, height, channels: 4, background: { r: 212, g: 175, b: 55, alpha: 1 } } });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("loadReportImage", () => {
  it("decodes raw bytes into PNG with the pixel size", async () => {
    const png = await solidImage(40, 20).png().toBuffer();
    const image = await loadReportImage({ kind: "bytes", data: png });
    expect(image).not.toBeNull();
    expect(image?.format).toBe("PNG");
    expect(image?.width).toBe(40);
    expect(image?.height).toBe(20);
    expect(Array.from(image?.data.subarray(0, 4) ?? [])).toEqual(PNG_SIGNATURE);
  });

  it("converts a JPEG data URL to PNG", async () => {
    const jpeg = await solidImage(30, 60).jpeg().toBuffer();
    const image = await loadReportImage({ kind: "dataUrl", dataUrl: `data:image/jpeg;base64,${jpeg.toString("base64")}` });
    expect(image?.width).toBe(30);
    expect(image?.height).toBe(60);
    expect(Array.from(image?.data.subarray(0, 4) ?? [])).toEqual(PNG_SIGNATURE);
  });

  it("treats a missing file as no image and warns", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(await loadReportImage({ kind: "path", path: "/nonexistent/slab-logo.png" })).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("treats undecodable data as no image", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(await loadReportImage({ kind: "dataUrl", dataUrl: "data:image/png;base64,AAAA" })).toBeNull();
    expect(await loadReportImage({ kind: "dataUrl", dataUrl: "not a data url" })).toBeNull();
  });

  it("returns null without a source or for empty bytes", async () => {
    expect(await loadReportImage(null)).toBeNull();
    expect(await loadReportImage({ kind: "bytes", data: new Uint8Array(0) })).toBeNull();
  });
});

describe("fitImage", () => {
  it("scales to the limiting side and keeps the aspect ratio", () => {
    expect(fitImage({ width: 400, height: 200 }, { width: 100, height: 100 })).toEqual({ width: 100, height: 50 });
    expect(fitImage({ width: 100, height: 400 }, { width: 100, height: 100 })).toEqual({ width: 25, height: 100 });
  });

  it("gives a zero box for an empty image", () => {
    expect(fitImage({ width: 0, height: 10 }, { width: 100, height: 100 })).toEqual({ width: 0, height: 0 });
  });
});
