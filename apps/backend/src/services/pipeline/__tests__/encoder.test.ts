import { describe, expect, it } from "vitest";
import sharp from "sharp";
import type { RasterImage } from "../../../domain/image";
import { ProcessingError } from "../../../domain/processingError";
import { SharpImageIO, type ImageIO } from "../../imaging/sharpImageIO";
import { compositeOnColor } from "../compositor";
import { encodePng } from "../encoder";
import { readPixels } from "../../../test/fixtures/images";

describe("encodePng", () => {
  it("produces a PNG with the raster's size and alpha", async () => {
    const image: RasterImage = { data: Buffer.alloc(3 * 2 * 4, 77), width: 3, height: 2, channels: 4 };
    const encoded = await encodePng(image, new SharpImageIO());

    expect(encoded).toMatchObject({ contentType: "image/png", width: 3, height: 2 });
    const metadata = await sharp(encoded.data).metadata();
    expect(metadata).toMatchObject({ format: "png", width: 3, height: 2, hasAlpha: true });
  });

  it("writes opaque output without alpha for RGB rasters", async () => {
    const image: RasterImage = { data: Buffer.alloc(2 * 2 * 3, 10), width: 2, height: 2, channels: 3 };
    const encoded = await encodePng(image, new SharpImageIO());
    const metadata = await sharp(encoded.data).metadata();
    expect(metadata.hasAlpha).toBe(false);
  });

  it("round-trips a composited raster without changing any pixel", async () => {
    const width = 16;
    const height = 8;
    const rgba = Buffer.alloc(width * height * 4);
    for (let i = 0; i < width * height; i++) {
      rgba[i * 4] = (i * 37) % 256;
      rgba[i * 4 + 1] = (i * 11 + 5) % 256;
      rgba[i * 4 + 2] = 255 - ((i * 7) % 256);
      rgba[i * 4 + 3] = [0, 64, 128, 200, 255][i % 5];
    }
    const composited = compositeOnColor({ data: rgba, width, height, channels: 4 }, { r: 12, g: 200, b: 99 });

    const encoded = await encodePng(composited, new SharpImageIO());
    const decoded = await readPixels(encoded.data);

    expect(decoded).toMatchObject({ width, height, channels: 3 });
    expect(decoded.pixels.equals(composited.data)).toBe(true);
  });

  it("classifies encoder failures as EncodingFailed", async () => {
    const cause = new Error("disk full");
    const failing: ImageIO = {
      probe: () => Promise.reject(new Error("unused")),
      decode: () => Promise.reject(new Error("unused")),
      resize: () => Promise.reject(new Error("unused")),
      encodePng: () => Promise.reject(cause),
    };
    const image: RasterImage = { data: Buffer.alloc(4), width: 1, height: 1, channels: 4 };

    const error = await encodePng(image, failing).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProcessingError);
    expect(error).toMatchObject({ code: "EncodingFailed", cause });
  });
});
