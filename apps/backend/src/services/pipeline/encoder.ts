import type { EncodedImage, RasterImage } from "../../domain/image";
import { ProcessingError } from "../../domain/processingError";
import type { ImageIO } from "../imaging/sharpImageIO";

/** Serialize to PNG; alpha is kept when the raster has it. */
export async function encodePng(image: RasterImage, imageIO: ImageIO): Promise<EncodedImage> {
  try {
    const data = await imageIO.encodePng(image);
    return { data, contentType: "image/png", width: image.width, height: image.height };
  } catch (error) {
    throw new ProcessingError("EncodingFailed", undefined, { cause: error });
  }
}
