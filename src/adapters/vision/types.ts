/**
 * Image-classification adapter types.
 * The adapter only moves an image and a prompt to a vision model and returns its raw text;
 * parsing into a VisionSchema happens in src/vision.
 */

export type ImageMediaType = "image/jpeg" | "image/png";

export interface ClassifyOptions {
  maxTokens?: number;
}

export interface IVisionClassifier {
  /**
   * Classify one captured frame.
   * @param image - Encoded image bytes (JPEG or PNG).
   * @param prompt - Instructions, including the JSON shape expected back.
   */
  classify(image: Buffer, prompt: string, options?: ClassifyOptions): Promise<string>;
}

/** Sniff the media type from magic bytes; cameras send JPEG unless told otherwise. */
export function detectMediaType(image: Buffer): ImageMediaType {
  if (image.length >= 4 && image[0] === 0x89 && image[1] === 0x50 && image[2] === 0x4e && image[3] === 0x47) {
    return "image/png";
  }
  return "image/jpeg";
}
