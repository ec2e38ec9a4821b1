import sharp from "sharp";

/**
 * Greyscale and contrast-stretch a rendered page before recognition.
 */
export async function preprocessForOcr(png: Buffer): Promise<Buffer> {
  return sharp(png).greyscale().normalise().png().toBuffer();
}
