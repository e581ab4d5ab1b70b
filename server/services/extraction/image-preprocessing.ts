import sharp from 'sharp';
import { extractionLogger } from '../../logger';

const preprocessLogger = extractionLogger.child({ step: 'image-preprocessing' });

export interface CanonicalizeOptions {
  maxEdge?: number;
}

export interface CanonicalizeResult {
  buffer: Buffer;
  width: number;
  height: number;
  originalSize: number;
  processedSize: number;
  processingTimeMs: number;
  operations: string[];
}

const DEFAULT_OPTIONS: Required<CanonicalizeOptions> = {
  maxEdge: 2048,
};

/**
 * Re-encodes a decodable raster to the canonical form: EXIF orientation
 * applied, alpha flattened onto white, sRGB, longest edge capped, lossless PNG.
 * Running it on its own output returns the same pixels.
 */
export async function canonicalizeImage(
  inputBuffer: Buffer,
  options: CanonicalizeOptions = {}
): Promise<CanonicalizeResult> {
  const startTime = Date.now();
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const operations: string[] = [];

  const originalSize = inputBuffer.length;
  let pipeline = sharp(inputBuffer, { failOn: 'error' });

  const metadata = await pipeline.metadata();
  preprocessLogger.debug({
    originalWidth: metadata.width,
    originalHeight: metadata.height,
    format: metadata.format,
    orientation: metadata.orientation,
  }, 'Starting image canonicalisation');

  pipeline = pipeline.rotate();
  operations.push('orient');

  if (metadata.hasAlpha) {
    pipeline = pipeline.flatten({ background: '#ffffff' });
    operations.push('flatten');
  }

  pipeline = pipeline.toColourspace('srgb');

  const needsResize = metadata.width && metadata.height &&
    (metadata.width > opts.maxEdge || metadata.height > opts.maxEdge);

  if (needsResize) {
    pipeline = pipeline.resize({
      width: opts.maxEdge,
      height: opts.maxEdge,
      fit: 'inside',
      withoutEnlargement: true,
    });
    operations.push(`resize(max: ${opts.maxEdge})`);
  }

  pipeline = pipeline.png({ compressionLevel: 6, adaptiveFiltering: false });
  operations.push('format(png)');

  const output = await pipeline.toBuffer({ resolveWithObject: true });
  const processingTimeMs = Date.now() - startTime;

  preprocessLogger.debug({
    originalSize,
    processedSize: output.info.size,
    operations,
    processingTimeMs,
  }, 'Image canonicalisation completed');

  return {
    buffer: output.data,
    width: output.info.width,
    height: output.info.height,
    originalSize,
    processedSize: output.info.size,
    processingTimeMs,
    operations,
  };
}
