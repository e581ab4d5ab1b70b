import { FormatError } from '../../errors';
import { extractionLogger } from '../../logger';
import { inspectBitmap } from './bitmap-header';
import { canonicalizeImage } from './image-preprocessing';
import {
  decodeWithCanvas,
  loadRenderToolkit,
  renderFirstPage,
  resolveToolkit,
  type RenderToolkitLoader,
} from './page-renderer';
import type { CanonicalImage, SourceFormat } from './types';

const normalizerLogger = extractionLogger.child({ step: 'format-normalizer' });

const DECLARED_TYPES: Record<string, SourceFormat> = {
  'png': 'png',
  'image/png': 'png',
  'jpg': 'jpeg',
  'jpeg': 'jpeg',
  'image/jpeg': 'jpeg',
  'image/jpg': 'jpeg',
  'webp': 'webp',
  'image/webp': 'webp',
  'tif': 'tiff',
  'tiff': 'tiff',
  'image/tiff': 'tiff',
  'bmp': 'bmp',
  'image/bmp': 'bmp',
  'image/x-ms-bmp': 'bmp',
  'pdf': 'pdf',
  'application/pdf': 'pdf',
};

export function resolveSourceFormat(declaredType: string): SourceFormat | undefined {
  const key = declaredType.trim().toLowerCase().replace(/^\./, '').split(';')[0].trim();
  return DECLARED_TYPES[key];
}

export function assertUploadSize(byteSize: number, maxBytes: number): void {
  if (byteSize > maxBytes) {
    throw new FormatError(
      'FILE_TOO_LARGE',
      `Upload is ${byteSize} bytes; the limit is ${maxBytes} bytes`
    );
  }
}

export interface FormatNormalizerOptions {
  maxImageEdge: number;
  pdfRenderScale: number;
  maxUploadBytes: number;
  loadToolkit?: RenderToolkitLoader;
}

export class FormatNormalizer {
  private readonly loadToolkit: RenderToolkitLoader;

  constructor(private readonly options: FormatNormalizerOptions) {
    this.loadToolkit = options.loadToolkit ?? loadRenderToolkit;
  }

  async normalize(rawBytes: Buffer, declaredType: string): Promise<CanonicalImage> {
    const format = resolveSourceFormat(declaredType);
    if (!format) {
      throw new FormatError(
        'UNSUPPORTED_FORMAT',
        `"${declaredType}" is not an accepted upload type (pdf, jpg, jpeg, png, bmp, webp, tiff)`,
        declaredType
      );
    }
    if (rawBytes.length === 0) {
      throw new FormatError('CORRUPT_INPUT', 'The upload is empty', declaredType);
    }
    assertUploadSize(rawBytes.length, this.options.maxUploadBytes);

    let raster: Buffer = rawBytes;
    let pageCount: number | undefined;

    if (format === 'pdf') {
      if (rawBytes.subarray(0, 5).toString('latin1') !== '%PDF-') {
        throw new FormatError('CORRUPT_INPUT', 'The upload is declared as PDF but has no PDF header', declaredType);
      }
      const toolkit = await resolveToolkit(this.loadToolkit);
      const page = await renderFirstPage(toolkit, rawBytes, {
        scale: this.options.pdfRenderScale,
        maxEdge: this.options.maxImageEdge,
      });
      raster = page.png;
      pageCount = page.pageCount;
      if (page.pageCount > 1) {
        normalizerLogger.info({ pageCount: page.pageCount }, 'Multi-page PDF truncated to page 1');
      }
    } else if (format === 'bmp') {
      const header = inspectBitmap(rawBytes);
      normalizerLogger.debug({ width: header.width, height: header.height, bitCount: header.bitCount }, 'Bitmap header accepted');
      const toolkit = await resolveToolkit(this.loadToolkit);
      raster = await decodeWithCanvas(toolkit, rawBytes);
    }

    try {
      const result = await canonicalizeImage(raster, { maxEdge: this.options.maxImageEdge });
      return {
        data: result.buffer,
        mimeType: 'image/png',
        width: result.width,
        height: result.height,
        source: { format, declaredType, byteSize: rawBytes.length, pageCount },
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      normalizerLogger.warn({ format, reason }, 'Upload could not be decoded');
      throw new FormatError('CORRUPT_INPUT', `The ${format} image could not be decoded: ${reason}`, declaredType);
    }
  }
}
