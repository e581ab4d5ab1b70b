import type { ExtractionStatus } from '@shared/schema';
import type { CertificateFields } from '@shared/certificate-fields';
import type { ExtractionErrorCode } from '../../errors';

export type SourceFormat = 'png' | 'jpeg' | 'webp' | 'tiff' | 'bmp' | 'pdf';

/** The single PNG raster that every accepted upload is reduced to. */
export interface CanonicalImage {
  data: Buffer;
  mimeType: 'image/png';
  width: number;
  height: number;
  source: {
    format: SourceFormat;
    declaredType: string;
    byteSize: number;
    pageCount?: number;
  };
}

export type ExtractionMethod = 'json' | 'pattern' | 'none';

export interface ExtractionFailure {
  code: ExtractionErrorCode;
  reason: string;
  transient: boolean;
}

export interface ExtractionResult {
  status: ExtractionStatus;
  fields: CertificateFields;
  notes: string[];
  confidence: number;
  provider: string;
  method: ExtractionMethod;
  attempts: number;
  processingTimeMs: number;
  failure?: ExtractionFailure;
}
