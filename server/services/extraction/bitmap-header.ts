import { FormatError } from '../../errors';

const FILE_HEADER_BYTES = 14;
const DIB_HEADER_SIZES = new Set([12, 40, 52, 56, 108, 124]);
const BIT_DEPTHS = new Set([1, 4, 8, 16, 24, 32]);

// BI_RGB, BI_BITFIELDS and BI_ALPHABITFIELDS; RLE and embedded JPEG/PNG payloads are refused.
const UNCOMPRESSED = new Set([0, 3, 6]);

export interface BitmapHeader {
  width: number;
  height: number;
  bitCount: number;
  compression: number;
  pixelOffset: number;
}

function corrupt(detail: string): FormatError {
  return new FormatError('CORRUPT_INPUT', `The bitmap is malformed: ${detail}`, 'bmp');
}

/**
 * Checks the BMP file and DIB headers against the bytes actually present.
 * A bitmap whose declared pixel array does not fit inside the upload must
 * never reach the canvas codec: it reads past the buffer and crashes the process.
 */
export function inspectBitmap(bytes: Buffer): BitmapHeader {
  if (bytes.length < FILE_HEADER_BYTES + 4) {
    throw corrupt(`${bytes.length} bytes is shorter than a bitmap header`);
  }
  if (bytes.toString('latin1', 0, 2) !== 'BM') {
    throw corrupt('missing BM signature');
  }

  const declaredSize = bytes.readUInt32LE(2);
  if (declaredSize > bytes.length) {
    throw corrupt(`header declares ${declaredSize} bytes but only ${bytes.length} were uploaded`);
  }

  const pixelOffset = bytes.readUInt32LE(10);
  const dibSize = bytes.readUInt32LE(14);
  if (!DIB_HEADER_SIZES.has(dibSize)) {
    throw corrupt(`unknown DIB header size ${dibSize}`);
  }
  if (FILE_HEADER_BYTES + dibSize > bytes.length) {
    throw corrupt('DIB header is truncated');
  }

  let width: number;
  let height: number;
  let planes: number;
  let bitCount: number;
  let compression = 0;
  if (dibSize === 12) {
    width = bytes.readUInt16LE(18);
    height = bytes.readUInt16LE(20);
    planes = bytes.readUInt16LE(22);
    bitCount = bytes.readUInt16LE(24);
  } else {
    width = bytes.readInt32LE(18);
    height = bytes.readInt32LE(22);
    planes = bytes.readUInt16LE(26);
    bitCount = bytes.readUInt16LE(28);
    compression = bytes.readUInt32LE(30);
  }

  if (width <= 0 || height === 0) {
    throw corrupt(`invalid dimensions ${width}x${height}`);
  }
  if (planes !== 1) {
    throw corrupt(`expected 1 colour plane, found ${planes}`);
  }
  if (!BIT_DEPTHS.has(bitCount)) {
    throw corrupt(`unsupported bit depth ${bitCount}`);
  }
  if (!UNCOMPRESSED.has(compression)) {
    throw new FormatError(
      'UNSUPPORTED_FORMAT',
      `Compressed bitmaps (compression method ${compression}) are not accepted`,
      'bmp'
    );
  }

  // 40-byte headers carry their BI_BITFIELDS masks after the header.
  const masks = dibSize === 40 && compression === 3 ? 12 : dibSize === 40 && compression === 6 ? 16 : 0;
  if (pixelOffset < FILE_HEADER_BYTES + dibSize + masks || pixelOffset >= bytes.length) {
    throw corrupt(`pixel data offset ${pixelOffset} is outside the file`);
  }

  const rowStride = Math.floor((bitCount * width + 31) / 32) * 4;
  const pixelBytes = rowStride * Math.abs(height);
  if (pixelOffset + pixelBytes > bytes.length) {
    throw corrupt(`pixel data needs ${pixelBytes} bytes but ${bytes.length - pixelOffset} remain`);
  }

  return { width, height: Math.abs(height), bitCount, compression, pixelOffset };
}
