import sharp from 'sharp';
import { PDFDocument, rgb } from 'pdf-lib';
import { emptyCertificateFields, type CertificateFields } from '@shared/certificate-fields';
import type { CertificateRecord, Identity } from '@shared/schema';
import { loadConfig, type AppConfig } from '../../server/config';
import type { ExtractionResult } from '../../server/services/extraction/types';
import type { RenderToolkit } from '../../server/services/extraction/page-renderer';
import type { RecognitionAdapter } from '../../server/services/extraction/adapters/types';
import { createJsonReplyAdapter } from '../../server/services/extraction/adapters/stub-adapter';
import { createIntakeServices, type IntakeServices } from '../../server/services/certificates';
import { MemoryFileStore, MemoryIdentityDirectory, MemoryStorage } from '../../server/storage/memory.storage';
import type { IdentityResolver } from '../../server/middleware/identity';

export const STUDENT: Identity = {
  accountId: '2024010101001',
  displayName: '张三',
  role: 'student',
  department: '计算机学院',
};

export const TEACHER: Identity = {
  accountId: '20230001',
  displayName: '李老师',
  role: 'teacher',
  department: '数学学院',
};

export const ADMIN: Identity = {
  accountId: 'admin',
  displayName: '管理员',
  role: 'admin',
  department: '教务处',
};

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    RECOGNITION_TIMEOUT_MS: '200',
    RECOGNITION_MAX_ATTEMPTS: '3',
    RECOGNITION_RETRY_DELAY_MS: '1',
    ...overrides,
  });
}

type Rgb = { r: number; g: number; b: number; alpha?: number };

export async function solidImage(
  format: 'jpeg' | 'png' | 'webp',
  width: number,
  height: number,
  color: Rgb = { r: 200, g: 30, b: 30 }
): Promise<Buffer> {
  const channels: 3 | 4 = color.alpha === undefined ? 3 : 4;
  const image = sharp({ create: { width, height, channels, background: color } });
  if (format === 'jpeg') return image.jpeg().toBuffer();
  if (format === 'webp') return image.webp({ lossless: true }).toBuffer();
  return image.png().toBuffer();
}

export async function rawPixels(png: Buffer): Promise<{ data: Buffer; width: number; height: number; channels: number }> {
  const { data, info } = await sharp(png).raw().toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height, channels: info.channels };
}

export async function pixelAt(png: Buffer, x: number, y: number): Promise<number[]> {
  const { data, width, channels } = await rawPixels(png);
  const offset = (y * width + x) * channels;
  return [...data.subarray(offset, offset + channels)];
}

/** Page 1 is 300x200pt solid red; pages 2..n are 500x700pt solid blue. */
export async function multiPagePdf(pageCount: number): Promise<Buffer> {
  const document = await PDFDocument.create();
  const first = document.addPage([300, 200]);
  first.drawRectangle({ x: 0, y: 0, width: 300, height: 200, color: rgb(1, 0, 0) });
  for (let i = 2; i <= pageCount; i++) {
    const page = document.addPage([500, 700]);
    page.drawRectangle({ x: 0, y: 0, width: 500, height: 700, color: rgb(0, 0, 1) });
  }
  return Buffer.from(await document.save());
}

export async function singlePagePdf(width: number, height: number): Promise<Buffer> {
  const document = await PDFDocument.create();
  const page = document.addPage([width, height]);
  page.drawRectangle({ x: 0, y: 0, width, height, color: rgb(1, 0, 0) });
  return Buffer.from(await document.save());
}

/** Uncompressed 24-bit BMP filled with one colour. */
export function solidBmp(width: number, height: number, color: Rgb): Buffer {
  const rowSize = Math.ceil((width * 3) / 4) * 4;
  const pixelBytes = rowSize * height;
  const buffer = Buffer.alloc(54 + pixelBytes);

  buffer.write('BM', 0, 'latin1');
  buffer.writeUInt32LE(54 + pixelBytes, 2);
  buffer.writeUInt32LE(54, 10);
  buffer.writeUInt32LE(40, 14);
  buffer.writeInt32LE(width, 18);
  buffer.writeInt32LE(height, 22);
  buffer.writeUInt16LE(1, 26);
  buffer.writeUInt16LE(24, 28);
  buffer.writeUInt32LE(0, 30);
  buffer.writeUInt32LE(pixelBytes, 34);
  buffer.writeInt32LE(2835, 38);
  buffer.writeInt32LE(2835, 42);

  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      const offset = 54 + row * rowSize + col * 3;
      buffer[offset] = color.b;
      buffer[offset + 1] = color.g;
      buffer[offset + 2] = color.r;
    }
  }
  return buffer;
}

export function unusedCanvas(): RenderToolkit['canvas'] {
  return {
    createCanvas: () => {
      throw new Error('canvas not expected in this test');
    },
    loadImage: async () => {
      throw new Error('canvas not expected in this test');
    },
  };
}

export function passwordProtectedToolkit(): RenderToolkit {
  const error = new Error('No password given');
  error.name = 'PasswordException';
  return {
    pdfjs: {
      getDocument: () => ({
        promise: Promise.reject(error),
        destroy: async () => {},
      }),
    },
    canvas: unusedCanvas(),
  };
}

export function extractionResult(
  fields: Partial<CertificateFields>,
  overrides: Partial<ExtractionResult> = {}
): ExtractionResult {
  return {
    status: 'partial',
    fields: { ...emptyCertificateFields(), ...fields },
    notes: [],
    confidence: 0.5,
    provider: 'stub',
    method: 'json',
    attempts: 1,
    processingTimeMs: 5,
    ...overrides,
  };
}

export function draftRecord(overrides: Partial<CertificateRecord> = {}): CertificateRecord {
  const createdAt = new Date('2025-06-01T08:00:00.000Z');
  return {
    certId: 'cert-1',
    submitterAccountId: STUDENT.accountId,
    submitterRole: 'student',
    ...emptyCertificateFields(),
    studentId: STUDENT.accountId,
    studentName: STUDENT.displayName,
    department: STUDENT.department,
    advisorAccountId: null,
    fileId: 'file-1',
    filePath: 'memory://2024010101001/file-1.jpeg',
    status: 'draft',
    confirmedFields: [],
    extractionStatus: 'partial',
    extractionMethod: 'json',
    extractionConfidence: 0.5,
    createdAt,
    updatedAt: createdAt,
    submittedAt: null,
    ...overrides,
  };
}

export const ACCOUNT_HEADER = 'x-test-account';

/** Reply for the award certificate most tests upload. */
export const CERTIFICATE_REPLY = {
  department: '计算机学院',
  competition_name: '全国大学生数学建模竞赛',
  student_id: '2024010101001',
  student_name: '张三',
  award_category: '国家级',
  award_level: '一等奖',
  competition_type: 'A类',
  organizer: '中国工业与应用数学学会',
  award_date: '2024-11-20',
  advisor: '王老师',
};

export interface Harness {
  clock: { now: Date };
  gateway: MemoryStorage;
  identities: MemoryIdentityDirectory;
  files: MemoryFileStore;
  services: IntakeServices;
  config: AppConfig;
}

export function createHarness(options: {
  adapter?: RecognitionAdapter;
  now?: Date;
  clock?: { now: Date };
  config?: AppConfig;
  loadToolkit?: () => Promise<RenderToolkit>;
} = {}): Harness {
  const clock = options.clock ?? { now: options.now ?? new Date('2025-06-01T08:00:00.000Z') };
  const gateway = new MemoryStorage();
  const identities = new MemoryIdentityDirectory([STUDENT, TEACHER, ADMIN]);
  const files = new MemoryFileStore();
  const config = options.config ?? testConfig();
  const services = createIntakeServices(config, { gateway, identities, files }, {
    adapter: options.adapter ?? createJsonReplyAdapter(CERTIFICATE_REPLY),
    loadToolkit: options.loadToolkit,
    now: () => clock.now,
  });
  return { clock, gateway, identities, files, services, config };
}

/** Resolves the caller from a plain header so route tests need no session. */
export function headerIdentityResolver(identities: MemoryIdentityDirectory): IdentityResolver {
  return async (req) => {
    const accountId = req.get(ACCOUNT_HEADER);
    return accountId ? identities.getIdentity(accountId) : undefined;
  };
}
