import { describe, it, expect } from 'vitest';
import { loadConfig } from '../server/config';
import { jsonBodyLimit } from '../server/app';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.NODE_ENV).toBe('development');
    expect(config.PORT).toBe(5000);
    expect(config.RECOGNITION_TIMEOUT_MS).toBe(20000);
    expect(config.RECOGNITION_MAX_ATTEMPTS).toBe(3);
    expect(config.MAX_UPLOAD_BYTES).toBe(10 * 1024 * 1024);
    expect(config.MAX_IMAGE_EDGE).toBe(2048);
    expect(config.PDF_RENDER_SCALE).toBe(2);
    expect(config.DATABASE_URL).toBeUndefined();
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({ PORT: '8080', PDF_RENDER_SCALE: '1.5' });
    expect(config.PORT).toBe(8080);
    expect(config.PDF_RENDER_SCALE).toBe(1.5);
  });

  it('names every invalid variable', () => {
    expect(() => loadConfig({ PORT: 'abc', SESSION_SECRET: 'short' })).toThrow(
      /^Invalid environment configuration: PORT: .+; SESSION_SECRET: .+$/
    );
  });

  it('requires an offset on the default deadline', () => {
    expect(() => loadConfig({ DEFAULT_SUBMISSION_DEADLINE: '2025-06-30T16:00:00' })).toThrow(/DEFAULT_SUBMISSION_DEADLINE/);
    expect(loadConfig({ DEFAULT_SUBMISSION_DEADLINE: '2025-06-30T16:00:00Z' }).DEFAULT_SUBMISSION_DEADLINE)
      .toBe('2025-06-30T16:00:00Z');
  });
});

describe('jsonBodyLimit', () => {
  it('leaves room for base64 inflation', () => {
    expect(jsonBodyLimit(3 * 1024)).toBe(4 * 1024 + 64 * 1024);
  });
});
