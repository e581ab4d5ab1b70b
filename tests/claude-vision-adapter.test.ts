import { describe, it, expect } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { ClaudeVisionAdapter, toRecognitionError } from '../server/services/extraction/adapters/claude-vision';
import { RecognitionError } from '../server/services/extraction/adapters/types';
import type { CanonicalImage } from '../server/services/extraction/types';

const IMAGE: CanonicalImage = {
  data: Buffer.from('png-bytes'),
  mimeType: 'image/png',
  width: 1,
  height: 1,
  source: { format: 'png', declaredType: 'png', byteSize: 9 },
};

describe('toRecognitionError', () => {
  it('treats rate limits as transient', () => {
    const error = toRecognitionError(new Anthropic.RateLimitError(429, undefined, 'rate limited', undefined));
    expect(error.transient).toBe(true);
    expect(error.statusCode).toBe(429);
  });

  it('treats server errors as transient', () => {
    const error = toRecognitionError(new Anthropic.InternalServerError(500, undefined, 'boom', undefined));
    expect(error.transient).toBe(true);
    expect(error.statusCode).toBe(500);
  });

  it('treats bad requests as permanent', () => {
    const error = toRecognitionError(new Anthropic.BadRequestError(400, undefined, 'image too large', undefined));
    expect(error.transient).toBe(false);
    expect(error.statusCode).toBe(400);
  });

  it('treats connection failures as transient', () => {
    const error = toRecognitionError(new Anthropic.APIConnectionError({ message: 'socket hang up' }));
    expect(error.transient).toBe(true);
    expect(error.statusCode).toBeUndefined();
  });

  it('passes RecognitionError through and wraps anything else as permanent', () => {
    const original = new RecognitionError('already mapped', true);
    expect(toRecognitionError(original)).toBe(original);

    const wrapped = toRecognitionError(new Error('unexpected'));
    expect(wrapped.transient).toBe(false);
    expect(wrapped.message).toBe('unexpected');
  });
});

describe('ClaudeVisionAdapter', () => {
  it('is available only with a key or an injected client', () => {
    expect(new ClaudeVisionAdapter({ model: 'test-model' }).isAvailable()).toBe(false);
    expect(new ClaudeVisionAdapter({ model: 'test-model', apiKey: 'test-secret' }).isAvailable()).toBe(true);
    expect(new ClaudeVisionAdapter({
      model: 'test-model',
      client: new Anthropic({ apiKey: 'test-secret' }),
    }).isAvailable()).toBe(true);
  });

  it('refuses to call out without a key', async () => {
    const adapter = new ClaudeVisionAdapter({ model: 'test-model' });
    const error = await adapter
      .recognize({ image: IMAGE, prompt: 'read it', signal: new AbortController().signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RecognitionError);
    expect(error).toMatchObject({ message: 'ANTHROPIC_API_KEY is not configured', transient: false });
  });
});
