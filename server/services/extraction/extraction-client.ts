import { emptyCertificateFields } from '@shared/certificate-fields';
import { extractionLogger } from '../../logger';
import {
  CancelledError,
  RetriesExhaustedError,
  TimeoutError,
  withRetry,
  withTimeout,
} from '../../utils/resilience';
import { RecognitionError, type RecognitionAdapter, type RecognitionReply } from './adapters/types';
import { EXTRACTION_PROMPT } from './field-schema';
import { parseRecognitionReply, scoreReply } from './response-parser';
import type { CanonicalImage, ExtractionFailure, ExtractionResult } from './types';

export interface ExtractionClientOptions {
  timeoutMs: number;
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs?: number;
}

export interface ExtractOptions {
  signal?: AbortSignal;
}

const TRANSIENT_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN']);

export function isTransientRecognitionFailure(error: Error): boolean {
  if (error instanceof TimeoutError) return true;
  if (error instanceof RecognitionError) return error.transient;
  return 'code' in error && typeof error.code === 'string' && TRANSIENT_ERROR_CODES.has(error.code);
}

export class ExtractionClient {
  constructor(
    private readonly adapter: RecognitionAdapter,
    private readonly options: ExtractionClientOptions
  ) {}

  get provider(): string {
    return this.adapter.name;
  }

  /**
   * Sends the canonical image to the recognition adapter and validates the
   * reply. Resolves for every outcome; failures come back as status "failed".
   */
  async extract(image: CanonicalImage, { signal }: ExtractOptions = {}): Promise<ExtractionResult> {
    const startTime = Date.now();
    let attempts = 0;

    if (!this.adapter.isAvailable()) {
      return this.failed(startTime, attempts, {
        code: 'RECOGNITION_UNAVAILABLE',
        reason: `Recognition adapter "${this.adapter.name}" is not configured`,
        transient: false,
      });
    }

    let reply: RecognitionReply;
    try {
      reply = await withRetry(
        (attempt) => {
          attempts = attempt;
          return withTimeout(
            (attemptSignal) => this.adapter.recognize({ image, prompt: EXTRACTION_PROMPT, signal: attemptSignal }),
            {
              timeoutMs: this.options.timeoutMs,
              timeoutMessage: `Recognition timed out after ${this.options.timeoutMs}ms`,
              signal,
            }
          );
        },
        {
          maxAttempts: this.options.maxAttempts,
          initialDelayMs: this.options.initialDelayMs,
          maxDelayMs: this.options.maxDelayMs ?? this.options.initialDelayMs * 8,
          backoffMultiplier: 2,
          shouldRetry: isTransientRecognitionFailure,
          signal,
          onRetry: (error, attempt) => {
            extractionLogger.warn({ attempt, error: error.message, provider: this.adapter.name }, 'Recognition attempt failed, retrying');
          },
        }
      );
    } catch (error) {
      return this.failed(startTime, attempts, describeFailure(error));
    }

    const parsed = parseRecognitionReply(reply.text);
    const { status, confidence } = scoreReply(parsed);

    extractionLogger.info({
      provider: this.adapter.name,
      status,
      confidence,
      method: parsed.method,
      attempts,
      processingTimeMs: Date.now() - startTime,
    }, 'Extraction complete');

    return {
      status,
      fields: parsed.fields,
      notes: parsed.notes,
      confidence,
      provider: this.adapter.name,
      method: parsed.method,
      attempts,
      processingTimeMs: Date.now() - startTime,
    };
  }

  private failed(startTime: number, attempts: number, failure: ExtractionFailure): ExtractionResult {
    extractionLogger.warn({ provider: this.adapter.name, attempts, ...failure }, 'Extraction failed');
    return {
      status: 'failed',
      fields: emptyCertificateFields(),
      notes: [failure.reason],
      confidence: 0,
      provider: this.adapter.name,
      method: 'none',
      attempts,
      processingTimeMs: Date.now() - startTime,
      failure,
    };
  }
}

function describeFailure(error: unknown): ExtractionFailure {
  if (error instanceof CancelledError) {
    return { code: 'CANCELLED', reason: 'Extraction was cancelled by the caller', transient: false };
  }
  if (error instanceof RetriesExhaustedError) {
    return { code: 'RECOGNITION_UNAVAILABLE', reason: error.message, transient: true };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: 'RECOGNITION_REJECTED', reason: message, transient: false };
}
