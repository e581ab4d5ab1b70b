import type { CanonicalImage } from '../types';

export interface RecognitionReply {
  text: string;
  model?: string;
  tokensUsed?: {
    input: number;
    output: number;
  };
}

export interface RecognitionRequest {
  image: CanonicalImage;
  prompt: string;
  signal: AbortSignal;
}

/** A vision model that reads a certificate image and answers in text. */
export interface RecognitionAdapter {
  readonly name: string;

  recognize(request: RecognitionRequest): Promise<RecognitionReply>;

  isAvailable(): boolean;
}

/**
 * Failure reported by an adapter. `transient` failures are worth another
 * attempt; the rest are surfaced as-is.
 */
export class RecognitionError extends Error {
  constructor(
    message: string,
    public readonly transient: boolean,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'RecognitionError';
  }
}
