import Anthropic from '@anthropic-ai/sdk';
import { extractionLogger } from '../../../logger';
import { RecognitionError, type RecognitionAdapter, type RecognitionReply, type RecognitionRequest } from './types';

export interface ClaudeVisionOptions {
  apiKey?: string;
  model: string;
  maxTokens?: number;
  client?: Anthropic;
}

function isTransientStatus(status: number | undefined): boolean {
  return status === 408 || status === 409 || status === 429 || (status !== undefined && status >= 500);
}

/** Maps SDK failures onto the transient/non-transient split the client retries on. */
export function toRecognitionError(error: unknown): RecognitionError {
  if (error instanceof RecognitionError) return error;

  if (error instanceof Anthropic.APIConnectionError) {
    return new RecognitionError(`Recognition service unreachable: ${error.message}`, true);
  }
  if (error instanceof Anthropic.APIError) {
    const status = typeof error.status === 'number' ? error.status : undefined;
    return new RecognitionError(
      `Recognition service returned ${status ?? 'an error'}: ${error.message}`,
      isTransientStatus(status),
      status
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  return new RecognitionError(message, false);
}

export class ClaudeVisionAdapter implements RecognitionAdapter {
  readonly name = 'claude-vision';

  private client: Anthropic | undefined;

  constructor(private readonly options: ClaudeVisionOptions) {
    this.client = options.client;
  }

  isAvailable(): boolean {
    return Boolean(this.client || this.options.apiKey);
  }

  private getClient(): Anthropic {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new RecognitionError('ANTHROPIC_API_KEY is not configured', false);
      }
      // Retries are owned by ExtractionClient.
      this.client = new Anthropic({ apiKey: this.options.apiKey, maxRetries: 0 });
    }
    return this.client;
  }

  async recognize({ image, prompt, signal }: RecognitionRequest): Promise<RecognitionReply> {
    const startTime = Date.now();
    const client = this.getClient();

    try {
      const response = await client.messages.create(
        {
          model: this.options.model,
          max_tokens: this.options.maxTokens ?? 1024,
          messages: [
            {
              role: 'user',
              content: [
                {
                  type: 'image',
                  source: {
                    type: 'base64',
                    media_type: image.mimeType,
                    data: image.data.toString('base64'),
                  },
                },
                { type: 'text', text: prompt },
              ],
            },
          ],
        },
        { signal }
      );

      const text = response.content
        .flatMap(block => (block.type === 'text' ? [block.text] : []))
        .join('\n');

      const tokensUsed = {
        input: response.usage?.input_tokens || 0,
        output: response.usage?.output_tokens || 0,
      };

      extractionLogger.info({
        model: response.model,
        tokensUsed,
        processingTimeMs: Date.now() - startTime,
      }, 'Claude vision recognition complete');

      return { text, model: response.model, tokensUsed };
    } catch (error) {
      throw toRecognitionError(error);
    }
  }
}
