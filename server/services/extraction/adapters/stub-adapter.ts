import type { RecognitionAdapter, RecognitionReply, RecognitionRequest } from './types';

type StubResponse = RecognitionReply | Error | ((request: RecognitionRequest) => Promise<RecognitionReply>);

/**
 * Replays scripted replies in order, repeating the last one. Tests inject it
 * through the `adapter` override of createExtractionDependencies.
 */
export class StubRecognitionAdapter implements RecognitionAdapter {
  readonly name: string;

  private callCount = 0;
  private responses: StubResponse[];
  private available = true;
  private readonly seen: RecognitionRequest[] = [];

  constructor(config: {
    name?: string;
    responses: StubResponse[];
    available?: boolean;
  }) {
    this.name = config.name ?? 'stub';
    this.responses = config.responses;
    this.available = config.available ?? true;
  }

  async recognize(request: RecognitionRequest): Promise<RecognitionReply> {
    this.seen.push(request);
    const response = this.responses[this.callCount] ?? this.responses[this.responses.length - 1];
    this.callCount++;

    if (response === undefined) {
      throw new Error('StubRecognitionAdapter has no scripted responses');
    }
    if (response instanceof Error) {
      throw response;
    }
    if (typeof response === 'function') {
      return response(request);
    }
    return response;
  }

  isAvailable(): boolean {
    return this.available;
  }

  getCallCount(): number {
    return this.callCount;
  }

  getRequests(): RecognitionRequest[] {
    return [...this.seen];
  }

  reset(): void {
    this.callCount = 0;
    this.seen.length = 0;
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }
}

export function createReplyAdapter(text: string): StubRecognitionAdapter {
  return new StubRecognitionAdapter({ responses: [{ text, model: 'stub' }] });
}

export function createJsonReplyAdapter(payload: Record<string, unknown>): StubRecognitionAdapter {
  return createReplyAdapter(`\`\`\`json\n${JSON.stringify(payload, null, 2)}\n\`\`\``);
}

export function createFailingAdapter(...errors: Error[]): StubRecognitionAdapter {
  return new StubRecognitionAdapter({ responses: errors });
}

export function createUnavailableAdapter(): StubRecognitionAdapter {
  return new StubRecognitionAdapter({ responses: [], available: false });
}
