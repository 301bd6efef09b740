/**
 * Mock for @google/generative-ai module.
 *
 * generateContentStream() yields queued chunks so tests can check how the
 * provider concatenates and cuts streamed output.
 */

export interface GeminiCall {
  apiKey: string;
  model: string;
  generationConfig?: { temperature?: number; maxOutputTokens?: number };
  timeout?: number;
  prompt: string;
  /** Chunks the provider actually pulled from the stream */
  chunksRead: number;
}

/**
 * Error carrying an HTTP status like GoogleGenerativeAIFetchError.
 */
export class MockGeminiFetchError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = 'GoogleGenerativeAIFetchError';
  }
}

type Reply = string[] | Error;

let replies: Reply[] = [];
let calls: GeminiCall[] = [];

/**
 * Queue replies: a list of text chunks, or an Error to reject with.
 * With an empty queue a single-chunk default page is streamed.
 */
export function setGeminiReplies(next: Reply[]): void {
  replies = [...next];
}

export function getGeminiCalls(): GeminiCall[] {
  return [...calls];
}

export function clearGeminiMock(): void {
  replies = [];
  calls = [];
}

async function* streamChunks(chunks: string[], call: GeminiCall) {
  for (const chunk of chunks) {
    call.chunksRead += 1;
    yield { text: () => chunk };
  }
}

class MockGenerativeModel {
  constructor(
    private readonly apiKey: string,
    private readonly params: { model: string; generationConfig?: GeminiCall['generationConfig'] },
    private readonly requestOptions?: { timeout?: number }
  ) {}

  async generateContentStream(prompt: string) {
    const call: GeminiCall = {
      apiKey: this.apiKey,
      model: this.params.model,
      generationConfig: this.params.generationConfig,
      timeout: this.requestOptions?.timeout,
      prompt,
      chunksRead: 0,
    };
    calls.push(call);

    const next = replies.shift() ?? ['<html><body>Mock response</body></html>'];
    if (next instanceof Error) {
      throw next;
    }

    return {
      stream: streamChunks(next, call),
      response: Promise.resolve({ text: () => next.join('') }),
    };
  }
}

export class GoogleGenerativeAI {
  constructor(private readonly apiKey: string) {}

  getGenerativeModel(
    params: { model: string; generationConfig?: GeminiCall['generationConfig'] },
    requestOptions?: { timeout?: number }
  ): MockGenerativeModel {
    return new MockGenerativeModel(this.apiKey, params, requestOptions);
  }
}
