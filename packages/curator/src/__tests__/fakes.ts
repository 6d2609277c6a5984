import type { ChatProvider, ChatRequest, EmbeddingProvider, LlmOperation } from '@flashsync/core';

/** Chat provider answering from a function, recording every request */
export class FakeChatProvider implements ChatProvider {
  readonly requests: ChatRequest[] = [];
  inFlight = 0;
  peakInFlight = 0;

  constructor(
    private readonly respond: (request: ChatRequest) => string | Error,
    private readonly models: Partial<Record<LlmOperation, string>> = {}
  ) {}

  modelFor(operation: LlmOperation): string {
    return this.models[operation] ?? `fake-${operation}`;
  }

  async complete(request: ChatRequest): Promise<string> {
    this.requests.push(request);
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 1));
    this.inFlight--;
    const result = this.respond(request);
    if (result instanceof Error) throw result;
    return result;
  }
}

/** Embedding provider returning fixed vectors per text */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'fake-embed';
  readonly batches: string[][] = [];

  constructor(private readonly vectors: Record<string, number[]>) {}

  async embed(texts: readonly string[]): Promise<number[][]> {
    this.batches.push([...texts]);
    return texts.map((t) => this.vectors[t] ?? [0, 0, 1]);
  }
}
