import Anthropic from '@anthropic-ai/sdk';

export interface InferenceBackend {
  name: string;
  type: 'anthropic' | 'ollama';
  model: string;
  baseUrl?: string;
}

export interface InferenceRequest {
  input: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface InferenceResponse {
  output: string;
  model: string;
  tokensUsed?: number;
  latencyMs: number;
}

// The only model surface classifiers, generators and responders are given.
export interface TextModel {
  infer(request: InferenceRequest, backendName?: string): Promise<InferenceResponse>;
}

interface ReplyBlock {
  type: string;
  text?: string;
}

/** The part of the Anthropic client the router calls. */
export interface AnthropicMessages {
  create(
    body: Anthropic.MessageCreateParamsNonStreaming,
    options?: { signal?: AbortSignal }
  ): PromiseLike<{ content: ReplyBlock[]; usage?: { output_tokens: number } }>;
}

const OLLAMA_DEFAULT_URL = 'http://localhost:11434';

function ollamaOutput(data: unknown): string {
  if (typeof data !== 'object' || data === null || !('response' in data) || typeof data.response !== 'string') {
    throw new Error('Ollama returned an unexpected payload');
  }
  return data.response;
}

/**
 * Routes model calls to a named backend. Every call forwards the request's
 * signal, so a classifier or responder deadline cancels the HTTP request too.
 */
export class InferenceRouter implements TextModel {
  private readonly backends = new Map<string, InferenceBackend>();
  private anthropic?: AnthropicMessages;

  constructor(
    backends: InferenceBackend[],
    private readonly defaultBackend: string,
    clients: { anthropic?: AnthropicMessages } = {}
  ) {
    for (const backend of backends) {
      this.backends.set(backend.name, backend);
    }
    this.anthropic = clients.anthropic;
  }

  async infer(request: InferenceRequest, backendName?: string): Promise<InferenceResponse> {
    const name = backendName || this.defaultBackend;
    const backend = this.backends.get(name);
    if (!backend) {
      throw new Error(`Backend ${name} not configured`);
    }

    const startTime = Date.now();
    const { output, tokensUsed } =
      backend.type === 'anthropic' ? await this.callAnthropic(request, backend) : await this.callOllama(request, backend);

    return { output, model: backend.model, tokensUsed, latencyMs: Date.now() - startTime };
  }

  private async callAnthropic(
    request: InferenceRequest,
    backend: InferenceBackend
  ): Promise<{ output: string; tokensUsed?: number }> {
    const client = (this.anthropic ??= new Anthropic().messages);

    const response = await client.create(
      {
        model: backend.model,
        max_tokens: request.maxTokens || 1024,
        temperature: request.temperature ?? 0,
        system: request.systemPrompt || 'Answer concisely.',
        messages: [{ role: 'user', content: request.input }]
      },
      { signal: request.signal }
    );

    return {
      output: response.content.flatMap((block) => (block.type === 'text' && block.text !== undefined ? [block.text] : [])).join('\n'),
      tokensUsed: response.usage?.output_tokens
    };
  }

  private async callOllama(request: InferenceRequest, backend: InferenceBackend): Promise<{ output: string; tokensUsed?: number }> {
    const response = await fetch(`${backend.baseUrl || OLLAMA_DEFAULT_URL}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: backend.model,
        prompt: request.input,
        system: request.systemPrompt,
        stream: false,
        options: { temperature: request.temperature ?? 0, num_predict: request.maxTokens }
      }),
      signal: request.signal
    });

    if (!response.ok) {
      throw new Error(`Ollama error: ${response.status}`);
    }
    return { output: ollamaOutput(await response.json()) };
  }

  getAvailableBackends(): string[] {
    return Array.from(this.backends.keys());
  }
}
