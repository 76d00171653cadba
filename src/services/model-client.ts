import { ModelRequestError } from '../core/errors';

export interface CompletionInput {
  prompt: string;
  maxTokens: number;
  temperature: number;
  stop: string[];
}

export interface CompletionClient {
  complete(input: CompletionInput): Promise<string>;
}

export interface ModelClientConfig {
  baseUrl: string;
  apiKey?: string;
  /** Request timeout in ms for each completion. */
  requestTimeoutMs: number;
}

interface CompletionResponse {
  content?: unknown;
}

interface PropsResponse {
  default_generation_settings?: { n_ctx?: unknown };
  n_ctx?: unknown;
}

const COMPLETION_PATH = '/completion';
const PROPS_PATH = '/props';

/** Client for a llama.cpp-compatible completion server holding the loaded model. */
export class ModelServerClient implements CompletionClient {
  constructor(private readonly config: ModelClientConfig) {}

  async complete(input: CompletionInput): Promise<string> {
    const body = {
      prompt: input.prompt,
      n_predict: input.maxTokens,
      temperature: input.temperature,
      stop: input.stop,
      stream: false,
    };

    const response = await this.request('POST', COMPLETION_PATH, body);
    if (!response.ok) {
      throw new ModelRequestError(`Model server returned ${response.status}`);
    }

    const payload = safeJsonParse<CompletionResponse>(response.text);
    if (!payload || typeof payload.content !== 'string') {
      throw new ModelRequestError('Model server response has no completion content');
    }
    return payload.content;
  }

  /** Startup check: the server answers and its context window fits the configured size. */
  async verify(minContextSize: number): Promise<{ contextSize: number }> {
    const response = await this.request('GET', PROPS_PATH);
    if (!response.ok) {
      throw new ModelRequestError(`Model server returned ${response.status} for ${PROPS_PATH}`);
    }

    const payload = safeJsonParse<PropsResponse>(response.text);
    const rawCtx = payload?.default_generation_settings?.n_ctx ?? payload?.n_ctx;
    if (typeof rawCtx !== 'number') {
      throw new ModelRequestError('Model server did not report a context size');
    }
    if (rawCtx < minContextSize) {
      throw new ModelRequestError(
        `Model context size ${rawCtx} is smaller than the configured ${minContextSize}`,
      );
    }
    return { contextSize: rawCtx };
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body?: Record<string, unknown>,
  ): Promise<{ ok: boolean; status: number; text: string }> {
    const endpoint = `${this.config.baseUrl.replace(/\/$/, '')}${path}`;
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.config.apiKey) {
      headers.authorization = `Bearer ${this.config.apiKey}`;
    }

    try {
      const response = await fetch(endpoint, {
        method,
        headers,
        ...(body ? { body: JSON.stringify(body) } : {}),
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
      return {
        ok: response.ok,
        status: response.status,
        text: await response.text(),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ModelRequestError(`Model server request to ${path} failed: ${message}`, {
        cause: error,
      });
    }
  }
}

function safeJsonParse<T>(value: string): T | null {
  try {
    return JSON.parse(value) as T;
  } catch {
    return null;
  }
}
