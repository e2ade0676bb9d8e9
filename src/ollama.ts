import { z } from 'zod';
import type { OllamaConfig } from './config';
import type { Logger } from './logger';

export interface ChatMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface ChatOptions {
  model: string;
}

export interface GenerateOptions {
  model: string;
  images?: string[]; // base64 images for vision models
}

const ChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string().optional(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
});

const GenerateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
});

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

/**
 * Any failure talking to Ollama: network, timeout, HTTP status or payload shape.
 */
export class OllamaError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'OllamaError';
  }
}

export class OllamaClient {
  constructor(
    private config: OllamaConfig,
    private logger: Logger,
  ) {}

  /**
   * Single-shot completion via /api/generate
   */
  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    this.logger.debug(
      { model: options.model, prompt: prompt.slice(0, 100), images: options.images?.length ?? 0 },
      'Generating with Ollama',
    );

    const raw = await this.post('/api/generate', {
      model: options.model,
      prompt,
      images: options.images,
      stream: false,
    });

    const parsed = GenerateResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new OllamaError('Malformed Ollama generate response', undefined, { cause: parsed.error });
    }

    this.logger.debug({ model: options.model, response: parsed.data.response.slice(0, 100) }, 'Generated response');
    return parsed.data.response;
  }

  /**
   * Chat with Ollama using message history
   */
  async chat(messages: ChatMessage[], options: ChatOptions): Promise<string> {
    this.logger.debug({ model: options.model, messageCount: messages.length }, 'Chat with Ollama');

    const raw = await this.post('/api/chat', {
      model: options.model,
      messages,
      stream: false,
    });

    const parsed = ChatResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new OllamaError('Malformed Ollama chat response', undefined, { cause: parsed.error });
    }

    const content = parsed.data.message.content;
    this.logger.debug({ model: options.model, response: content.slice(0, 100) }, 'Chat response');
    return content;
  }

  /**
   * List available models
   */
  async listModels(): Promise<string[]> {
    const raw = await this.request('/api/tags', { method: 'GET' });
    const parsed = TagsResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new OllamaError('Malformed Ollama tags response', undefined, { cause: parsed.error });
    }
    return parsed.data.models.map((m) => m.name);
  }

  private post(path: string, body: Record<string, unknown>): Promise<unknown> {
    return this.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  private async request(path: string, init: RequestInit): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}${path}`;

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        const detail = await response.text().catch(() => '');
        throw new OllamaError(
          `Ollama API error: ${response.status} ${response.statusText}${detail ? ` - ${detail.slice(0, 200)}` : ''}`,
          response.status,
        );
      }
      return await response.json();
    } catch (error) {
      if (error instanceof OllamaError) throw error;
      if (error instanceof Error && error.name === 'AbortError') {
        throw new OllamaError(`Ollama request timed out after ${this.config.timeoutMs}ms`, undefined, {
          cause: error,
        });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new OllamaError(`Ollama request failed: ${reason}`, undefined, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
